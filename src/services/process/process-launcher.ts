// Process-launch facility: spawn, probe and stop department programs

import { spawn, ChildProcess } from 'child_process';
import { ProcessLaunchError } from '../../core/errors.js';
import { Clock, SystemClock } from '../../core/clock.js';
import { ProcessHandle } from '../../models/department.js';

/**
 * Starts department processes by name and reports on them by handle
 */
export interface ProcessLauncher {
  spawn(name: string): Promise<ProcessHandle>;

  /**
   * Non-blocking liveness probe
   */
  isAlive(handle: ProcessHandle): boolean;

  /**
   * Stop a process. A process that is already gone is not an error.
   */
  terminate(handle: ProcessHandle): void;
}

export interface ChildProcessLauncherOptions {
  command: string;
  /** Arguments; every `{name}` is replaced by the department name */
  args: string[];
  cwd?: string;
  clock?: Clock;
}

/**
 * Launches each department as an operating-system process
 */
export class ChildProcessLauncher implements ProcessLauncher {
  private readonly children = new Map<number, ChildProcess>();
  private readonly clock: Clock;

  constructor(private readonly options: ChildProcessLauncherOptions) {
    this.clock = options.clock ?? new SystemClock();
  }

  /**
   * Command line used for a department
   */
  commandFor(name: string): { command: string; args: string[] } {
    return {
      command: this.options.command,
      args: this.options.args.map(arg => arg.replaceAll('{name}', name))
    };
  }

  spawn(name: string): Promise<ProcessHandle> {
    const { command, args } = this.commandFor(name);

    return new Promise((resolve, reject) => {
      const child = spawn(command, args, {
        cwd: this.options.cwd,
        stdio: 'ignore'
      });

      child.once('error', error => {
        reject(new ProcessLaunchError(name, error.message));
      });

      child.once('spawn', () => {
        const pid = child.pid;
        if (pid === undefined) {
          reject(new ProcessLaunchError(name, 'no process id assigned'));
          return;
        }
        this.children.set(pid, child);
        child.once('exit', () => this.children.delete(pid));
        resolve({ name, pid, startedAt: new Date(this.clock.now()) });
      });
    });
  }

  isAlive(handle: ProcessHandle): boolean {
    const child = this.children.get(handle.pid);
    if (child && child.exitCode !== null) {
      return false;
    }

    try {
      process.kill(handle.pid, 0);
      return true;
    } catch (error) {
      // EPERM: the process exists but belongs to someone else
      return errorCode(error) === 'EPERM';
    }
  }

  terminate(handle: ProcessHandle): void {
    try {
      process.kill(handle.pid, 'SIGTERM');
    } catch (error) {
      if (errorCode(error) !== 'ESRCH') {
        throw new ProcessLaunchError(handle.name, `cannot terminate pid ${handle.pid}: ${String(error)}`);
      }
    } finally {
      this.children.delete(handle.pid);
    }
  }
}

function errorCode(error: unknown): string | undefined {
  if (error instanceof Error && 'code' in error && typeof error.code === 'string') {
    return error.code;
  }
  return undefined;
}
