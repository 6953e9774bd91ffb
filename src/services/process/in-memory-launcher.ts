// Simulated processes for `city run --simulate` and for tests

import { ProcessLaunchError } from '../../core/errors.js';
import { Clock, SystemClock } from '../../core/clock.js';
import { ProcessHandle } from '../../models/department.js';
import { ProcessLauncher } from './process-launcher.js';

export class InMemoryProcessLauncher implements ProcessLauncher {
  private nextPid = 1000;
  private readonly alive = new Set<number>();
  private readonly failingSpawns = new Set<string>();
  private readonly permanentlyDead = new Set<string>();
  private readonly spawnCounts = new Map<string, number>();
  private readonly terminated: ProcessHandle[] = [];
  private readonly owners = new Map<number, string>();

  constructor(private readonly clock: Clock = new SystemClock()) {}

  async spawn(name: string): Promise<ProcessHandle> {
    this.spawnCounts.set(name, this.getSpawnCount(name) + 1);

    if (this.failingSpawns.has(name)) {
      throw new ProcessLaunchError(name, 'simulated spawn failure');
    }

    const handle: ProcessHandle = { name, pid: this.nextPid++, startedAt: new Date(this.clock.now()) };
    this.owners.set(handle.pid, name);
    if (!this.permanentlyDead.has(name)) {
      this.alive.add(handle.pid);
    }
    return handle;
  }

  isAlive(handle: ProcessHandle): boolean {
    return this.alive.has(handle.pid);
  }

  terminate(handle: ProcessHandle): void {
    this.alive.delete(handle.pid);
    this.terminated.push(handle);
  }

  /**
   * Kill the running process of a department once; a restart brings it back
   */
  kill(handle: ProcessHandle): void {
    this.alive.delete(handle.pid);
  }

  /**
   * Every process of this department is dead from now on, restarts included
   */
  markDead(name: string): void {
    this.permanentlyDead.add(name);
    for (const pid of [...this.alive]) {
      if (this.owners.get(pid) === name) {
        this.alive.delete(pid);
      }
    }
  }

  /**
   * Spawning this department throws ProcessLaunchError until `restore`
   */
  failSpawns(name: string): void {
    this.failingSpawns.add(name);
  }

  restore(name: string): void {
    this.failingSpawns.delete(name);
    this.permanentlyDead.delete(name);
  }

  getSpawnCount(name: string): number {
    return this.spawnCounts.get(name) ?? 0;
  }

  getTerminated(): ProcessHandle[] {
    return [...this.terminated];
  }
}
