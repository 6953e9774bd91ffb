/**
 * Process Supervisor
 *
 * Owns the lifecycle record of every supervised department: spawn, liveness
 * probing, health-check bookkeeping, bounded restarts and demotion to
 * permanently failed. Records are only changed through the methods below.
 */

import { Clock } from '../../core/clock.js';
import { Logger, logger as rootLogger } from '../../core/logger.js';
import { DepartmentRecord, ProcessHandle, SupervisionSummary } from '../../models/department.js';
import { DepartmentStatus, LiveDepartmentSet } from '../../models/types.js';
import { ProcessLauncher } from '../process/process-launcher.js';

/**
 * Restart policy
 */
export interface SupervisorPolicy {
  /** Consecutive failures (either counter) that trigger a restart */
  restartThreshold: number;
  /** Restarts allowed before the department is given up on */
  maxRestarts: number;
  /** Time a health check may go unanswered before it counts as a failure */
  silenceWindowMs: number;
}

/**
 * Sends one health check to a department. Called by the supervisor on each tick.
 */
export type HealthRequester = (name: string) => void;

/**
 * Outcome of a health reply as seen by the supervisor
 */
export type ReplyOutcome = 'recorded' | 'unknown' | 'permanently_failed';

export class ProcessSupervisor implements LiveDepartmentSet {
  private readonly records = new Map<string, DepartmentRecord>();
  private readonly launches = new Map<string, Promise<void>>();
  private readonly log: Logger;
  private requester: HealthRequester | null = null;
  private draining = false;

  constructor(
    private readonly launcher: ProcessLauncher,
    private readonly clock: Clock,
    private readonly policy: SupervisorPolicy,
    logger: Logger = rootLogger
  ) {
    this.log = logger.child('supervisor');
  }

  setHealthRequester(requester: HealthRequester): void {
    this.requester = requester;
  }

  /**
   * Start supervising a department and spawn its process. Registering a name
   * that is already tracked returns the existing record.
   */
  async register(name: string): Promise<DepartmentRecord> {
    const record = this.track(name);
    await this.launches.get(name);
    return { ...record };
  }

  /**
   * Track a department and start its spawn without waiting for it. The record
   * stays 'starting' until the spawn settles; see whenLaunched().
   */
  enroll(name: string): DepartmentRecord {
    return { ...this.track(name) };
  }

  /**
   * Resolves once the department's current spawn has settled, with the record
   * as it then stands, or undefined if it is no longer tracked.
   */
  async whenLaunched(name: string): Promise<DepartmentRecord | undefined> {
    await this.launches.get(name);
    return this.get(name);
  }

  /**
   * Resolves once no spawn is in flight
   */
  async settled(): Promise<void> {
    while (this.launches.size > 0) {
      await Promise.all(this.launches.values());
    }
  }

  /**
   * One supervision cycle over every department that is not permanently failed.
   * Restarts are started, not awaited. Returns the names demoted in this cycle.
   */
  tick(): string[] {
    if (this.draining) {
      return [];
    }

    const demoted: string[] = [];

    for (const record of this.records.values()) {
      if (record.status === 'permanently_failed' || this.launches.has(record.name)) {
        continue;
      }

      this.probeLiveness(record);
      this.checkSilence(record);

      if (Math.max(record.processFailures, record.healthFailures) >= this.policy.restartThreshold) {
        if (record.restartCount >= this.policy.maxRestarts) {
          this.demote(record);
          demoted.push(record.name);
        } else {
          this.restart(record);
        }
        continue;
      }

      if (record.lastLivenessOk && !record.awaitingResponse) {
        this.requester?.(record.name);
      }
    }

    return demoted;
  }

  /**
   * Bookkeeping for a health check that was just sent
   */
  noteHealthRequest(name: string, checkId: string): void {
    const record = this.records.get(name);
    if (!record || record.status === 'permanently_failed') {
      return;
    }
    record.lastHealthRequest = this.now();
    record.awaitingResponse = true;
    record.pendingCheckId = checkId;
  }

  /**
   * Apply a correlated health reply
   */
  recordHealthReply(name: string, healthy: boolean): ReplyOutcome {
    const record = this.records.get(name);
    if (!record) {
      return 'unknown';
    }
    if (record.status === 'permanently_failed') {
      return 'permanently_failed';
    }

    record.awaitingResponse = false;
    record.pendingCheckId = null;

    if (healthy) {
      record.healthFailures = 0;
      if (record.lastLivenessOk) {
        record.processFailures = 0;
        if (record.status !== 'running') {
          this.log.info(`${name} is running`, { previous: record.status, restarts: record.restartCount });
        }
        record.status = 'running';
        record.restartCount = 0;
      }
      return 'recorded';
    }

    record.healthFailures++;
    record.lastFailure = this.now();
    if (record.status === 'running') {
      record.status = 'unresponsive';
    }
    this.log.warn(`${name} reported unhealthy`, { healthFailures: record.healthFailures });
    return 'recorded';
  }

  /**
   * Stop supervising a department and terminate its process
   */
  retire(name: string): boolean {
    const record = this.records.get(name);
    if (!record) {
      return false;
    }

    this.stopProcess(record);
    this.records.delete(name);
    this.log.info(`Retired ${name}`);
    return true;
  }

  /**
   * Stop health checks and restarts, then terminate every process
   */
  shutdown(): void {
    this.draining = true;
    for (const record of this.records.values()) {
      this.stopProcess(record);
    }
    this.log.info('Supervisor drained', { departments: this.records.size });
  }

  isDraining(): boolean {
    return this.draining;
  }

  /**
   * Live set used for routing: tracked and not permanently failed
   */
  has(name: string): boolean {
    const record = this.records.get(name);
    return record !== undefined && record.status !== 'permanently_failed';
  }

  isTracked(name: string): boolean {
    return this.records.has(name);
  }

  get(name: string): DepartmentRecord | undefined {
    const record = this.records.get(name);
    return record ? { ...record } : undefined;
  }

  list(): DepartmentRecord[] {
    return [...this.records.values()].map(record => ({ ...record }));
  }

  names(): string[] {
    return [...this.records.keys()];
  }

  summary(): SupervisionSummary {
    const byStatus: Record<DepartmentStatus, number> = {
      starting: 0,
      running: 0,
      unresponsive: 0,
      restarting: 0,
      permanently_failed: 0
    };
    for (const record of this.records.values()) {
      byStatus[record.status]++;
    }

    return {
      total: this.records.size,
      byStatus,
      healthy: byStatus.running,
      warning: byStatus.starting + byStatus.unresponsive + byStatus.restarting,
      unhealthy: byStatus.permanently_failed
    };
  }

  private probeLiveness(record: DepartmentRecord): void {
    record.lastProcessCheck = this.now();
    const alive = record.handle !== null && this.launcher.isAlive(record.handle);
    record.lastLivenessOk = alive;

    if (alive) {
      record.processFailures = 0;
      return;
    }

    record.processFailures++;
    record.lastFailure = this.now();
    if (record.status === 'running') {
      record.status = 'unresponsive';
    }
    this.log.warn(`${record.name} process is not running`, { processFailures: record.processFailures });
  }

  private checkSilence(record: DepartmentRecord): void {
    if (!record.awaitingResponse || !record.lastHealthRequest) {
      return;
    }

    const silentFor = this.clock.now() - record.lastHealthRequest.getTime();
    if (silentFor <= this.policy.silenceWindowMs) {
      return;
    }

    record.awaitingResponse = false;
    record.pendingCheckId = null;
    record.healthFailures++;
    record.lastFailure = this.now();
    if (record.status === 'running') {
      record.status = 'unresponsive';
    }
    this.log.warn(`No health reply from ${record.name}`, { silentForMs: silentFor, healthFailures: record.healthFailures });
  }

  private restart(record: DepartmentRecord): void {
    this.stopProcess(record);

    record.restartCount++;
    record.lastRestart = this.now();
    record.awaitingResponse = false;
    record.pendingCheckId = null;
    record.status = 'restarting';

    this.log.warn(`Restarting ${record.name}`, {
      attempt: record.restartCount,
      maxRestarts: this.policy.maxRestarts
    });

    this.startLaunch(record);
  }

  private demote(record: DepartmentRecord): void {
    this.stopProcess(record);
    record.status = 'permanently_failed';
    record.awaitingResponse = false;
    record.pendingCheckId = null;
    this.log.error(`${record.name} permanently failed`, {
      restarts: record.restartCount,
      processFailures: record.processFailures,
      healthFailures: record.healthFailures
    });
  }

  private track(name: string): DepartmentRecord {
    const existing = this.records.get(name);
    if (existing) {
      return existing;
    }

    const record: DepartmentRecord = {
      name,
      handle: null,
      status: 'starting',
      processFailures: 0,
      healthFailures: 0,
      restartCount: 0,
      createdAt: this.now(),
      lastProcessCheck: null,
      lastHealthRequest: null,
      lastFailure: null,
      lastRestart: null,
      awaitingResponse: false,
      pendingCheckId: null,
      lastLivenessOk: false
    };
    this.records.set(name, record);
    this.startLaunch(record);
    return record;
  }

  private startLaunch(record: DepartmentRecord): void {
    const launch: Promise<void> = this.launch(record).finally(() => {
      if (this.launches.get(record.name) === launch) {
        this.launches.delete(record.name);
      }
    });
    this.launches.set(record.name, launch);
  }

  /**
   * Spawn a process for the record. A spawn error leaves the record without a
   * handle; the next tick counts it as a dead process.
   */
  private async launch(record: DepartmentRecord): Promise<void> {
    let handle: ProcessHandle;
    try {
      handle = await this.launcher.spawn(record.name);
    } catch (error) {
      record.handle = null;
      record.lastLivenessOk = false;
      record.lastFailure = this.now();
      this.log.warn(`Spawn failed for ${record.name}`, {
        reason: error instanceof Error ? error.message : String(error)
      });
      return;
    }

    // Retired or drained while the spawn was in flight
    if (this.records.get(record.name) !== record || this.draining) {
      this.terminateQuietly(handle);
      return;
    }

    record.handle = handle;
    record.lastLivenessOk = true;
    this.log.info(`Launched ${record.name}`, { pid: handle.pid });
  }

  private stopProcess(record: DepartmentRecord): void {
    if (record.handle) {
      this.terminateQuietly(record.handle);
      record.handle = null;
    }
  }

  private terminateQuietly(handle: ProcessHandle): void {
    try {
      this.launcher.terminate(handle);
    } catch (error) {
      this.log.warn(`Could not terminate ${handle.name}`, {
        pid: handle.pid,
        reason: error instanceof Error ? error.message : String(error)
      });
    }
  }

  private now(): Date {
    return new Date(this.clock.now());
  }
}
