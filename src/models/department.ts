// Supervised department record

import { DepartmentStatus } from './types.js';

/**
 * Opaque handle to a running department process
 */
export interface ProcessHandle {
  name: string;
  pid: number;
  startedAt: Date;
}

/**
 * Lifecycle state of one supervised department. Owned by the process supervisor.
 */
export interface DepartmentRecord {
  /** Unique logical name */
  name: string;
  /** Current process, null while no process is running */
  handle: ProcessHandle | null;
  status: DepartmentStatus;
  /** Consecutive ticks the process was found dead */
  processFailures: number;
  /** Consecutive missed or unhealthy health checks */
  healthFailures: number;
  /** Restarts since the department was last seen running */
  restartCount: number;
  createdAt: Date;
  lastProcessCheck: Date | null;
  lastHealthRequest: Date | null;
  lastFailure: Date | null;
  lastRestart: Date | null;
  awaitingResponse: boolean;
  /** Correlation id of the outstanding health check */
  pendingCheckId: string | null;
  /** Result of the most recent liveness probe */
  lastLivenessOk: boolean;
}

/**
 * Counts per lifecycle status plus the health-summary buckets
 */
export interface SupervisionSummary {
  total: number;
  byStatus: Record<DepartmentStatus, number>;
  healthy: number;
  warning: number;
  unhealthy: number;
}
