// Core type definitions for the city orchestrator

// Department lifecycle
export type DepartmentStatus =
  | 'starting'
  | 'running'
  | 'unresponsive'
  | 'restarting'
  | 'permanently_failed';

// Recommendation kinds
export type RecommendationType = 'consolidation' | 'termination';

// Re-exported wire enums
export type {
  ChangeType,
  DecisionOutcome,
  HealthStatus,
  Priority,
  TerminationReason
} from '../core/schemas.js';

/**
 * Anything that can answer "is this department currently live?"
 */
export interface LiveDepartmentSet {
  has(name: string): boolean;
}
