// Recommendations and council decisions

import type { ConsolidationRecommendation, TerminationRecommendation } from '../core/schemas.js';
import { DecisionOutcome, RecommendationType } from './types.js';

/**
 * A proposal received from an analyzer, tagged by kind
 */
export type Recommendation =
  | { kind: 'consolidation'; payload: ConsolidationRecommendation }
  | { kind: 'termination'; payload: TerminationRecommendation };

/**
 * Outcome of evaluating one recommendation
 */
export interface Decision {
  recommendationId: string;
  recommendationType: RecommendationType;
  outcome: DecisionOutcome;
  rationale: string;
  decidedAt: Date;
}

/**
 * Identity of a recommendation regardless of its kind
 */
export function recommendationId(recommendation: Recommendation): string {
  return recommendation.payload.recommendation_id;
}

/**
 * Department names a recommendation touches
 */
export function recommendationDepartments(recommendation: Recommendation): string[] {
  return recommendation.kind === 'consolidation'
    ? [...recommendation.payload.departments_to_merge]
    : [recommendation.payload.department_name];
}
