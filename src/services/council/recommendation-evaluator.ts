/**
 * Recommendation Evaluator
 *
 * Applies the council policy to consolidation and termination proposals. Each
 * recommendation is decided once; a redelivered recommendation gets the
 * decision recorded the first time.
 */

import { Clock } from '../../core/clock.js';
import { Logger, logger as rootLogger } from '../../core/logger.js';
import { ConsolidationRecommendationSchema, TerminationRecommendationSchema } from '../../core/schemas.js';
import type { ConsolidationRecommendation, TerminationRecommendation } from '../../core/schemas.js';
import { parseMessage } from '../../core/validation.js';
import { Decision, Recommendation, recommendationId } from '../../models/recommendation.js';
import { DecisionOutcome } from '../../models/types.js';
import type { PolicyConfig } from '../config/config-service.js';

const RATIONALE: Record<DecisionOutcome, string> = {
  approved: 'Recommendation approved based on cost-benefit analysis and efficiency goals',
  rejected: 'Recommendation rejected to maintain essential services or insufficient justification',
  deferred: 'Recommendation deferred pending further review and citizen input'
};

/**
 * Audit text for a decision. Depends on the outcome only.
 */
export function rationaleFor(outcome: DecisionOutcome): string {
  return RATIONALE[outcome];
}

/**
 * Validate a recommendation read from a file or another untyped source. A
 * payload listing departments to merge is a consolidation, anything else a
 * termination.
 */
export function parseRecommendation(data: unknown): Recommendation {
  if (typeof data === 'object' && data !== null && 'departments_to_merge' in data) {
    return {
      kind: 'consolidation',
      payload: parseMessage(ConsolidationRecommendationSchema, 'consolidation_recommendation', data)
    };
  }
  return {
    kind: 'termination',
    payload: parseMessage(TerminationRecommendationSchema, 'termination_recommendation', data)
  };
}

export interface Evaluation {
  decision: Decision;
  /** False when the recommendation had already been decided */
  isNew: boolean;
}

export class RecommendationEvaluator {
  private readonly decided = new Map<string, Decision>();
  private readonly log: Logger;

  constructor(
    private readonly policy: PolicyConfig,
    private readonly clock: Clock,
    logger: Logger = rootLogger
  ) {
    this.log = logger.child('evaluator');
  }

  evaluate(recommendation: Recommendation): Evaluation {
    const id = recommendationId(recommendation);
    const previous = this.decided.get(id);
    if (previous) {
      this.log.debug('Recommendation already decided', { recommendationId: id, outcome: previous.outcome });
      return { decision: previous, isNew: false };
    }

    const outcome = recommendation.kind === 'consolidation'
      ? this.decideConsolidation(recommendation.payload)
      : this.decideTermination(recommendation.payload);

    const decision: Decision = {
      recommendationId: id,
      recommendationType: recommendation.kind,
      outcome,
      rationale: rationaleFor(outcome),
      decidedAt: new Date(this.clock.now())
    };
    this.decided.set(id, decision);
    return { decision, isNew: true };
  }

  /**
   * Approve when both similarity and savings clear their thresholds, defer on
   * medium similarity, reject otherwise. Missing figures never approve.
   */
  decideConsolidation(recommendation: ConsolidationRecommendation): DecisionOutcome {
    const { approveSimilarity, approveSavings, deferSimilarity } = this.policy.consolidation;
    const similarity = recommendation.similarity_score ?? null;
    const savings = recommendation.estimated_annual_savings ?? null;

    if (similarity !== null && similarity > approveSimilarity && savings !== null && savings > approveSavings) {
      this.log.info(`Approving consolidation into ${recommendation.proposed_name}`, { similarity, savings });
      return 'approved';
    }
    if (similarity !== null && similarity > deferSimilarity) {
      this.log.info(`Deferring medium-similarity consolidation: ${recommendation.proposed_name}`, { similarity, savings });
      return 'deferred';
    }
    this.log.info(`Rejecting low-similarity consolidation: ${recommendation.proposed_name}`, { similarity, savings });
    return 'rejected';
  }

  decideTermination(recommendation: TerminationRecommendation): DecisionOutcome {
    const name = recommendation.department_name.toLowerCase();
    const { protectedDepartments, approveReasons } = this.policy.termination;

    if (protectedDepartments.some(entry => name.includes(entry.toLowerCase()))) {
      this.log.warn(`Rejecting termination of protected department: ${recommendation.department_name}`);
      return 'rejected';
    }
    if (approveReasons.includes(recommendation.termination_reason)) {
      this.log.info(`Approving termination: ${recommendation.department_name}`, {
        reason: recommendation.termination_reason
      });
      return 'approved';
    }
    this.log.info(`Deferring termination for review: ${recommendation.department_name}`, {
      reason: recommendation.termination_reason
    });
    return 'deferred';
  }

  getDecision(id: string): Decision | undefined {
    return this.decided.get(id);
  }

  decisions(): Decision[] {
    return [...this.decided.values()];
  }
}
