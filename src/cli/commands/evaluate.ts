// Evaluate command - Decide a recommendation read from a file

import { Command } from 'commander';
import { SystemClock } from '../../core/clock.js';
import { logger } from '../../core/logger.js';
import { recommendationDepartments } from '../../models/recommendation.js';
import { DecisionOutcome } from '../../models/types.js';
import { RecommendationEvaluator, parseRecommendation } from '../../services/council/recommendation-evaluator.js';
import { loadConfig } from '../utils/context.js';
import { withErrorHandling } from '../utils/error-handler.js';
import { readStructuredFile } from '../utils/input.js';

interface EvaluateOptions {
  path: string;
  json?: boolean;
}

const OUTCOME_EMOJI: Record<DecisionOutcome, string> = {
  approved: '✅',
  deferred: '⏸️',
  rejected: '❌'
};

export const evaluateCommand = new Command('evaluate')
  .description('Decide a consolidation or termination recommendation under the configured policy')
  .argument('<file>', 'Recommendation as YAML or JSON')
  .option('-p, --path <path>', 'Base path', process.cwd())
  .option('--json', 'Output as JSON')
  .action(withErrorHandling(async (file: string, options: EvaluateOptions) => {
    const config = await loadConfig(options.path);
    const recommendation = parseRecommendation(await readStructuredFile(file));
    const evaluator = new RecommendationEvaluator(config.policy, new SystemClock(), logger);
    const { decision } = evaluator.evaluate(recommendation);

    if (options.json) {
      console.log(JSON.stringify(decision, null, 2)); // eslint-disable-line no-console
      return;
    }

    console.log(`\n${OUTCOME_EMOJI[decision.outcome]} ${decision.recommendationType} ${decision.recommendationId}: ${decision.outcome.toUpperCase()}`); // eslint-disable-line no-console
    console.log(`   Departments: ${recommendationDepartments(recommendation).join(', ')}`); // eslint-disable-line no-console
    console.log(`   ${decision.rationale}\n`); // eslint-disable-line no-console
  }));
