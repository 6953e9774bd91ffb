/**
 * City Council Module
 *
 * Recommendation policy, change notifications and the orchestrator loop.
 *
 * @module services/council
 */

export * from './recommendation-evaluator.js';
export * from './notification-dispatcher.js';
export * from './orchestrator-loop.js';
