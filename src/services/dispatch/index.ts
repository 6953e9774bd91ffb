/**
 * Dispatch Module
 *
 * @module services/dispatch
 */

export * from './emergency-classifier.js';
export * from './dispatch-router.js';
