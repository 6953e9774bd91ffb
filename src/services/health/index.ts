/**
 * Health Protocol Module
 *
 * @module services/health
 */

export * from './health-protocol.js';
