/**
 * Process Supervision Module
 *
 * @module services/supervisor
 */

export * from './process-supervisor.js';
