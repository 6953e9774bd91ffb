/**
 * Process Launching Module
 *
 * @module services/process
 */

export * from './process-launcher.js';
export * from './in-memory-launcher.js';
export * from './simulated-department.js';
