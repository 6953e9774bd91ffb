/**
 * Routing Resolution Module
 *
 * @module services/routing
 */

export * from './routing-table.js';
