/**
 * Message Bus Module
 *
 * Transport adapters (in-memory and Redis) and the typed message router.
 *
 * @module services/bus
 */

export * from './message-bus.js';
export * from './memory-bus.js';
export * from './redis-bus.js';
export * from './message-router.js';
export * from './bus-factory.js';
