/**
 * City orchestrator
 *
 * Department lifecycle supervision, council decisions and routing resolution
 * for a city of message-driven services.
 *
 * @packageDocumentation
 */

export * from './core/errors.js';
export * from './core/logger.js';
export * from './core/clock.js';
export * from './core/mutex.js';
export * from './core/schemas.js';
export * from './core/validation.js';
export * from './models/index.js';
export * from './services/index.js';
