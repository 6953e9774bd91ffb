// Export all services

export * from './config/index.js';
export * from './bus/index.js';
export * from './process/index.js';
export * from './registry/index.js';
export * from './supervisor/index.js';
export * from './health/index.js';
export * from './routing/index.js';
export * from './council/index.js';
export * from './dispatch/index.js';
