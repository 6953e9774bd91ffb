// Export all domain models

export * from './types.js';
export * from './department.js';
export * from './routing.js';
export * from './recommendation.js';
