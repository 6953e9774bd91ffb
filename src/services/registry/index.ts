/**
 * Department Registry Module
 *
 * @module services/registry
 */

export * from './registry-scanner.js';
