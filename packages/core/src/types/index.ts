/**
 * Domain types shared across packages
 */

export * from './activity.js';
export * from './failure.js';
export * from './health.js';
