/**
 * @tidewatch/core - Types, configuration and contracts for the Tidewatch resilience engine
 *
 * This package holds pure definitions with no timers and no state.
 *
 * Dependency direction: core → runtime
 */

// Configuration loading
export * from './config/loader.js';
// Error system
export * from './errors/index.js';
// Event contracts
export * from './events/index.js';
// Logger contract
export * from './logger.js';
// Profiles
export * from './profiles.js';
// Configuration schemas
export * from './schemas.js';
// Domain types
export * from './types/index.js';
// Utilities
export * from './utils/env-expander.js';
export * from './utils/result.js';
