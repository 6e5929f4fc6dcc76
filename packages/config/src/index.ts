/**
 * @session-service/config
 * Validated environment configuration for the session service
 */

export * from './environment.js';
export * from './base-config.js';
export * from './session-config.js';
export * from './storage-config.js';
