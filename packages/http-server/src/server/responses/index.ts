/**
 * Response builders shared by the route modules
 */

export * from './session-response.js';
export * from './health-response.js';
