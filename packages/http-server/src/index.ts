/**
 * @session-service/http-server
 *
 * Session lifecycle manager and its Express surface.
 */

export * from './session/index.js';
export { SessionHttpServer, type SessionHttpServerOptions } from './server/session-http-server.js';
export { setupSessionRoutes, CSRF_HEADER, type SessionRoutesOptions } from './server/routes/session-routes.js';
export { setupHealthRoutes, type HealthRoutesOptions } from './server/routes/health-routes.js';
export * from './server/responses/index.js';
export { createSecurityValidationMiddleware, type SecurityValidationOptions } from './middleware/security-validation.js';
export { createRequestLoggingMiddleware } from './middleware/request-logging.js';
