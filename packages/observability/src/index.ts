/**
 * @session-service/observability
 *
 * Structured logging shared by every package of the session service.
 */

export { getObservabilityConfig, detectEnvironment, type ObservabilityConfig } from './config.js';
export { logger, getLogger, redactIdentifier, ObservabilityLogger, type LogLevel } from './logger.js';
