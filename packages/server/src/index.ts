/**
 * @session-service/server
 *
 * Assembles the session service from environment configuration
 */

export {
  createSessionService,
  configureLogging,
  type SessionService,
  type SessionServiceOptions,
} from './setup.js';
