/**
 * Session lifecycle: manager, outcomes and per-identifier locking
 */

export {
  SessionManager,
  DEFAULT_MAX_ALLOCATION_ATTEMPTS,
  type Session,
  type SessionResult,
  type CreateSessionResult,
  type DeleteSessionResult,
  type ExistingSessionClaim,
  type SessionManagerOptions,
} from './session-manager.js';
export {
  sessionErrorStatus,
  sessionErrorMessage,
  sessionFailure,
  type SessionError,
  type SessionErrorKind,
  type SessionFailure,
} from './session-errors.js';
export { Mutex, KeyedMutex } from './keyed-mutex.js';
