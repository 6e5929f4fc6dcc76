/**
 * Failure outcomes of session operations
 *
 * These are expected results, not exceptions: the manager returns them and
 * the HTTP layer maps them to status codes. Storage failures are thrown.
 */

export type SessionErrorKind = 'AuthFailure' | 'CsrfMismatch' | 'NotFound';

export type SessionError =
  | { kind: 'AuthFailure' }
  | { kind: 'CsrfMismatch' }
  | { kind: 'NotFound' };

export interface SessionFailure {
  ok: false;
  error: SessionError;
}

export function sessionFailure(kind: SessionErrorKind): SessionFailure {
  return { ok: false, error: { kind } };
}

const STATUS_BY_KIND: Record<SessionErrorKind, 401 | 404> = {
  AuthFailure: 401,
  CsrfMismatch: 401,
  NotFound: 404,
};

export function sessionErrorStatus(error: SessionError): 401 | 404 {
  return STATUS_BY_KIND[error.kind];
}

const MESSAGE_BY_KIND: Record<SessionErrorKind, string> = {
  AuthFailure: 'Invalid login or password',
  CsrfMismatch: 'Missing or invalid CSRF token',
  NotFound: 'Session not found',
};

export function sessionErrorMessage(error: SessionError): string {
  return MESSAGE_BY_KIND[error.kind];
}
