/**
 * Wire representation of sessions and session errors
 */

import type { Session, SessionError } from '../../session/index.js';
import { sessionErrorMessage } from '../../session/index.js';

export interface SessionResponseBody {
  Session: {
    name: string;
    identifier: string;
    csrfToken: string;
    _href: string;
    User: {
      _href: string;
    };
  };
}

export interface ErrorResponseBody {
  error: string;
  message: string;
}

/**
 * Build the `{"Session": {...}}` document
 *
 * @param basePath - API prefix the user resource lives under
 */
export function buildSessionResponse(session: Session, basePath: string): SessionResponseBody {
  return {
    Session: {
      name: session.name,
      identifier: session.identifier,
      csrfToken: session.csrfToken,
      _href: session._href,
      User: {
        _href: `${basePath}/users/${encodeURIComponent(session.ownerCredentialId)}`,
      },
    },
  };
}

export function buildErrorResponse(error: SessionError): ErrorResponseBody {
  return {
    error: error.kind === 'NotFound' ? 'Not Found' : 'Unauthorized',
    message: sessionErrorMessage(error),
  };
}
