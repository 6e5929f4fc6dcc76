/**
 * Session Routes
 *
 * REST surface of the session lifecycle:
 * - POST   /sessions                     login (201 new, 200 reused)
 * - GET    /sessions/current             session named by the cookie
 * - POST   /sessions/:identifier/refresh slide expiry forward
 * - DELETE /sessions/:identifier         logout
 *
 * Mutating calls need the session cookie and the `X-CSRF-Token` header.
 */

import type { CookieOptions, Request, Response, Router } from 'express';
import { z } from 'zod';
import { logger, redactIdentifier } from '@session-service/observability';
import { sessionErrorStatus, type SessionError, type SessionManager } from '../../session/index.js';
import { buildErrorResponse, buildSessionResponse } from '../responses/session-response.js';

export const CSRF_HEADER = 'X-CSRF-Token';

const SessionInputSchema = z.object({
  SessionInput: z.object({
    login: z.string().min(1),
    password: z.string().min(1),
  }),
});

export interface SessionRoutesOptions {
  basePath: string;
  cookieName: string;
  cookieSecure: boolean;
}

function readSessionCookie(req: Request, cookieName: string): string | undefined {
  const cookies: unknown = req.cookies;
  if (typeof cookies !== 'object' || cookies === null) {
    return undefined;
  }
  const value: unknown = Reflect.get(cookies, cookieName);
  return typeof value === 'string' && value.length > 0 ? value : undefined;
}

function readCsrfToken(req: Request): string | undefined {
  const value = req.get(CSRF_HEADER);
  return value ? value : undefined;
}

/**
 * Setup session routes
 *
 * @param router - Express router mounted at the API base path
 * @param manager - Session lifecycle owner
 * @param options - Cookie and path settings
 */
export function setupSessionRoutes(router: Router, manager: SessionManager, options: SessionRoutesOptions): void {
  const cookieOptions: CookieOptions = {
    path: '/',
    httpOnly: true,
    sameSite: 'lax',
    secure: options.cookieSecure,
  };

  const sendError = (res: Response, error: SessionError): void => {
    res.status(sessionErrorStatus(error)).json(buildErrorResponse(error));
  };

  const clearSessionCookie = (res: Response): void => {
    res.cookie(options.cookieName, 'deleted', { ...cookieOptions, expires: new Date(0) });
  };

  /**
   * CSRF presence is checked first; the path identifier must then match the cookie
   */
  const checkMutationRequest = (req: Request, identifier: string): SessionError | undefined => {
    if (!readCsrfToken(req)) {
      return { kind: 'CsrfMismatch' };
    }
    if (readSessionCookie(req, options.cookieName) !== identifier) {
      return { kind: 'NotFound' };
    }
    return undefined;
  };

  // Login
  router.post('/sessions', async (req: Request, res: Response) => {
    const parsed = SessionInputSchema.safeParse(req.body);
    if (!parsed.success) {
      res.status(400).json({
        error: 'Invalid Request',
        message: 'Expected body {"SessionInput": {"login": string, "password": string}}',
      });
      return;
    }

    const existingIdentifier = readSessionCookie(req, options.cookieName);
    const result = await manager.create(
      parsed.data.SessionInput,
      existingIdentifier ? { identifier: existingIdentifier, csrfToken: readCsrfToken(req) } : undefined
    );
    if (!result.ok) {
      sendError(res, result.error);
      return;
    }

    const { session, created } = result;
    res.cookie(options.cookieName, session.identifier, cookieOptions);
    if (created) {
      res.location(session._href);
    }
    res.status(created ? 201 : 200).json(buildSessionResponse(session, options.basePath));
  });

  // Check current session
  router.get('/sessions/current', async (req: Request, res: Response) => {
    const identifier = readSessionCookie(req, options.cookieName);
    if (!identifier) {
      res.status(404).end();
      return;
    }

    const result = await manager.find(identifier);
    if (!result.ok) {
      logger.debug('Current session not found', { identifier: redactIdentifier(identifier) });
      res.status(404).end();
      return;
    }

    res.status(200).json(buildSessionResponse(result.session, options.basePath));
  });

  router.post('/sessions/:identifier/refresh', async (req: Request, res: Response) => {
    const { identifier } = req.params;

    const rejected = checkMutationRequest(req, identifier);
    const result = rejected
      ? { ok: false as const, error: rejected }
      : await manager.refresh(identifier, readCsrfToken(req));
    if (!result.ok) {
      if (result.error.kind === 'NotFound') {
        clearSessionCookie(res);
      }
      sendError(res, result.error);
      return;
    }

    res.status(200).json(buildSessionResponse(result.session, options.basePath));
  });

  // Logout; the cookie is cleared on 204 and on 404 alike
  router.delete('/sessions/:identifier', async (req: Request, res: Response) => {
    const { identifier } = req.params;

    const rejected = checkMutationRequest(req, identifier);
    const result = rejected
      ? { ok: false as const, error: rejected }
      : await manager.delete(identifier, readCsrfToken(req));
    if (!result.ok) {
      if (result.error.kind === 'NotFound') {
        clearSessionCookie(res);
      }
      sendError(res, result.error);
      return;
    }

    clearSessionCookie(res);
    res.status(204).end();
  });
}
