/**
 * Session Manager
 *
 * Owns the login-session lifecycle: create, find, refresh and delete, with
 * CSRF-token binding on every mutating call. Records live in a
 * SessionRecordStore, so the same manager serves single-node (memory) and
 * multi-node (Redis) deployments.
 *
 * Lifecycle: ACTIVE --refresh--> ACTIVE, ACTIVE --delete/expiry--> DELETED.
 * DELETED is terminal; every later lookup reports NotFound.
 */

import {
  constantTimeEquals,
  generateToken,
  type AuthenticatedIdentity,
  type CredentialProvider,
  type Credentials,
} from '@session-service/auth';
import { SessionConflictError, type SessionRecord, type SessionRecordStore } from '@session-service/persistence';
import { logger, redactIdentifier } from '@session-service/observability';
import { KeyedMutex } from './keyed-mutex.js';
import { sessionFailure, type SessionFailure } from './session-errors.js';

export const DEFAULT_MAX_ALLOCATION_ATTEMPTS = 5;

/**
 * Session as handed to callers: the stored record plus its resource locator
 */
export interface Session extends SessionRecord {
  _href: string;
}

export type SessionResult = { ok: true; session: Session } | SessionFailure;

/**
 * `created: false` means an existing session was reused by a re-login
 */
export type CreateSessionResult = { ok: true; session: Session; created: boolean } | SessionFailure;

export type DeleteSessionResult = { ok: true } | SessionFailure;

/**
 * Session the client already holds when it logs in again
 */
export interface ExistingSessionClaim {
  identifier: string;
  csrfToken?: string;
}

export interface SessionManagerOptions {
  store: SessionRecordStore;
  credentialProvider: CredentialProvider;
  /** Cookie name recorded on every session */
  cookieName: string;
  /** Prefix of `_href`, e.g. `/api/v2/user` */
  basePath: string;
  ttlSeconds: number;
  /** Source of identifiers and CSRF tokens; defaults to 32 random bytes, base64url */
  tokenGenerator?: () => string;
  maxAllocationAttempts?: number;
}

export class SessionManager {
  private readonly store: SessionRecordStore;
  private readonly credentialProvider: CredentialProvider;
  private readonly cookieName: string;
  private readonly basePath: string;
  private readonly ttlMs: number;
  private readonly tokenGenerator: () => string;
  private readonly maxAllocationAttempts: number;
  private readonly locks = new KeyedMutex<string>();

  constructor(options: SessionManagerOptions) {
    this.store = options.store;
    this.credentialProvider = options.credentialProvider;
    this.cookieName = options.cookieName;
    this.basePath = options.basePath;
    this.ttlMs = options.ttlSeconds * 1000;
    this.tokenGenerator = options.tokenGenerator ?? (() => generateToken());
    this.maxAllocationAttempts = options.maxAllocationAttempts ?? DEFAULT_MAX_ALLOCATION_ATTEMPTS;
  }

  /**
   * Authenticate and open a session.
   *
   * With an `existing` claim the login either reuses that session (live, same
   * owner, matching CSRF token presented) or replaces it with a new one.
   */
  async create(credentials: Credentials, existing?: ExistingSessionClaim): Promise<CreateSessionResult> {
    const identity = await this.credentialProvider.authenticate(credentials);
    if (!identity) {
      logger.info('Login rejected', { login: credentials.login });
      return sessionFailure('AuthFailure');
    }

    if (existing) {
      return this.locks.runExclusive(existing.identifier, () => this.relogin(identity, existing));
    }

    return { ok: true, session: await this.allocate(identity), created: true };
  }

  async find(identifier: string): Promise<SessionResult> {
    const record = await this.store.get(identifier);
    if (!record) {
      return sessionFailure('NotFound');
    }
    return { ok: true, session: this.toSession(record) };
  }

  async refresh(identifier: string, presentedCsrfToken: string | undefined): Promise<SessionResult> {
    // Fails before the lookup, whether or not the session exists
    if (!presentedCsrfToken) {
      return sessionFailure('CsrfMismatch');
    }

    return this.locks.runExclusive<SessionResult>(identifier, async () => {
      const record = await this.store.get(identifier);
      if (!record) {
        return sessionFailure('NotFound');
      }
      if (!constantTimeEquals(record.csrfToken, presentedCsrfToken)) {
        logger.warn('CSRF token mismatch on refresh', { identifier: redactIdentifier(identifier) });
        return sessionFailure('CsrfMismatch');
      }

      const touched = await this.touch(identifier);
      if (!touched) {
        return sessionFailure('NotFound');
      }
      logger.debug('Session refreshed', { identifier: redactIdentifier(identifier) });
      return { ok: true, session: touched };
    });
  }

  async delete(identifier: string, presentedCsrfToken: string | undefined): Promise<DeleteSessionResult> {
    if (!presentedCsrfToken) {
      return sessionFailure('CsrfMismatch');
    }

    return this.locks.runExclusive<DeleteSessionResult>(identifier, async () => {
      const record = await this.store.get(identifier);
      if (!record) {
        return sessionFailure('NotFound');
      }
      if (!constantTimeEquals(record.csrfToken, presentedCsrfToken)) {
        logger.warn('CSRF token mismatch on delete', { identifier: redactIdentifier(identifier) });
        return sessionFailure('CsrfMismatch');
      }

      // Another process may have won the race since the lookup
      if (!(await this.store.delete(identifier))) {
        return sessionFailure('NotFound');
      }
      logger.info('Session deleted', { identifier: redactIdentifier(identifier) });
      return { ok: true };
    });
  }

  /**
   * Number of live sessions
   */
  async stats(): Promise<number> {
    return this.store.count();
  }

  async destroy(): Promise<void> {
    this.locks.clear();
    await this.store.dispose();
  }

  private async relogin(identity: AuthenticatedIdentity, existing: ExistingSessionClaim): Promise<CreateSessionResult> {
    const record = await this.store.get(existing.identifier);

    if (record && existing.csrfToken) {
      if (!constantTimeEquals(record.csrfToken, existing.csrfToken)) {
        logger.warn('CSRF token mismatch on re-login', { identifier: redactIdentifier(record.identifier) });
        return sessionFailure('CsrfMismatch');
      }

      if (record.ownerCredentialId === identity.credentialId) {
        const touched = await this.touch(record.identifier);
        if (touched) {
          logger.info('Session reused on login', { identifier: redactIdentifier(record.identifier) });
          return { ok: true, session: touched, created: false };
        }
      }
    }

    if (record) {
      await this.store.delete(record.identifier);
      logger.info('Replacing existing session on login', { identifier: redactIdentifier(record.identifier) });
    }

    return { ok: true, session: await this.allocate(identity), created: true };
  }

  private async allocate(identity: AuthenticatedIdentity): Promise<Session> {
    for (let attempt = 1; attempt <= this.maxAllocationAttempts; attempt++) {
      const now = Date.now();
      const record: SessionRecord = {
        identifier: this.tokenGenerator(),
        name: this.cookieName,
        csrfToken: this.tokenGenerator(),
        ownerCredentialId: identity.credentialId,
        createdAt: now,
        lastRefreshedAt: now,
        expiresAt: now + this.ttlMs,
      };

      try {
        await this.store.insert(record);
      } catch (error) {
        if (error instanceof SessionConflictError) {
          logger.warn('Session token collision, regenerating', { field: error.field, attempt });
          continue;
        }
        throw error;
      }

      logger.info('Session created', {
        identifier: redactIdentifier(record.identifier),
        owner: identity.credentialId,
      });
      return this.toSession(record);
    }

    throw new Error(`Failed to allocate a unique session after ${this.maxAllocationAttempts} attempts`);
  }

  private async touch(identifier: string): Promise<Session | null> {
    const now = Date.now();
    const updated = await this.store.touch(identifier, now, now + this.ttlMs);
    return updated ? this.toSession(updated) : null;
  }

  private toSession(record: SessionRecord): Session {
    return { ...record, _href: `${this.basePath}/sessions/${record.identifier}` };
  }
}
