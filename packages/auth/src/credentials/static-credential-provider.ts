/**
 * Static credential provider
 *
 * Verifies logins against a fixed set of `login:password` pairs, configured
 * via the SESSION_USERS environment variable. Passwords are held only as
 * SHA-256 digests.
 */

import { createHash } from 'node:crypto';
import { logger } from '@session-service/observability';
import { constantTimeEquals } from '../tokens.js';
import type { AuthenticatedIdentity, CredentialProvider, Credentials } from './types.js';

function digest(value: string): string {
  return createHash('sha256').update(value, 'utf-8').digest('hex');
}

/**
 * Parse comma-separated `login:password` pairs
 *
 * The first colon separates login from password; passwords may contain colons.
 */
export function parseUserList(value: string | undefined): Map<string, string> {
  const users = new Map<string, string>();
  if (!value) {
    return users;
  }

  for (const entry of value.split(',')) {
    const trimmed = entry.trim();
    const separator = trimmed.indexOf(':');
    if (separator <= 0 || separator === trimmed.length - 1) {
      if (trimmed.length > 0) {
        logger.warn('Ignoring malformed SESSION_USERS entry', { position: users.size });
      }
      continue;
    }
    users.set(trimmed.substring(0, separator), trimmed.substring(separator + 1));
  }

  return users;
}

export class StaticCredentialProvider implements CredentialProvider {
  private readonly digests = new Map<string, string>();

  constructor(users: Map<string, string> | Record<string, string>) {
    const entries = users instanceof Map ? users.entries() : Object.entries(users);
    for (const [login, password] of entries) {
      this.digests.set(login, digest(password));
    }

    if (this.digests.size === 0) {
      logger.warn('Static credential provider has no users - every login will be rejected', {
        hint: 'Set SESSION_USERS to comma-separated login:password pairs'
      });
    } else {
      logger.info('Static credential provider loaded', { userCount: this.digests.size });
    }
  }

  /**
   * Create a provider from SESSION_USERS
   */
  static fromEnvironment(value: string | undefined = process.env.SESSION_USERS): StaticCredentialProvider {
    return new StaticCredentialProvider(parseUserList(value));
  }

  async authenticate(credentials: Credentials): Promise<AuthenticatedIdentity | null> {
    const expected = this.digests.get(credentials.login);
    // Digest unknown logins too, so both paths do the same work
    const presented = digest(credentials.password);

    if (expected === undefined || !constantTimeEquals(expected, presented)) {
      logger.debug('Credentials rejected', { login: credentials.login });
      return null;
    }

    return { credentialId: credentials.login };
  }
}
