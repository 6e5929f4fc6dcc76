/**
 * Persisted session types
 */

/**
 * Server-side record of one authenticated login
 *
 * Timestamps are epoch milliseconds.
 */
export interface SessionRecord {
  identifier: string;
  name: string;
  csrfToken: string;
  ownerCredentialId: string;
  createdAt: number;
  lastRefreshedAt: number;
  expiresAt: number;
}

/**
 * Check that a deserialized value carries every SessionRecord field
 */
export function isSessionRecord(value: unknown): value is SessionRecord {
  if (typeof value !== 'object' || value === null) {
    return false;
  }

  const candidate: Record<string, unknown> = { ...value };
  return (
    typeof candidate.identifier === 'string' &&
    typeof candidate.name === 'string' &&
    typeof candidate.csrfToken === 'string' &&
    typeof candidate.ownerCredentialId === 'string' &&
    typeof candidate.createdAt === 'number' &&
    typeof candidate.lastRefreshedAt === 'number' &&
    typeof candidate.expiresAt === 'number'
  );
}
