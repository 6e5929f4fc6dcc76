/**
 * Session configuration schema
 * Cookie naming, lifetime and route placement of the session API
 */

import { z } from 'zod';

export const DEFAULT_SESSION_COOKIE_NAME = 'SESSID';

/**
 * Session configuration schema (non-secret settings)
 */
export const SessionConfigSchema = z.object({
  // Prefix under which the /sessions routes are mounted
  API_BASE_PATH: z
    .string()
    .regex(/^(\/[A-Za-z0-9._~-]+)*$/, 'must be empty or a path without a trailing slash')
    .default('/api/v2/user'),

  // RFC 6265 token characters only
  SESSION_COOKIE_NAME: z
    .string()
    .regex(/^[!#$%&'*+\-.^_`|~0-9A-Za-z]+$/, 'must be a valid cookie name')
    .default(DEFAULT_SESSION_COOKIE_NAME),

  SESSION_COOKIE_SECURE: z.boolean().default(false),

  // Sliding lifetime; every refresh extends it
  SESSION_TTL_SECONDS: z.number().int().min(1).default(1440),
});

export type SessionConfig = z.infer<typeof SessionConfigSchema>;

/**
 * Credentials of the built-in static credential provider (secret)
 */
export const SessionSecretsSchema = z.object({
  SESSION_USERS: z.string().optional(),
});

export type SessionSecrets = z.infer<typeof SessionSecretsSchema>;
