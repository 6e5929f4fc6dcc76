/**
 * Base configuration schema
 * Core settings for HTTP and security
 */

import { z } from 'zod';

/**
 * Base configuration schema (non-secret settings)
 */
export const BaseConfigSchema = z.object({
  // HTTP server configuration
  HTTP_PORT: z.number().int().min(1).max(65535).default(3000),
  HTTP_HOST: z.string().default('localhost'),

  // Security configuration (non-secret)
  REQUIRE_HTTPS: z.boolean().default(false),
  ALLOWED_ORIGINS: z.string().optional(),

  // Environment
  NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),
});

export type BaseConfig = z.infer<typeof BaseConfigSchema>;
