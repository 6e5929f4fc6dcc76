/**
 * Storage/persistence configuration schema
 * Backend selection for the session store
 */

import { z } from 'zod';

/**
 * Storage configuration schema
 */
export const StorageConfigSchema = z.object({
  // Redis connection
  REDIS_URL: z.string().url().optional(),

  // Redis key prefix for multi-app isolation
  // Example: 'cms-main:' to run several deployments against one Redis instance
  REDIS_KEY_PREFIX: z.string().optional().default(''),

  // Explicit store selection (optional - auto-detect if not set)
  SESSION_STORE_TYPE: z.enum(['memory', 'redis']).optional(),
});

export type StorageConfig = z.infer<typeof StorageConfigSchema>;
