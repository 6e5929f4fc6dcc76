/**
 * Health Routes
 *
 * Provides server health monitoring
 */

import type { Request, Response, Router } from 'express';
import type { SessionManager } from '../../session/index.js';
import { buildHealthResponse } from '../responses/health-response.js';

export interface HealthRoutesOptions {
  storeType: string;
}

/**
 * Setup health routes
 *
 * @param router - Express router to attach routes to
 * @param manager - Source of the live session count
 */
export function setupHealthRoutes(router: Router, manager: SessionManager, options: HealthRoutesOptions): void {
  router.get('/health', async (_req: Request, res: Response) => {
    const activeSessions = await manager.stats();
    res.json(buildHealthResponse({ activeSessions, storeType: options.storeType }));
  });
}
