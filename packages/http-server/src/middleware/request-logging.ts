/**
 * Debug-level request logging with a per-request id
 */

import { randomBytes } from 'node:crypto';
import type { Request, Response, NextFunction, RequestHandler } from 'express';
import { logger } from '@session-service/observability';

export function createRequestLoggingMiddleware(): RequestHandler {
  return (req: Request, res: Response, next: NextFunction): void => {
    const requestId = randomBytes(6).toString('hex');
    const startTime = Date.now();
    res.locals.requestId = requestId;

    logger.debug('Incoming request', {
      requestId,
      method: req.method,
      path: req.path,
      client: req.ip,
      userAgent: req.headers['user-agent'] || 'unknown',
      contentType: req.headers['content-type'] || 'none',
      csrfHeader: req.headers['x-csrf-token'] ? 'present' : 'absent',
    });

    res.on('finish', () => {
      logger.debug('Request completed', {
        requestId,
        statusCode: res.statusCode,
        duration: Date.now() - startTime,
      });
    });

    next();
  };
}
