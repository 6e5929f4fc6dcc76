/**
 * Security validation middleware
 *
 * Rejects requests with oversized paths or query strings and paths carrying
 * traversal or injection patterns before they reach routing.
 */

import type { Request, Response, NextFunction, RequestHandler } from 'express';
import { logger } from '@session-service/observability';

export interface SecurityValidationOptions {
  maxPathLength?: number;
  maxQueryLength?: number;
}

export const DEFAULT_MAX_PATH_LENGTH = 2048;
export const DEFAULT_MAX_QUERY_LENGTH = 8192;

const SUSPICIOUS_PATTERNS: Record<string, RegExp> = {
  repeatedSlashes: /\/{3,}/,
  repeatedDots: /\.{3,}/,
  nullBytes: /\0/,
  encodedTraversal: /%2e%2e|%252e|%c0%ae/i,
};

/**
 * @example
 * ```typescript
 * app.use(createSecurityValidationMiddleware({ maxPathLength: 1024 }));
 * ```
 */
export function createSecurityValidationMiddleware(options: SecurityValidationOptions = {}): RequestHandler {
  const maxPathLength = options.maxPathLength ?? DEFAULT_MAX_PATH_LENGTH;
  const maxQueryLength = options.maxQueryLength ?? DEFAULT_MAX_QUERY_LENGTH;

  return (req: Request, res: Response, next: NextFunction): void => {
    if (req.path.length > maxPathLength) {
      logger.warn('Rejected request with oversized path', { method: req.method, length: req.path.length });
      res.status(414).json({
        error: 'URI Too Long',
        message: `Path length exceeds maximum allowed (${maxPathLength} characters)`,
      });
      return;
    }

    const queryIndex = req.originalUrl.indexOf('?');
    const queryString = queryIndex === -1 ? '' : req.originalUrl.substring(queryIndex + 1);
    if (queryString.length > maxQueryLength) {
      logger.warn('Rejected request with oversized query string', { method: req.method, length: queryString.length });
      res.status(414).json({
        error: 'URI Too Long',
        message: `Query string length exceeds maximum allowed (${maxQueryLength} characters)`,
      });
      return;
    }

    for (const [patternName, pattern] of Object.entries(SUSPICIOUS_PATTERNS)) {
      if (pattern.test(req.path) || pattern.test(queryString)) {
        logger.warn('Rejected request with suspicious pattern', { method: req.method, pattern: patternName });
        res.status(400).json({
          error: 'Invalid Request',
          message: `Request contains suspicious pattern: ${patternName}`,
        });
        return;
      }
    }

    next();
  };
}
