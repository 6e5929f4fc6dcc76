/**
 * HTTP server exposing the session lifecycle endpoints
 */

import express, { type Express, type NextFunction, type Request, type Response } from 'express';
import { createServer, type Server as HttpServer } from 'node:http';
import helmet from 'helmet';
import cors from 'cors';
import cookieParser from 'cookie-parser';
import { logger } from '@session-service/observability';
import type { SessionManager } from '../session/index.js';
import { createSecurityValidationMiddleware } from '../middleware/security-validation.js';
import { createRequestLoggingMiddleware } from '../middleware/request-logging.js';
import { CSRF_HEADER, setupSessionRoutes } from './routes/session-routes.js';
import { setupHealthRoutes } from './routes/health-routes.js';

export interface SessionHttpServerOptions {
  port: number;
  host: string;
  /** Mount point of the session routes, e.g. `/api/v2/user` */
  basePath: string;
  cookieName: string;
  cookieSecure: boolean;
  allowedOrigins?: string[];
  /** Reported by the health endpoint */
  storeType: string;
  /** Include error messages in 500 responses (development only) */
  exposeErrorDetails?: boolean;
}

const DEFAULT_ALLOWED_ORIGINS = [
  'http://localhost:3000',
  'http://127.0.0.1:3000',
];

function clientErrorStatus(error: unknown): number | undefined {
  if (typeof error === 'object' && error !== null && 'status' in error && typeof error.status === 'number') {
    return error.status >= 400 && error.status < 500 ? error.status : undefined;
  }
  return undefined;
}

export class SessionHttpServer {
  private readonly app: Express;
  private server?: HttpServer;

  constructor(
    private readonly options: SessionHttpServerOptions,
    private readonly sessionManager: SessionManager
  ) {
    this.app = express();
    this.setupMiddleware();
    this.setupRoutes();
  }

  getApp(): Express {
    return this.app;
  }

  private setupMiddleware(): void {
    this.app.disable('x-powered-by');
    this.app.use(helmet());

    const allowedOrigins = this.options.allowedOrigins ?? DEFAULT_ALLOWED_ORIGINS;
    const corsOptions: cors.CorsOptions = {
      origin: (origin, callback) => {
        // Same-origin requests and non-browser clients carry no Origin
        if (!origin || allowedOrigins.includes(origin)) {
          callback(null, true);
          return;
        }
        logger.warn('CORS origin rejected', { origin });
        callback(null, false);
      },
      credentials: true,
      methods: ['GET', 'POST', 'DELETE', 'OPTIONS'],
      allowedHeaders: ['Content-Type', 'Accept', CSRF_HEADER],
      exposedHeaders: ['Location'],
    };
    this.app.use(cors(corsOptions));

    this.app.use(createSecurityValidationMiddleware());
    this.app.use(createRequestLoggingMiddleware());
    this.app.use(cookieParser());
    // Clients send vendor media types such as application/vnd.<vendor>.SessionInput+json
    this.app.use(express.json({ limit: '16kb', type: ['application/json', 'application/*+json'] }));
  }

  private setupRoutes(): void {
    setupHealthRoutes(this.app, this.sessionManager, { storeType: this.options.storeType });

    const sessionRouter = express.Router();
    setupSessionRoutes(sessionRouter, this.sessionManager, {
      basePath: this.options.basePath,
      cookieName: this.options.cookieName,
      cookieSecure: this.options.cookieSecure,
    });
    this.app.use(this.options.basePath || '/', sessionRouter);

    this.app.use((req: Request, res: Response) => {
      res.status(404).json({ error: 'Not Found', message: `No route for ${req.method} ${req.path}` });
    });

    // Four parameters mark this as the error handler
    this.app.use((error: unknown, req: Request, res: Response, _next: NextFunction) => {
      const status = clientErrorStatus(error);
      if (status !== undefined) {
        logger.debug('Client error', { method: req.method, path: req.path, status });
        if (!res.headersSent) {
          res.status(status).json({ error: 'Invalid Request', message: 'Malformed request' });
        }
        return;
      }

      logger.error('Express error handler caught error', {
        requestId: res.locals.requestId,
        method: req.method,
        path: req.path,
        errorName: error instanceof Error ? error.name : typeof error,
        errorMessage: error instanceof Error ? error.message : String(error),
        stack: error instanceof Error ? error.stack : undefined,
      });

      if (res.headersSent) {
        logger.warn('Headers already sent, cannot send error response', { requestId: res.locals.requestId });
        return;
      }

      const message = this.options.exposeErrorDetails && error instanceof Error ? error.message : 'Something went wrong';
      res.status(500).json({
        error: 'Internal server error',
        message,
        timestamp: new Date().toISOString(),
      });
    });
  }

  async start(): Promise<void> {
    return new Promise((resolve, reject) => {
      if (!this.options.cookieSecure) {
        logger.warn('Session cookies are issued without the Secure attribute');
      }

      this.server = createServer(this.app);

      this.server.on('error', (error: Error) => {
        logger.error('HTTP server error', error);
        reject(error);
      });

      this.server.listen(this.options.port, this.options.host, () => {
        logger.info('Session HTTP server listening', {
          host: this.options.host,
          port: this.options.port,
          basePath: this.options.basePath,
        });
        resolve();
      });
    });
  }

  /**
   * Stop accepting connections and release the session store
   */
  async stop(): Promise<void> {
    const server = this.server;
    if (server) {
      await new Promise<void>((resolve, reject) => {
        server.close((error?: Error) => {
          if (error) {
            reject(error);
            return;
          }
          resolve();
        });
        server.closeIdleConnections();
      });
      this.server = undefined;
      logger.info('Session HTTP server stopped');
    }

    await this.sessionManager.destroy();
  }
}
