/**
 * Wires configuration, storage, credentials and HTTP surface together
 */

import { EnvironmentConfig } from '@session-service/config';
import { StaticCredentialProvider, type CredentialProvider } from '@session-service/auth';
import { SessionStoreFactory, setLogger as setPersistenceLogger, type SessionRecordStore } from '@session-service/persistence';
import { SessionHttpServer, SessionManager } from '@session-service/http-server';
import { logger } from '@session-service/observability';

export interface SessionServiceOptions {
  /** Replaces the SESSION_USERS provider */
  credentialProvider?: CredentialProvider;
  /** Replaces the store chosen from SESSION_STORE_TYPE / REDIS_URL */
  store?: SessionRecordStore;
}

export interface SessionService {
  server: SessionHttpServer;
  manager: SessionManager;
  storeType: string;
}

/**
 * Route package loggers through the structured logger
 */
export function configureLogging(): void {
  setPersistenceLogger(logger);
  EnvironmentConfig.setLogger(logger);
}

export function createSessionService(options: SessionServiceOptions = {}): SessionService {
  const env = EnvironmentConfig.get();
  const settings = EnvironmentConfig.getSessionSettings();
  const security = EnvironmentConfig.getSecurityConfig();
  const serverConfig = EnvironmentConfig.getServerConfig();

  let store = options.store;
  let storeType = 'custom';
  if (!store) {
    const validation = SessionStoreFactory.validateEnvironment(env.SESSION_STORE_TYPE ?? 'auto', env.REDIS_URL);
    if (!validation.valid) {
      throw new Error(`Session store misconfigured: ${validation.warnings.join(', ')}`);
    }
    for (const warning of validation.warnings) {
      logger.warn(warning);
    }
    store = SessionStoreFactory.create({
      type: validation.storeType,
      redisUrl: env.REDIS_URL,
      keyPrefix: env.REDIS_KEY_PREFIX,
    });
    storeType = validation.storeType;
  }

  const manager = new SessionManager({
    store,
    credentialProvider: options.credentialProvider ?? StaticCredentialProvider.fromEnvironment(env.SESSION_USERS),
    cookieName: settings.cookieName,
    basePath: settings.basePath,
    ttlSeconds: settings.ttlSeconds,
  });

  const server = new SessionHttpServer(
    {
      port: serverConfig.port,
      host: serverConfig.host,
      basePath: settings.basePath,
      cookieName: settings.cookieName,
      cookieSecure: settings.cookieSecure,
      allowedOrigins: security.allowedOrigins,
      storeType,
      exposeErrorDetails: EnvironmentConfig.isDevelopment(),
    },
    manager
  );

  return { server, manager, storeType };
}
