/**
 * Environment configuration for the session service
 * Combines all configuration schemas
 */

import { z } from 'zod';
import { BaseConfigSchema } from './base-config.js';
import { SessionConfigSchema, SessionSecretsSchema } from './session-config.js';
import { StorageConfigSchema } from './storage-config.js';

/**
 * Non-secret configuration schema (safe to log)
 */
export const ConfigurationSchema = BaseConfigSchema
  .merge(SessionConfigSchema)
  .merge(StorageConfigSchema);

/**
 * Secret configuration schema (never log)
 */
export const SecretsSchema = SessionSecretsSchema;

/**
 * Combined environment schema
 */
export const EnvironmentSchema = ConfigurationSchema.merge(SecretsSchema);

export type Configuration = z.infer<typeof ConfigurationSchema>;
export type Secrets = z.infer<typeof SecretsSchema>;
export type Environment = z.infer<typeof EnvironmentSchema>;

/**
 * Configuration status interface
 */
export interface ConfigurationStatus {
  configuration: Configuration;
  secrets: {
    configured: string[];
    missing: string[];
    total: number;
  };
}

/**
 * Logger interface for optional logging
 */
export interface ConfigLogger {
  debug(message: string, data?: unknown): void;
  info(message: string, data?: unknown): void;
  warn(message: string, data?: unknown): void;
  error(message: string, error?: unknown): void;
}

export interface SecurityConfig {
  requireHttps: boolean;
  allowedOrigins?: string[];
}

export interface ServerConfig {
  port: number;
  host: string;
}

export interface SessionSettings {
  basePath: string;
  cookieName: string;
  cookieSecure: boolean;
  ttlSeconds: number;
}

function parseBoolean(value: string | undefined): boolean | undefined {
  return value === undefined ? undefined : value === 'true';
}

function parseInteger(value: string | undefined): number | undefined {
  return value === undefined || value === '' ? undefined : Number.parseInt(value, 10);
}

/**
 * Environment configuration manager
 */
export class EnvironmentConfig {
  private static _instance: Environment | null = null;
  private static _configStatus: ConfigurationStatus | null = null;
  private static _logger: ConfigLogger | null = null;

  /**
   * Set optional logger for configuration messages
   */
  static setLogger(logger: ConfigLogger): void {
    this._logger = logger;
  }

  /**
   * Load and validate environment configuration
   */
  static load(): Environment {
    if (this._instance) {
      return this._instance;
    }

    // Unset variables stay undefined so that schema defaults apply
    const env = {
      // Base configuration
      HTTP_PORT: parseInteger(process.env.HTTP_PORT),
      HTTP_HOST: process.env.HTTP_HOST,
      REQUIRE_HTTPS: parseBoolean(process.env.REQUIRE_HTTPS),
      ALLOWED_ORIGINS: process.env.ALLOWED_ORIGINS,
      NODE_ENV: process.env.NODE_ENV,

      // Session configuration
      API_BASE_PATH: process.env.API_BASE_PATH,
      SESSION_COOKIE_NAME: process.env.SESSION_COOKIE_NAME,
      SESSION_COOKIE_SECURE: parseBoolean(process.env.SESSION_COOKIE_SECURE),
      SESSION_TTL_SECONDS: parseInteger(process.env.SESSION_TTL_SECONDS),

      // Storage configuration
      REDIS_URL: process.env.REDIS_URL,
      REDIS_KEY_PREFIX: process.env.REDIS_KEY_PREFIX,
      SESSION_STORE_TYPE: process.env.SESSION_STORE_TYPE,

      // Secrets
      SESSION_USERS: process.env.SESSION_USERS,
    };

    try {
      this._instance = EnvironmentSchema.parse(env);
      this._configStatus = this.analyzeConfiguration(env);
      return this._instance;
    } catch (error) {
      if (this._logger) {
        this._logger.error('Environment configuration validation failed', error);
      }
      throw new Error('Invalid environment configuration');
    }
  }

  /**
   * Analyze configuration and separate secrets
   */
  private static analyzeConfiguration(env: Record<string, unknown>): ConfigurationStatus {
    const configuration = ConfigurationSchema.parse(env);

    const secretKeys = Object.keys(SecretsSchema.shape);
    const configured: string[] = [];
    const missing: string[] = [];

    for (const key of secretKeys) {
      if (env[key]) {
        configured.push(key);
      } else {
        missing.push(key);
      }
    }

    return {
      configuration,
      secrets: {
        configured,
        missing,
        total: secretKeys.length
      }
    };
  }

  /**
   * Get current environment configuration
   */
  static get(): Environment {
    return this.load();
  }

  /**
   * Get configuration status
   */
  static getConfigurationStatus(): ConfigurationStatus {
    if (!this._configStatus) {
      this.load();
    }
    if (!this._configStatus) {
      throw new Error('Configuration status not initialized after load()');
    }
    return this._configStatus;
  }

  /**
   * Log configuration status (requires logger to be set)
   */
  static logConfiguration(): void {
    if (!this._logger) {
      return;
    }

    const status = this.getConfigurationStatus();

    this._logger.info('Configuration loaded', { configuration: status.configuration });

    this._logger.info('Secrets Status', {
      totalSecrets: status.secrets.total,
      configuredCount: status.secrets.configured.length,
      configured: status.secrets.configured.join(', ') || 'none',
      missingCount: status.secrets.missing.length,
      missing: status.secrets.missing.join(', ') || 'none'
    });

    if (!status.secrets.configured.includes('SESSION_USERS')) {
      this._logger.warn('SESSION_USERS not configured: the static credential provider rejects every login');
    }
  }

  /**
   * Reset configuration (useful for testing)
   */
  static reset(): void {
    this._instance = null;
    this._configStatus = null;
  }

  /**
   * Check if running in production
   */
  static isProduction(): boolean {
    return this.get().NODE_ENV === 'production';
  }

  /**
   * Check if running in development
   */
  static isDevelopment(): boolean {
    return this.get().NODE_ENV === 'development';
  }

  /**
   * Get security configuration
   */
  static getSecurityConfig(): SecurityConfig {
    const env = this.get();

    return {
      requireHttps: env.REQUIRE_HTTPS || this.isProduction(),
      allowedOrigins: env.ALLOWED_ORIGINS ? env.ALLOWED_ORIGINS.split(',').map(origin => origin.trim()) : undefined,
    };
  }

  /**
   * Get server configuration
   */
  static getServerConfig(): ServerConfig {
    const env = this.get();

    return {
      port: env.HTTP_PORT,
      host: env.HTTP_HOST,
    };
  }

  /**
   * Get session cookie and lifetime settings
   */
  static getSessionSettings(): SessionSettings {
    const env = this.get();

    return {
      basePath: env.API_BASE_PATH,
      cookieName: env.SESSION_COOKIE_NAME,
      // Secure cookies follow HTTPS enforcement unless set explicitly
      cookieSecure: env.SESSION_COOKIE_SECURE || this.getSecurityConfig().requireHttps,
      ttlSeconds: env.SESSION_TTL_SECONDS,
    };
  }
}
