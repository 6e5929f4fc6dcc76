/**
 * Structured logging with Pino, enriched with OpenTelemetry trace context
 */

import pino from 'pino';
import { trace } from '@opentelemetry/api';
import { getObservabilityConfig, type ObservabilityConfig } from './config.js';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

const SENSITIVE_KEYS = ['password', 'secret', 'token', 'csrf', 'cookie', 'credential', 'auth'];

/**
 * Application logger backed by Pino
 */
export class ObservabilityLogger {
  private pino: pino.Logger;
  private config: ObservabilityConfig;
  private isProduction: boolean;
  private hasTransports: boolean;

  /**
   * @param destination - explicit output stream; bypasses transports and the test-mode silencing
   */
  constructor(config?: ObservabilityConfig, destination?: pino.DestinationStream) {
    this.config = config ?? getObservabilityConfig();
    this.isProduction = this.config.environment === 'production';
    this.hasTransports = false;

    this.pino = destination ? this.createFormattedLogger(destination) : this.createPinoLogger();
  }

  private createPinoLogger(): pino.Logger {
    // Silence test runs unless a test opts in with an explicit destination
    if (this.config.environment === 'test') {
      return pino({ level: 'silent' });
    }

    if (this.config.exporters.console) {
      this.hasTransports = true;
      // Transports run in a worker thread and cannot take custom formatters
      return pino({
        level: this.config.level,
        transport: {
          target: 'pino-pretty',
          options: {
            colorize: true,
            translateTime: 'HH:MM:ss',
            ignore: 'pid,hostname',
            destination: 2
          }
        }
      });
    }

    return this.createFormattedLogger();
  }

  private createFormattedLogger(destination?: pino.DestinationStream): pino.Logger {
    const options: pino.LoggerOptions = {
      level: this.config.level,
      base: {
        service: this.config.service.name,
        version: this.config.service.version,
        namespace: this.config.service.namespace
      },
      formatters: {
        level: (label) => ({ level: label }),
        log: (object) => this.addTraceContext(object)
      }
    };

    return destination ? pino(options, destination) : pino(options);
  }

  /**
   * Add OpenTelemetry trace context to log entries
   */
  private addTraceContext(logObject: Record<string, unknown>): Record<string, unknown> {
    const span = trace.getActiveSpan();
    if (span) {
      const spanContext = span.spanContext();
      return {
        ...logObject,
        trace_id: spanContext.traceId,
        span_id: spanContext.spanId,
        trace_flags: spanContext.traceFlags
      };
    }
    return logObject;
  }

  /**
   * Sanitize sensitive information for production
   */
  private sanitizeForProduction(message: string, data?: unknown): { message: string; data?: unknown } {
    if (!this.isProduction) {
      return { message, data };
    }

    const sanitizedMessage = this.sanitizeMessage(message);

    let sanitizedData = data;
    if (data && typeof data === 'object') {
      sanitizedData = this.sanitizeObject(data);
    }

    return { message: sanitizedMessage, data: sanitizedData };
  }

  private sanitizeMessage(message: string): string {
    return message
      .replace(/\b[A-Za-z0-9._%+-]+@[A-Za-z0-9.-]+\.[A-Z|a-z]{2,}\b/g, '[EMAIL]')
      .replace(/Bearer\s+[A-Za-z0-9\-._~+/]+=*/g, 'Bearer [TOKEN]')
      .replace(/[A-Za-z0-9\-._~+/]{32,}/g, '[TOKEN]');
  }

  private sanitizeObject(obj: unknown, visited: WeakSet<object> = new WeakSet()): unknown {
    if (typeof obj !== 'object' || obj === null) {
      return obj;
    }

    if (visited.has(obj)) {
      return '[Circular Reference]';
    }
    visited.add(obj);

    if (Array.isArray(obj)) {
      return obj.map(item => this.sanitizeObject(item, visited));
    }

    if (obj instanceof Error) {
      return { name: obj.name, message: this.sanitizeMessage(obj.message) };
    }

    const sanitized: Record<string, unknown> = {};
    for (const [key, value] of Object.entries(obj)) {
      const lowerKey = key.toLowerCase();

      if (SENSITIVE_KEYS.some(sensitiveKey => lowerKey.includes(sensitiveKey))) {
        sanitized[key] = '[REDACTED]';
      } else if (typeof value === 'object' && value !== null) {
        sanitized[key] = this.sanitizeObject(value, visited);
      } else {
        sanitized[key] = value;
      }
    }

    return sanitized;
  }

  private toLogObject(data: unknown): Record<string, unknown> {
    const object: Record<string, unknown> =
      data && typeof data === 'object' && !Array.isArray(data) ? { ...data } : data === undefined ? {} : { data };

    // Error fields are not enumerable and would serialize as {}
    for (const [key, value] of Object.entries(object)) {
      if (value instanceof Error) {
        object[key] = { name: value.name, message: value.message, stack: value.stack };
      }
    }

    // Formatters are unavailable with transports, so trace context goes in here
    return this.hasTransports ? this.addTraceContext(object) : object;
  }

  debug(message: string, data?: unknown): void {
    const sanitized = this.sanitizeForProduction(message, data);
    this.pino.debug(this.toLogObject(sanitized.data), sanitized.message);
  }

  info(message: string, data?: unknown): void {
    const sanitized = this.sanitizeForProduction(message, data);
    this.pino.info(this.toLogObject(sanitized.data), sanitized.message);
  }

  warn(message: string, data?: unknown): void {
    const sanitized = this.sanitizeForProduction(message, data);
    this.pino.warn(this.toLogObject(sanitized.data), sanitized.message);
  }

  error(message: string, error?: unknown): void {
    const { message: sanitizedMessage } = this.sanitizeForProduction(message);

    if (error instanceof Error) {
      const errorInfo = this.isProduction
        ? { name: error.name, message: 'Internal server error' }
        : { name: error.name, message: error.message, stack: error.stack };
      this.pino.error(this.toLogObject(errorInfo), sanitizedMessage);
    } else {
      const { data: sanitizedError } = this.sanitizeForProduction('', error);
      this.pino.error(this.toLogObject(sanitizedError), sanitizedMessage);
    }
  }
}

let loggerInstance: ObservabilityLogger | null = null;

export function getLogger(): ObservabilityLogger {
  if (!loggerInstance) {
    loggerInstance = new ObservabilityLogger();
  }
  return loggerInstance;
}

export const logger = getLogger();

/**
 * Shorten an opaque identifier for log output
 */
export function redactIdentifier(value: string): string {
  return value.length > 8 ? `${value.substring(0, 8)}...` : value;
}
