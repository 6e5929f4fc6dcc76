/**
 * Logger interface for persistence package
 *
 * Allows optional logging injection from the consuming application.
 * If no logger is provided, operations are silent (no-op).
 */

export interface PersistenceLogger {
  info(_message: string, _meta?: Record<string, unknown>): void;
  warn(_message: string, _meta?: Record<string, unknown>): void;
  error(_message: string, _meta?: Record<string, unknown>): void;
  debug(_message: string, _meta?: Record<string, unknown>): void;
}

class NoOpLogger implements PersistenceLogger {
  info(_message: string, _meta?: Record<string, unknown>): void {
    // No-op
  }

  warn(_message: string, _meta?: Record<string, unknown>): void {
    // No-op
  }

  error(_message: string, _meta?: Record<string, unknown>): void {
    // No-op
  }

  debug(_message: string, _meta?: Record<string, unknown>): void {
    // No-op
  }
}

let loggerInstance: PersistenceLogger = new NoOpLogger();

/**
 * Set the logger implementation
 */
export function setLogger(logger: PersistenceLogger): void {
  loggerInstance = logger;
}

/**
 * Get the current logger instance
 */
export function getLogger(): PersistenceLogger {
  return loggerInstance;
}

/**
 * Delegates to whichever logger is current at call time
 */
export const logger: PersistenceLogger = {
  info: (message: string, meta?: Record<string, unknown>) => loggerInstance.info(message, meta),
  warn: (message: string, meta?: Record<string, unknown>) => loggerInstance.warn(message, meta),
  error: (message: string, meta?: Record<string, unknown>) => loggerInstance.error(message, meta),
  debug: (message: string, meta?: Record<string, unknown>) => loggerInstance.debug(message, meta),
};

/**
 * Shorten an opaque identifier for log output
 */
export function preview(value: string): string {
  return value.substring(0, 8) + '...';
}
