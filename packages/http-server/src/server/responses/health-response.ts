/**
 * Health check response builder
 */

export interface HealthResponseOptions {
  activeSessions: number;
  storeType: string;
}

export interface HealthResponse {
  status: string;
  timestamp: string;
  version: string;
  node_version: string;
  environment: string;
  performance: {
    uptime_seconds: number;
    memory_usage: NodeJS.MemoryUsage;
  };
  sessions: {
    active: number;
    store: string;
  };
}

export function buildHealthResponse(options: HealthResponseOptions): HealthResponse {
  return {
    status: 'healthy',
    timestamp: new Date().toISOString(),
    version: process.env.npm_package_version || '1.0.0',
    node_version: process.version,
    environment: process.env.NODE_ENV || 'development',
    performance: {
      uptime_seconds: process.uptime(),
      memory_usage: process.memoryUsage(),
    },
    sessions: {
      active: options.activeSessions,
      store: options.storeType,
    },
  };
}
