/**
 * Observability configuration with environment detection
 */

export interface ObservabilityConfig {
  environment: 'development' | 'production' | 'test';
  level: 'debug' | 'info' | 'warn' | 'error' | 'silent';
  exporters: {
    console: boolean;
  };
  service: {
    name: string;
    version: string;
    namespace?: string;
  };
}

/**
 * Detect deployment environment
 */
export function detectEnvironment(): 'development' | 'production' | 'test' {
  if (process.env.NODE_ENV === 'test') {
    return 'test';
  }
  if (process.env.NODE_ENV === 'production') {
    return 'production';
  }
  return 'development';
}

/**
 * Get observability configuration based on environment
 */
export function getObservabilityConfig(): ObservabilityConfig {
  const environment = detectEnvironment();

  const config: ObservabilityConfig = {
    environment,
    level: environment === 'development' ? 'debug' : 'info',
    service: {
      name: 'session-service',
      version: process.env.npm_package_version ?? '1.0.0',
      namespace: environment === 'production' ? 'prod' : 'dev'
    },
    exporters: {
      console: environment === 'development'
    }
  };

  switch (environment) {
    case 'production':
      config.exporters.console = false;
      break;

    case 'test':
      config.level = 'silent';
      config.exporters.console = false;
      break;

    default:
      break;
  }

  const override = process.env.LOG_LEVEL;
  if (override === 'debug' || override === 'info' || override === 'warn' || override === 'error' || override === 'silent') {
    config.level = override;
  }

  return config;
}
