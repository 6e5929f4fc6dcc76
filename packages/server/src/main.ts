#!/usr/bin/env node

import { EnvironmentConfig } from '@session-service/config';
import { logger } from '@session-service/observability';
import { configureLogging, createSessionService } from './setup.js';

async function main(): Promise<void> {
  configureLogging();

  try {
    const config = EnvironmentConfig.get();
    logger.info('Starting session service', { environment: config.NODE_ENV });
    EnvironmentConfig.logConfiguration();

    const { server } = createSessionService();
    await server.start();

    let shuttingDown = false;
    const handleShutdown = async (signal: string): Promise<void> => {
      if (shuttingDown) {
        return;
      }
      shuttingDown = true;
      logger.info('Received shutdown signal, shutting down gracefully', { signal });
      try {
        await server.stop();
        logger.info('Server stopped successfully');
        process.exit(0);
      } catch (error) {
        logger.error('Error during shutdown', error);
        process.exit(1);
      }
    };

    process.on('SIGINT', () => void handleShutdown('SIGINT'));
    process.on('SIGTERM', () => void handleShutdown('SIGTERM'));
  } catch (error) {
    logger.error('Server startup failed', error);
    process.exit(1);
  }
}

main().catch((error: unknown) => {
  logger.error('Unhandled server error', error);
  process.exit(1);
});
