import { loadConfig } from './config';
import { errorMessage } from './errors';
import { createHandler } from './index';
import { ApiService } from './services/ApiService';
import { HealthCheckService } from './services/HealthCheckService';
import logger from './utils/logger';

process.on('uncaughtException', (error) => {
  logger.error('Uncaught Exception:', error);
  process.exit(1);
});

process.on('unhandledRejection', (reason, promise) => {
  logger.error('Unhandled Rejection at:', { promise, reason });
  process.exit(1);
});

let apiService: ApiService | null = null;

async function shutdown(signal: string): Promise<void> {
  logger.info(`Received ${signal}, shutting down gracefully...`);
  if (apiService) {
    await apiService.stop();
  }
  process.exit(0);
}

process.on('SIGTERM', () => {
  shutdown('SIGTERM').catch((error) => {
    logger.error(`Shutdown failed: ${errorMessage(error)}`);
    process.exit(1);
  });
});

process.on('SIGINT', () => {
  shutdown('SIGINT').catch((error) => {
    logger.error(`Shutdown failed: ${errorMessage(error)}`);
    process.exit(1);
  });
});

async function main(): Promise<void> {
  logger.info('Starting model deployment API...');

  // fail fast on bad settings; each invocation reloads them
  const config = loadConfig();

  logger.info('Configuration:', {
    awsRegion: config.region,
    environment: config.environment,
    namePrefix: config.namePrefix,
    evaluationQueue: config.evaluationQueueName,
    logLevel: process.env.LOG_LEVEL || 'info'
  });

  apiService = new ApiService(createHandler(), new HealthCheckService(), config.port);
  await apiService.start();
}

main().catch((error) => {
  logger.error(`Failed to start model deployment API: ${errorMessage(error)}`, { error });
  process.exit(1);
});
