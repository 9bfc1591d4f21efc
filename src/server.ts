// Load environment variables FIRST - before any other imports
import dotenv from 'dotenv';
dotenv.config();

import * as http from 'http';
import { createApp } from './app';
import { appConfig } from './config';
import { createServices, createTranslationEngine } from './services';
import logger from './utils/logger';

const PORT = appConfig.port;

let server: http.Server | null = null;

/**
 * Start the HTTP server
 */
export async function startServer(): Promise<void> {
  try {
    logger.info('Installing translation packages...');

    const engine = createTranslationEngine(appConfig);
    await engine.installConfiguredPackages(appConfig.translationConfig.availablePackages);

    const services = createServices(appConfig, { translator: engine });
    const app = createApp(services);

    server = app.listen(PORT, '0.0.0.0', () => {
      logger.info('Translation gateway started', {
        port: PORT,
        node_env: appConfig.nodeEnv,
        rate_limit: appConfig.rateLimitConfig.enabled,
        throttling: appConfig.throttlingConfig.enabled,
      });
    });
  } catch (error) {
    logger.error('Failed to start server', { error });
    process.exit(1);
  }
}

/**
 * Gracefully shutdown the server
 */
export async function shutdownServer(): Promise<void> {
  logger.info('Shutting down gracefully...');

  const closing = server;
  server = null;

  try {
    // Stop accepting new connections; in-flight requests finish first
    if (closing) {
      await new Promise<void>((resolve, reject) => {
        closing.close((error) => (error ? reject(error) : resolve()));
      });
      logger.info('HTTP server closed');
    }

    if (appConfig.nodeEnv !== 'test') {
      process.exit(0);
    }
  } catch (error) {
    logger.error('Error during shutdown', { error });

    if (appConfig.nodeEnv !== 'test') {
      process.exit(1);
    } else {
      throw error;
    }
  }
}

/**
 * Setup signal handlers for graceful shutdown
 */
export function setupSignalHandlers(): void {
  // SIGTERM: Kubernetes/Docker graceful shutdown
  process.on('SIGTERM', () => {
    logger.info('SIGTERM signal received');
    void shutdownServer();
  });

  // SIGINT: Ctrl+C in terminal
  process.on('SIGINT', () => {
    logger.info('SIGINT signal received');
    void shutdownServer();
  });

  process.on('uncaughtException', (error) => {
    logger.error('Uncaught exception', {
      error: error.message,
      stack: error.stack,
    });
    void shutdownServer();
  });

  process.on('unhandledRejection', (reason) => {
    logger.error('Unhandled rejection', { reason });
    void shutdownServer();
  });
}
