/**
 * Main entry point for the translation gateway
 */
import { setupSignalHandlers, startServer } from './server';
import logger from './utils/logger';

setupSignalHandlers();

startServer().catch((error: unknown) => {
  logger.error('Startup failed', { error });
  process.exit(1);
});
