import cors from 'cors';
import express from 'express';
import 'express-async-errors';
import { errorHandler } from './middleware/error-handler';
import { requestLogger } from './middleware/request-logger';
import { createRoutes } from './routes';
import { AppServices } from './services';

/**
 * Create and configure Express application
 */
export function createApp(services: AppServices): express.Application {
  const app = express();

  // Browser clients call the gateway from other origins
  app.use(cors());

  // Body parsing middleware
  app.use(express.json());
  app.use(express.urlencoded({ extended: true }));

  // Request logging
  app.use(requestLogger);

  // Mount all routes
  app.use('/', createRoutes(services));

  // Global error handler (must be last)
  app.use(errorHandler);

  return app;
}
