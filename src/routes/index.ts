import { Router, Request, Response } from 'express';
import { AppServices } from '../services';
import { createConfigRoutes } from './config.routes';
import { createHealthRoutes } from './health.routes';
import { createTranslateRoutes } from './translate.routes';

export function createRoutes(services: AppServices): Router {
  const router = Router();

  /**
   * Health and monitoring routes (/health is admitted, /metrics and /live are not)
   */
  router.use('/', createHealthRoutes(services));

  /**
   * Configuration
   */
  router.use('/', createConfigRoutes(services.pipeline, services.config));

  /**
   * Translation
   */
  router.use('/', createTranslateRoutes(services.pipeline));

  /**
   * Catch-all route for 404
   */
  router.use('*', (_req: Request, res: Response) => {
    res.status(404).json({
      error: 'Not Found',
      message: 'The requested endpoint does not exist',
    });
  });

  return router;
}
