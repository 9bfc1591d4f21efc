import { Router, Request, Response } from 'express';
import { AppConfig } from '../config';
import { AdmissionPipeline } from '../core/admission-pipeline';
import { getMetrics, getMetricsContentType } from '../metrics/metrics';
import { TranslationService } from '../types';
import { asyncHandler } from '../utils/async-handler';
import logger from '../utils/logger';
import { sendOutcome } from '../utils/outcome-response';

export interface HealthRouteDependencies {
  pipeline: AdmissionPipeline;
  translator: TranslationService;
  config: AppConfig;
}

export function createHealthRoutes({ pipeline, translator, config }: HealthRouteDependencies): Router {
  const router = Router();

  /**
   * Health check endpoint
   * GET /health
   * Installed language pairs and gate configuration; admitted like any request
   */
  router.get(
    '/health',
    asyncHandler(async (_req: Request, res: Response) => {
      const outcome = await pipeline.handle(async () => {
        const effective = config.toEffectiveConfig();
        return {
          body: {
            status: 'ok',
            installedPackages: translator.installedPackages(),
            serviceInfo: {
              rateLimit: effective.rate_limit,
              throttling: effective.throttling,
              formats: effective.formats,
            },
          },
        };
      });

      sendOutcome(res, outcome);
    })
  );

  /**
   * Metrics endpoint (Prometheus format)
   * GET /metrics
   */
  router.get(
    '/metrics',
    asyncHandler(async (_req: Request, res: Response) => {
      try {
        const metrics = await getMetrics();
        res.set('Content-Type', getMetricsContentType());
        res.send(metrics);
      } catch (error) {
        logger.error('Failed to get metrics', { error });
        res.status(500).json({ error: 'Failed to retrieve metrics' });
      }
    })
  );

  /**
   * Liveness probe
   * GET /live
   */
  router.get('/live', (_req: Request, res: Response) => {
    res.status(200).json({ status: 'alive' });
  });

  return router;
}
