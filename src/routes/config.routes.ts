import { Router, Request, Response } from 'express';
import { AppConfig } from '../config';
import { AdmissionPipeline } from '../core/admission-pipeline';
import { asyncHandler } from '../utils/async-handler';
import { sendOutcome } from '../utils/outcome-response';

export function createConfigRoutes(pipeline: AdmissionPipeline, config: AppConfig): Router {
  const router = Router();

  /**
   * Effective configuration
   * GET /config
   */
  router.get(
    '/config',
    asyncHandler(async (_req: Request, res: Response) => {
      const outcome = await pipeline.handle(async () => ({ body: config.toEffectiveConfig() }));
      sendOutcome(res, outcome);
    })
  );

  return router;
}
