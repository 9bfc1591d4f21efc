import { Router, Request, Response } from 'express';
import { AdmissionPipeline } from '../core/admission-pipeline';
import { parseTranslationRequest } from '../middleware/translation-request';
import { asyncHandler } from '../utils/async-handler';
import { sendOutcome } from '../utils/outcome-response';

export function createTranslateRoutes(pipeline: AdmissionPipeline): Router {
  const router = Router();

  /**
   * Translate text
   * POST /translate
   * Body (JSON or form) or query: text, source, target, outputFormat
   */
  router.post(
    '/translate',
    asyncHandler(async (req: Request, res: Response) => {
      const outcome = await pipeline.translate(parseTranslationRequest(req));

      if (outcome.status !== 'ok') {
        sendOutcome(res, outcome);
        return;
      }

      const { payload, outputFormat } = outcome.body;
      res.set(outcome.headers);

      if (outputFormat === 'json') {
        res.status(200).json(payload);
      } else {
        res.status(200).type('text/plain').send(payload.translated);
      }
    })
  );

  return router;
}
