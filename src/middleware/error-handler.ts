import { Request, Response, NextFunction } from 'express';
import { appConfig } from '../config';
import logger from '../utils/logger';

/**
 * body-parser marks unparseable payloads with this type
 */
function isBodyParseError(error: Error): boolean {
  return 'type' in error && error.type === 'entity.parse.failed';
}

/**
 * Global error handler middleware
 */
export function errorHandler(error: Error, _req: Request, res: Response, _next: NextFunction) {
  if (isBodyParseError(error)) {
    logger.debug('Rejected malformed request body', { error: error.message });
    res.status(400).json({
      error: 'Bad Request',
      message: 'Malformed request body',
    });
    return;
  }

  logger.error('Unhandled error', {
    error: error.message,
    stack: error.stack,
  });

  res.status(500).json({
    error: 'Internal Server Error',
    message: appConfig.nodeEnv === 'development' ? error.message : 'An error occurred',
  });
}
