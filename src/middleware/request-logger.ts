import { Request, Response, NextFunction } from 'express';
import logger from '../utils/logger';

/**
 * Request logging middleware
 */
export function requestLogger(req: Request, res: Response, next: NextFunction) {
  const startTime = Date.now();

  res.on('finish', () => {
    logger.debug('Request completed', {
      method: req.method,
      path: req.path,
      ip: req.ip,
      status: res.statusCode,
      duration_ms: Date.now() - startTime,
    });
  });

  next();
}
