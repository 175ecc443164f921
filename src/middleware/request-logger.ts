import type { Request, Response, NextFunction } from 'express';
import logger from '../utils/logger';

/**
 * Request logging with Winston
 */
export function requestLogger(req: Request, res: Response, next: NextFunction) {
  const startTime = Date.now();

  // Log incoming request at debug level (less noisy)
  logger.debug(`${req.method} ${req.path}`, {
    method: req.method,
    path: req.path,
    ip: req.ip
  });

  res.on('finish', () => {
    const duration = Date.now() - startTime;
    const logLevel = res.statusCode >= 500 ? 'error' : res.statusCode >= 400 ? 'warn' : 'info';

    logger[logLevel](`${res.statusCode} ${req.method} ${req.path} - ${duration}ms`);
  });

  next();
}
