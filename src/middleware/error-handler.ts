import type { Request, Response, NextFunction } from 'express';
import logger from '../utils/logger';

function isBodyParseError(error: unknown): boolean {
  return (
    typeof error === 'object' &&
    error !== null &&
    'type' in error &&
    error.type === 'entity.parse.failed'
  );
}

/**
 * 404 handler for unmatched routes
 */
export function notFoundHandler(req: Request, res: Response) {
  res.status(404).json({ msg: 'not found' });
}

/**
 * Final error handler. Express recognises it by its four parameters.
 */
export function errorHandler(error: unknown, req: Request, res: Response, next: NextFunction) {
  if (res.headersSent) {
    return next(error);
  }

  if (isBodyParseError(error)) {
    res.status(400).json({ msg: 'invalid request body' });
    return;
  }

  logger.error(`Unhandled error on ${req.method} ${req.path}`, {
    error: error instanceof Error ? error.message : String(error),
    stack: error instanceof Error ? error.stack : undefined
  });
  res.status(500).json({ msg: 'internal server error' });
}
