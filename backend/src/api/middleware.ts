import { Request, Response, NextFunction } from 'express';
import { config } from '../config';
import { describeError } from '../errors';
import { errorStatus } from './requestParsers';

/**
 * Error handler wrapper
 */
export const asyncHandler =
  (fn: (req: Request, res: Response, next: NextFunction) => Promise<void>) =>
  (req: Request, res: Response, next: NextFunction): void => {
    Promise.resolve(fn(req, res, next)).catch(next);
  };

/**
 * Error handling middleware. User mistakes are reported as they are;
 * internal errors only in development.
 */
export function errorHandler(err: unknown, _req: Request, res: Response, _next: NextFunction): void {
  const status = errorStatus(err);
  const message = describeError(err);

  if (status >= 500) {
    console.error('Error:', message);
  }

  res.status(status).json({
    error: status < 500 || config.nodeEnv === 'development' ? message : 'Internal server error',
  });
}

/**
 * 404 handler
 */
export function notFoundHandler(_req: Request, res: Response): void {
  res.status(404).json({ error: 'Not found' });
}
