import { NextFunction, Request, Response } from 'express';
import { AppError } from '../utils/errors';
import { componentLogger } from '../observability/logger';
import { env } from '../config/env';

const log = componentLogger('http');

/**
 * Maps a failure to its HTTP answer. Typed errors carry their own status;
 * anything else is a 500 whose message is hidden in production.
 */
export const sendError = (res: Response, error: unknown): void => {
  if (error instanceof AppError) {
    if (error.statusCode >= 500) {
      log.error({ err: error }, error.message);
    }
    res.status(error.statusCode).json({ message: error.message });
    return;
  }

  log.error({ err: error }, 'Unhandled error');
  const message = error instanceof Error && env.nodeEnv !== 'production' ? error.message : 'Internal server error';
  res.status(500).json({ message });
};

/** Last-resort Express error middleware, mostly for body parser failures */
export const errorHandler = (error: unknown, _req: Request, res: Response, _next: NextFunction): void => {
  if (error instanceof SyntaxError) {
    res.status(400).json({ message: 'Malformed JSON body' });
    return;
  }
  sendError(res, error);
};

export const notFound = (req: Request, res: Response): void => {
  res.status(404).json({ message: `Route not found: ${req.method} ${req.originalUrl}` });
};
