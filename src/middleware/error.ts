import type { Request, Response, NextFunction, ErrorRequestHandler } from 'express';
import { ZodError } from 'zod';
import type { Logger } from '../logger.js';

export class HttpError extends Error {
  constructor(
    readonly status: number,
    message: string
  ) {
    super(message);
    this.name = 'HttpError';
  }
}

// body-parser errors carry their own client status (malformed JSON, oversized body).
function clientStatus(err: unknown): number | undefined {
  if (typeof err !== 'object' || err === null || !('status' in err)) return undefined;
  const { status } = err;
  return typeof status === 'number' && status >= 400 && status < 500 ? status : undefined;
}

export function createErrorHandler(logger: Logger): ErrorRequestHandler {
  return (err: unknown, req: Request, res: Response, _next: NextFunction) => {
    if (err instanceof HttpError) {
      logger.warn({ method: req.method, path: req.path, status: err.status }, err.message);
      res.status(err.status).type('text/plain').send(err.message);
      return;
    }
    if (err instanceof ZodError) {
      logger.warn({ issues: err.flatten() }, 'Invalid request body');
      res.status(400).type('text/plain').send('Invalid request body');
      return;
    }
    const status = clientStatus(err);
    if (status !== undefined) {
      logger.warn({ err }, 'Error decoding request');
      res.status(status).type('text/plain').send('Invalid request body');
      return;
    }
    logger.error({ err }, 'Unhandled error');
    res.status(500).type('text/plain').send('Internal Server Error');
  };
}
