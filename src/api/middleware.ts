/**
 * API middleware: request logging and error handling.
 */

import { Request, Response, NextFunction } from 'express';
import { apiError, TypedError, createTypedError, isTypedError } from '../domain/errors';
import { logger } from '../logger';

const log = logger.child({ module: 'api' });

/** Log each request once its response has finished. */
export function requestLogger() {
  return (req: Request, res: Response, next: NextFunction) => {
    const started = Date.now();
    res.on('finish', () => {
      log.debug('Request completed', {
        method: req.method,
        path: req.path,
        status: res.statusCode,
        durationMs: Date.now() - started,
      });
    });
    next();
  };
}

/** Global error handling middleware. */
export function errorHandler(err: unknown, _req: Request, res: Response, _next: NextFunction) {
  const typedError = extractTypedError(err);
  if (typedError) {
    const status = getHttpStatus(typedError);
    log.warn('Request error', { code: typedError.code, status });
    res.status(status).json(apiError(typedError));
    return;
  }

  const message = err instanceof Error && err.message ? err.message : 'Internal server error';
  log.error('Unhandled request error', {
    message,
    stack: err instanceof Error ? err.stack : undefined,
  });

  res.status(500).json(apiError(createTypedError({
    code: 'SYSTEM.INTERNAL',
    message,
    retryable: false,
  })));
}

function extractTypedError(err: unknown): TypedError | undefined {
  if (typeof err !== 'object' || err === null || !('typedError' in err)) return undefined;
  return isTypedError(err.typedError) ? err.typedError : undefined;
}

export function getHttpStatus(error: TypedError): number {
  if (error.code.includes('NOT_FOUND')) return 404;
  if (error.code.startsWith('VALIDATION.')) return 400;
  return 500;
}
