/**
 * API Middleware: request logging and error handling.
 */

import { Request, Response, NextFunction } from 'express';
import { apiError, TypedError, createTypedError } from '../domain/errors';
import { logger } from '../logger';

const log = logger.child({ module: 'api' });

/** An error carrying a TypedError, such as OrchestratorError. */
interface TypedErrorCarrier {
  typedError: TypedError;
}

function carriesTypedError(err: unknown): err is TypedErrorCarrier {
  return (
    typeof err === 'object' &&
    err !== null &&
    'typedError' in err &&
    typeof err.typedError === 'object' &&
    err.typedError !== null
  );
}

/** Log one line per request once the response is sent. */
export function requestLogger() {
  return (req: Request, res: Response, next: NextFunction) => {
    const started = Date.now();
    res.on('finish', () => {
      log.debug('Request', {
        method: req.method,
        path: req.originalUrl,
        status: res.statusCode,
        durationMs: Date.now() - started,
      });
    });
    next();
  };
}

/** Global error handling middleware. */
export function errorHandler(err: unknown, _req: Request, res: Response, _next: NextFunction) {
  if (carriesTypedError(err)) {
    const status = getHttpStatus(err.typedError);
    log.warn('Request error', { code: err.typedError.code, status });
    res.status(status).json(apiError(err.typedError));
    return;
  }

  // Body parser failures (malformed JSON, oversized payloads) carry a 4xx status
  const status = typeof err === 'object' && err !== null && 'status' in err ? err.status : undefined;
  if (typeof status === 'number' && status >= 400 && status < 500) {
    res.status(status).json(
      apiError(
        createTypedError({
          code: 'VALIDATION.INVALID_BODY',
          message: err instanceof Error ? err.message : 'Invalid request body',
        }),
      ),
    );
    return;
  }

  const message = err instanceof Error && err.message ? err.message : 'Internal server error';
  log.error('Unhandled request error', {
    message,
    stack: err instanceof Error ? err.stack : undefined,
  });

  res.status(500).json(
    apiError(
      createTypedError({
        code: 'SYSTEM.INTERNAL',
        message,
        retryable: false,
      }),
    ),
  );
}

/** Map a typed error code to an HTTP status. */
export function getHttpStatus(error: TypedError): number {
  if (error.code.startsWith('AUTH.UNAUTHENTICATED')) return 401;
  if (error.code.startsWith('AUTH.')) return 403;
  if (error.code.includes('NOT_FOUND')) return 404;
  if (error.code.startsWith('VALIDATION.')) return 400;
  if (error.code === 'RUN.INVALID_STATE_TRANSITION' || error.code === 'RUN.ALREADY_RUNNING') return 409;
  if (error.code.startsWith('RUN.')) return 422;
  return 500;
}

/** Read a string field from an untyped request body. */
export function bodyString(body: unknown, key: string): string | undefined {
  if (typeof body !== 'object' || body === null) return undefined;
  const value: unknown = Object.getOwnPropertyDescriptor(body, key)?.value;
  return typeof value === 'string' ? value : undefined;
}

/** Parse a non-negative integer query parameter, clamped to `max`. */
export function queryInt(value: unknown, fallback: number, max: number = Number.MAX_SAFE_INTEGER): number {
  if (typeof value !== 'string') return fallback;
  const parsed = parseInt(value, 10);
  if (Number.isNaN(parsed) || parsed < 0) return fallback;
  return Math.min(parsed, max);
}
