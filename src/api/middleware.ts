/**
 * API error handling.
 */

import { NextFunction, Request, Response } from 'express';
import { TypedError, apiError, createTypedError, isCompatError, validationError } from '../domain/errors';
import { errorMessage, logger } from '../logger';

const log = logger.child({ component: 'api' });

/** HTTP status for a typed error, from its code. */
export function getHttpStatus(error: TypedError): number {
  if (error.code.endsWith('NOT_FOUND')) return 404;
  if (
    error.code.startsWith('VALIDATION.') ||
    error.code.startsWith('VERSION.') ||
    error.code.startsWith('CONSTRAINT.') ||
    error.code.startsWith('CONFIG.')
  ) {
    return 400;
  }
  if (error.code === 'SWAP.IN_PROGRESS' || error.code === 'SWAP.ALREADY_REGISTERED') return 409;
  if (error.code.startsWith('SWAP.')) return 422;
  if (error.code.startsWith('INSTANCE.')) return 503;
  return 500;
}

/** Send the response for an error caught inside a route handler. */
export function sendError(res: Response, err: unknown): void {
  if (isCompatError(err)) {
    const status = getHttpStatus(err.typedError);
    log.warn('Request error', { code: err.typedError.code, status });
    res.status(status).json(apiError(err.typedError));
    return;
  }

  log.error('Unhandled request error', {
    message: errorMessage(err),
    stack: err instanceof Error ? err.stack : undefined,
  });
  res.status(500).json(
    apiError(
      createTypedError({
        code: 'SYSTEM.INTERNAL',
        message: err instanceof Error ? err.message : 'Internal server error',
      }),
    ),
  );
}

/** Global error handler; also catches malformed JSON bodies. */
export function errorHandler(err: unknown, _req: Request, res: Response, _next: NextFunction): void {
  if (err instanceof SyntaxError) {
    res.status(400).json(apiError(validationError(`Malformed JSON body: ${err.message}`)));
    return;
  }
  sendError(res, err);
}

/** First string value of a query parameter. */
export function queryString(value: unknown): string | undefined {
  if (typeof value === 'string') return value;
  if (Array.isArray(value) && typeof value[0] === 'string') return value[0];
  return undefined;
}

/** Non-negative integer query parameter, or the fallback when absent or invalid. */
export function queryInt(value: unknown, fallback: number, max: number): number {
  const text = queryString(value);
  if (text === undefined) return fallback;
  const parsed = parseInt(text, 10);
  if (Number.isNaN(parsed) || parsed < 0) return fallback;
  return Math.min(parsed, max);
}
