/**
 * API Middleware: request validation and error handling.
 */

import { Request, Response, NextFunction } from 'express';
import { ZodType, ZodTypeDef } from 'zod';
import { GeoSyncError, TypedError, apiError, createTypedError, validationError } from '../domain/errors';
import { logger as rootLogger } from '../logger';

const logger = rootLogger.child('api');

/**
 * Parse a request payload, throwing VALIDATION.SCHEMA with every issue when
 * it does not match.
 */
export function parseInput<T>(schema: ZodType<T, ZodTypeDef, unknown>, input: unknown, what = 'body'): T {
  const parsed = schema.safeParse(input);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((i) => ({ path: i.path.join('.'), message: i.message }));
    throw new GeoSyncError(validationError(`Invalid request ${what}`, { issues }));
  }
  return parsed.data;
}

/** Global error handling middleware. */
export function errorHandler(err: unknown, _req: Request, res: Response, _next: NextFunction) {
  if (err instanceof GeoSyncError) {
    const status = getHttpStatus(err.typedError);
    logger.warn('Request error', { code: err.typedError.code, status });
    res.status(status).json(apiError(err.typedError));
    return;
  }

  // express.json() reports malformed bodies as a SyntaxError.
  if (err instanceof SyntaxError) {
    res.status(400).json(apiError(validationError(`Malformed JSON body: ${err.message}`)));
    return;
  }

  const message = err instanceof Error ? err.message : 'Internal server error';
  logger.error('Unhandled request error', {
    message,
    stack: err instanceof Error ? err.stack : undefined,
  });

  const typedError = createTypedError({
    code: 'SYSTEM.INTERNAL',
    message,
    retryable: false,
  });

  res.status(500).json(apiError(typedError));
}

export function getHttpStatus(error: TypedError): number {
  if (error.code.includes('NOT_FOUND')) return 404;
  if (error.code.startsWith('VALIDATION.')) return 400;
  if (error.code.startsWith('HIERARCHY.')) return 422;
  if (error.code.startsWith('CONFLICT.')) return 409;
  if (error.code.startsWith('REGISTRY.')) return 409;
  if (error.code.startsWith('SYNC.')) return 409;
  if (error.code.startsWith('PERSISTENCE.')) return 503;
  return 500;
}
