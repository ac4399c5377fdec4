import type { Context } from 'hono';
import { HTTPException } from 'hono/http-exception';
import { ZodError } from 'zod';
import {
  InvalidQueryError,
  ProviderUnavailableError,
} from '@searchbridge/shared/src/utils/errors.js';
import { createChildLogger } from '@searchbridge/shared/src/logger.js';
import type { AppEnv } from '../types.js';

const log = createChildLogger('api:error-handler');

interface ErrorResponse {
  readonly error: string;
  readonly code: string;
  readonly requestId: string;
  readonly details?: readonly string[];
}

export function errorHandler(err: Error, c: Context<AppEnv>): Response {
  const requestId = c.get('requestId');

  if (err instanceof ZodError) {
    const details = err.errors.map((e) => `${e.path.join('.')}: ${e.message}`);
    const body: ErrorResponse = {
      error: 'Validation failed',
      code: 'VALIDATION_ERROR',
      requestId,
      details,
    };
    return c.json(body, 400);
  }

  // Raised by hono itself, e.g. for a body that is not JSON.
  if (err instanceof HTTPException) {
    const body: ErrorResponse = {
      error: err.message || 'Bad request',
      code: err.status === 400 ? 'VALIDATION_ERROR' : 'HTTP_ERROR',
      requestId,
    };
    return c.json(body, err.status);
  }

  if (err instanceof InvalidQueryError) {
    const body: ErrorResponse = {
      error: err.message,
      code: err.code,
      requestId,
    };
    return c.json(body, 400);
  }

  // Parse failures are reported to clients as an unavailable provider.
  if (err instanceof ProviderUnavailableError) {
    log.error(
      { requestId, code: err.code, attempts: err.attempts, error: err.message },
      'Search provider unavailable',
    );
    const body: ErrorResponse = {
      error: 'Search provider unavailable',
      code: 'PROVIDER_UNAVAILABLE',
      requestId,
    };
    return c.json(body, 502);
  }

  log.error({ requestId, error: err.message }, 'Unhandled error');
  const body: ErrorResponse = {
    error: 'Internal server error',
    code: 'INTERNAL_ERROR',
    requestId,
  };
  return c.json(body, 500);
}
