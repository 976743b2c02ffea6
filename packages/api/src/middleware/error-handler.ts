import type { Context } from 'hono';
import { ZodError } from 'zod';
import {
  InvariantViolation,
  PersistenceError,
  SchemaValidationError,
  ServiceUnavailableError,
} from '@spurn/shared/src/utils/errors.js';
import { createChildLogger } from '@spurn/shared/src/logger.js';
import { validationErrorBody, type AppEnv, type ErrorBody } from '../types.js';

const log = createChildLogger('api:error-handler');

export function errorHandler(err: Error, c: Context<AppEnv>): Response {
  const requestId = c.get('requestId');

  if (err instanceof ZodError) {
    return c.json(validationErrorBody(requestId, err.issues), 400);
  }

  if (err instanceof SchemaValidationError) {
    const body: ErrorBody = {
      error: err.message,
      code: 'VALIDATION_ERROR',
      requestId,
      details: err.validationErrors,
    };
    return c.json(body, 400);
  }

  if (err instanceof InvariantViolation) {
    log.fatal({ requestId, error: err.message, stack: err.stack }, 'Invariant violation');
    const body: ErrorBody = {
      error: 'Internal server error',
      code: 'INVARIANT_VIOLATION',
      requestId,
    };
    return c.json(body, 500);
  }

  if (err instanceof ServiceUnavailableError) {
    log.error({ requestId, service: err.service, error: err.message }, 'Upstream service unavailable');
    const body: ErrorBody = {
      error: `Service unavailable: ${err.service}`,
      code: 'SERVICE_UNAVAILABLE',
      requestId,
    };
    return c.json(body, 503);
  }

  if (err instanceof PersistenceError) {
    log.error({ requestId, error: err.message }, 'Persistence error');
    const body: ErrorBody = {
      error: 'Internal server error',
      code: 'INTERNAL_ERROR',
      requestId,
    };
    return c.json(body, 500);
  }

  log.error({ requestId, error: err.message }, 'Unhandled error');
  const body: ErrorBody = {
    error: 'Internal server error',
    code: 'INTERNAL_ERROR',
    requestId,
  };
  return c.json(body, 500);
}
