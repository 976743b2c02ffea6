import { describe, it, expect } from 'vitest';
import { z } from 'zod';
import {
  InvariantViolation,
  PersistenceError,
  SchemaValidationError,
  ServiceUnavailableError,
} from '@spurn/shared/src/utils/errors.js';
import { createRouter } from '../types.js';
import { requestId } from './request-id.js';
import { errorHandler } from './error-handler.js';

function appThrowing(error: Error): ReturnType<typeof createRouter> {
  const app = createRouter();
  app.use('*', requestId);
  app.onError(errorHandler);
  app.get('/boom', () => {
    throw error;
  });
  return app;
}

async function call(error: Error): Promise<{ status: number; body: Record<string, unknown> }> {
  const res = await appThrowing(error).request('/boom', { headers: { 'X-Request-Id': 'req-7' } });
  return { status: res.status, body: (await res.json()) as Record<string, unknown> };
}

describe('errorHandler', () => {
  it('should map zod errors to 400 with details', async () => {
    const parsed = z.object({ text: z.string() }).safeParse({});
    if (parsed.success) {
      throw new Error('expected a parse failure');
    }

    const { status, body } = await call(parsed.error);

    expect(status).toBe(400);
    expect(body).toEqual({
      error: 'Validation failed',
      code: 'VALIDATION_ERROR',
      requestId: 'req-7',
      details: ['text: Required'],
    });
  });

  it('should map schema validation errors to 400', async () => {
    const { status, body } = await call(new SchemaValidationError('Invalid seed', ['articles: Required']));

    expect(status).toBe(400);
    expect(body).toHaveProperty('details', ['articles: Required']);
  });

  it('should map invariant violations to 500', async () => {
    const { status, body } = await call(new InvariantViolation('weights out of step'));

    expect(status).toBe(500);
    expect(body).toHaveProperty('code', 'INVARIANT_VIOLATION');
  });

  it('should map unavailable services to 503', async () => {
    const { status, body } = await call(new ServiceUnavailableError('down', 'similarity'));

    expect(status).toBe(503);
    expect(body).toEqual({
      error: 'Service unavailable: similarity',
      code: 'SERVICE_UNAVAILABLE',
      requestId: 'req-7',
    });
  });

  it('should hide persistence failures behind a generic 500', async () => {
    const { status, body } = await call(new PersistenceError('firestore timeout'));

    expect(status).toBe(500);
    expect(body).toHaveProperty('code', 'INTERNAL_ERROR');
    expect(body).toHaveProperty('error', 'Internal server error');
  });

  it('should treat anything else as an internal error', async () => {
    const { status, body } = await call(new Error('unexpected'));

    expect(status).toBe(500);
    expect(body).toHaveProperty('code', 'INTERNAL_ERROR');
  });
});
