import { randomUUID } from 'node:crypto';
import { createMiddleware } from 'hono/factory';
import type { AppEnv } from '../types.js';

export const REQUEST_ID_HEADER = 'X-Request-Id';

/** Reuses the caller's request id when one is sent, otherwise generates one. */
export const requestId = createMiddleware<AppEnv>(async (c, next) => {
  c.set('receivedAt', Date.now());
  const id = c.req.header(REQUEST_ID_HEADER) ?? randomUUID();
  c.set('requestId', id);
  c.header(REQUEST_ID_HEADER, id);
  await next();
});
