import { randomUUID } from 'node:crypto';
import { createMiddleware } from 'hono/factory';
import type { AppEnv } from '../types.js';

const HEADER = 'X-Request-Id';
const MAX_INCOMING_LENGTH = 128;

export const requestId = createMiddleware<AppEnv>(async (c, next) => {
  const incoming = c.req.header(HEADER);
  const id =
    incoming && incoming.length <= MAX_INCOMING_LENGTH ? incoming : randomUUID();

  c.set('requestId', id);
  c.header(HEADER, id);
  await next();
});
