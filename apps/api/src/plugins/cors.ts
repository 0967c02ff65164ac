import cors from '@fastify/cors';
import type { FastifyInstance } from 'fastify';

import { env } from '../lib/env';

/**
 * WEB_URL may list several origins, comma separated. Callers authenticate
 * with Bearer tokens, so credentialed CORS requests are not enabled.
 */
export async function registerCors(app: FastifyInstance) {
  const origins = env.WEB_URL.split(',')
    .map((origin) => origin.trim())
    .filter((origin) => origin.length > 0);

  await app.register(cors, {
    origin: env.NODE_ENV === 'production' ? origins : true,
    methods: ['GET', 'POST', 'OPTIONS'],
    allowedHeaders: ['Content-Type', 'Authorization', 'X-Request-ID'],
    exposedHeaders: ['X-Request-ID', 'Retry-After'],
    maxAge: 600,
  });
}
