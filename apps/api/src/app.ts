import helmet from '@fastify/helmet';
import Fastify, { type FastifyInstance } from 'fastify';

import { env } from './lib/env';
import { loggerOptions } from './lib/logger';
import type { Services } from './lib/services';
import {
  registerCors,
  registerErrorHandler,
  registerJwt,
  registerMetrics,
  registerRbac,
  registerRequestId,
} from './plugins';
import { registerRoutes } from './routes';

declare module 'fastify' {
  interface FastifyInstance {
    services: Services;
  }
}

export interface BuildAppOptions {
  jwtSecret?: string;
}

/**
 * Assemble the HTTP app around an already-built service graph. The server
 * entry point passes the production services; tests pass in-process ones.
 */
export async function buildApp(services: Services, options: BuildAppOptions = {}): Promise<FastifyInstance> {
  const app = Fastify({
    logger: loggerOptions,
    disableRequestLogging: true, // requestId plugin logs completions with timing
  });

  app.decorate('services', services);

  await app.register(helmet, { global: true });
  await registerRequestId(app);
  await registerMetrics(app);
  await registerCors(app);
  await registerJwt(app, options.jwtSecret ?? env.JWT_SECRET);
  await registerRbac(app, services.users);
  await registerErrorHandler(app);

  await registerRoutes(app);

  return app;
}
