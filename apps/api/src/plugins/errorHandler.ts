import type { FastifyInstance } from 'fastify';

import { AppError, formatError } from '../lib/errors';

// Seconds a client should wait before retrying a request that hit a store failure
const STORE_RETRY_AFTER_SECONDS = 1;

export async function registerErrorHandler(app: FastifyInstance) {
  app.setErrorHandler((error, request, reply) => {
    if (error instanceof AppError && error.statusCode < 500) {
      request.log.warn({ err: error, code: error.code }, 'Request rejected');
    } else {
      request.log.error({ err: error }, 'Request failed');
    }

    if (error instanceof AppError && error.retryable) {
      reply.header('Retry-After', String(STORE_RETRY_AFTER_SECONDS));
    }

    const statusCode = error instanceof AppError ? error.statusCode : error.statusCode || 500;

    reply.status(statusCode).send(formatError(error));
  });

  app.setNotFoundHandler((request, reply) => {
    reply.status(404).send({
      error: {
        code: 'NOT_FOUND',
        message: `No route for ${request.method} ${request.url}`,
      },
    });
  });
}
