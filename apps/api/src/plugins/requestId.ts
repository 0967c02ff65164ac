/**
 * Request ID and Context Plugin
 *
 * Provides:
 * - Request ID generation/propagation
 * - Async local storage context for request-scoped logging
 * - Request completion logging with timing
 */

import type { FastifyInstance, FastifyReply, FastifyRequest } from 'fastify';
import { randomUUID } from 'crypto';

import { createContextLogger, requestContext } from '../lib/logger';

declare module 'fastify' {
  interface FastifyRequest {
    startTime: bigint;
  }
}

function headerValue(value: string | string[] | undefined): string | undefined {
  return Array.isArray(value) ? value[0] : value;
}

export async function registerRequestId(app: FastifyInstance) {
  app.decorateRequest('startTime', BigInt(0));

  app.addHook('onRequest', (request, reply, done) => {
    // Use provided request ID or generate a new one
    const requestId = headerValue(request.headers['x-request-id']) || randomUUID();

    request.id = requestId;
    request.startTime = process.hrtime.bigint();

    // Add to response headers for correlation
    reply.header('X-Request-ID', requestId);

    const contextLogger = createContextLogger({ requestId });
    request.log = contextLogger;

    // The rest of the request lifecycle runs inside this store, so services
    // and queue producers pick up the request id without it being passed around
    requestContext.run({ requestId, logger: contextLogger }, () => done());
  });

  app.addHook('onResponse', async (request: FastifyRequest, reply: FastifyReply) => {
    const duration = Number(process.hrtime.bigint() - request.startTime) / 1e6;

    const logData = {
      requestId: request.id,
      method: request.method,
      url: request.url,
      statusCode: reply.statusCode,
      durationMs: Math.round(duration * 100) / 100,
      userId: requestContext.getStore()?.userId,
    };

    if (reply.statusCode >= 500) {
      request.log.error(logData, 'Request completed with server error');
    } else if (reply.statusCode >= 400) {
      request.log.warn(logData, 'Request completed with client error');
    } else {
      request.log.info(logData, 'Request completed');
    }
  });
}
