/**
 * Fastify plugin for automatic HTTP metrics collection
 *
 * Instruments all HTTP requests with:
 * - Request count (by method, route, status)
 * - Request duration histogram
 *
 * Relies on the start time recorded by the request ID plugin.
 */

import type { FastifyInstance } from 'fastify';

import { recordHttpRequest } from '../lib/metrics';

export async function registerMetrics(app: FastifyInstance) {
  app.addHook('onResponse', async (request, reply) => {
    if (!request.startTime) {
      return;
    }

    const durationSeconds = Number(process.hrtime.bigint() - request.startTime) / 1_000_000_000;

    // Parameterized route pattern where one matched, else the raw URL
    const route = request.routeOptions.url ?? request.url;

    recordHttpRequest(request.method, route, reply.statusCode, durationSeconds);
  });
}
