/**
 * Prometheus metrics endpoint
 *
 * Exposes /api/metrics in Prometheus format for scraping by monitoring systems.
 */

import type { FastifyInstance } from 'fastify';

import { getMetrics, getMetricsContentType } from '../lib/metrics';

export async function metricsRoutes(app: FastifyInstance) {
  /**
   * GET /api/metrics
   *
   * Note: In production, this endpoint should be protected or exposed
   * on a separate internal port to prevent public access.
   */
  app.get('/api/metrics', async (request, reply) => {
    const metrics = await getMetrics();

    return reply.header('Content-Type', getMetricsContentType()).send(metrics);
  });
}
