import type { FastifyInstance } from 'fastify';

import { adminRoutes } from './admin';
import { attemptRoutes } from './attempts';
import { badgeRoutes } from './badges';
import { healthRoutes } from './health';
import { leaderboardRoutes } from './leaderboard';
import { metricsRoutes } from './metrics';

export async function registerRoutes(app: FastifyInstance) {
  // Health check and metrics routes
  await app.register(healthRoutes);
  await app.register(metricsRoutes);

  // Attempt lifecycle routes
  await app.register(attemptRoutes);

  // Leaderboard and progress routes
  await app.register(leaderboardRoutes);

  // Badge routes
  await app.register(badgeRoutes);

  // Admin routes (queue stats, dead letters)
  await app.register(adminRoutes);
}
