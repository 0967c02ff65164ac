/**
 * Leaderboard and progress routes
 *
 * Both are public reads. Ordering comes from the rank cache; a user's
 * total always comes from the ledger.
 */

import type { FastifyInstance } from 'fastify';
import { z } from 'zod';

import { ValidationError } from '../lib/errors';

const leaderboardQuerySchema = z.object({
  limit: z.coerce.number().int().min(1).max(100).default(20),
});

const userIdParamSchema = z.object({
  userId: z.string().uuid(),
});

export async function leaderboardRoutes(app: FastifyInstance) {
  app.get('/api/leaderboard', async (request) => {
    const queryResult = leaderboardQuerySchema.safeParse(request.query);
    if (!queryResult.success) {
      throw new ValidationError('Invalid query parameters', { issues: queryResult.error.issues });
    }

    return app.services.progress.getLeaderboard(queryResult.data.limit);
  });

  app.get('/api/users/:userId/progress', async (request) => {
    const paramsResult = userIdParamSchema.safeParse(request.params);
    if (!paramsResult.success) {
      throw new ValidationError('Invalid user id', { issues: paramsResult.error.issues });
    }

    return app.services.progress.getProgress(paramsResult.data.userId);
  });
}
