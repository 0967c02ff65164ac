import type { FastifyInstance } from 'fastify';
import { z } from 'zod';

import { badgeConditionSchema } from '../lib/badge-conditions';
import { ValidationError } from '../lib/errors';

const createBadgeBodySchema = z.object({
  name: z.string().trim().min(1).max(100),
  description: z.string().max(500).default(''),
  condition: badgeConditionSchema,
  iconUrl: z.string().url().nullable().optional(),
});

const userIdParamSchema = z.object({
  userId: z.string().uuid(),
});

export async function badgeRoutes(app: FastifyInstance) {
  // GET /api/badges - All badge definitions
  app.get('/api/badges', async () => {
    return { data: await app.services.badges.listDefinitions() };
  });

  // POST /api/badges - Define a badge (admin only)
  app.post(
    '/api/badges',
    { preHandler: [app.authenticate, app.requireRole(['admin'])] },
    async (request, reply) => {
      const bodyResult = createBadgeBodySchema.safeParse(request.body);
      if (!bodyResult.success) {
        throw new ValidationError('Invalid badge definition', { issues: bodyResult.error.issues });
      }

      const badge = await app.services.badges.createDefinition(bodyResult.data, request.user.id);
      return reply.status(201).send(badge);
    }
  );

  // GET /api/badges/me - Badges held by the caller
  app.get('/api/badges/me', { preHandler: [app.authenticate] }, async (request) => {
    return { data: await app.services.badges.getUserBadges(request.user.id) };
  });

  // GET /api/badges/users/:userId - Badges held by any user
  app.get('/api/badges/users/:userId', async (request) => {
    const paramsResult = userIdParamSchema.safeParse(request.params);
    if (!paramsResult.success) {
      throw new ValidationError('Invalid user id', { issues: paramsResult.error.issues });
    }

    return { data: await app.services.badges.getUserBadges(paramsResult.data.userId) };
  });
}
