import type { FastifyInstance } from 'fastify';

import { adminQueueRoutes } from './queues';

export async function adminRoutes(app: FastifyInstance) {
  // Every admin route requires an authenticated admin
  app.addHook('preHandler', app.authenticate);
  app.addHook('preHandler', app.requireRole(['admin']));

  await app.register(adminQueueRoutes);
}
