/**
 * Admin queue routes
 *
 * Queue depth for the award, dead-letter and maintenance queues, and manual
 * handling of dead-lettered award jobs.
 */

import type { FastifyInstance } from 'fastify';
import { z } from 'zod';

import { NotFoundError, ValidationError } from '../../lib/errors';
import { auditLog } from '../../lib/logger';

const deadLetterQuerySchema = z.object({
  limit: z.coerce.number().int().min(1).max(500).default(50),
});

const jobIdParamSchema = z.object({
  jobId: z.string().min(1).max(200),
});

export async function adminQueueRoutes(app: FastifyInstance) {
  // GET /api/admin/queues - Job counts per queue
  app.get('/api/admin/queues', async () => {
    return { data: await app.services.queueAdmin.getStats() };
  });

  // GET /api/admin/dead-letters - Award jobs that ran out of retries
  app.get('/api/admin/dead-letters', async (request) => {
    const queryResult = deadLetterQuerySchema.safeParse(request.query);
    if (!queryResult.success) {
      throw new ValidationError('Invalid query parameters', { issues: queryResult.error.issues });
    }

    return { data: await app.services.queueAdmin.listDeadLetters(queryResult.data.limit) };
  });

  // POST /api/admin/dead-letters/:jobId/requeue - Retry a dead-lettered award
  app.post('/api/admin/dead-letters/:jobId/requeue', async (request) => {
    const paramsResult = jobIdParamSchema.safeParse(request.params);
    if (!paramsResult.success) {
      throw new ValidationError('Invalid job id', { issues: paramsResult.error.issues });
    }
    const { jobId } = paramsResult.data;

    const attemptId = await app.services.queueAdmin.requeueDeadLetter(jobId);
    if (!attemptId) {
      throw new NotFoundError('Dead letter', jobId);
    }

    auditLog('dead_letter.requeue', {
      userId: request.user.id,
      targetId: attemptId,
      targetType: 'attempt',
      result: 'success',
      metadata: { jobId },
    });

    return { jobId, attemptId, requeued: true };
  });
}
