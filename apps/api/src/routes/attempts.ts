import type { FastifyInstance } from 'fastify';
import { z } from 'zod';

import { ValidationError } from '../lib/errors';
import { toAttemptSummary } from '../lib/progress-service';

const startAttemptBodySchema = z.object({
  challengeId: z.string().uuid(),
});

// Range and integrality are enforced by the attempt lifecycle
const submitAttemptBodySchema = z.object({
  score: z.number(),
  solution: z.string().max(100_000).optional(),
  metadata: z.record(z.unknown()).optional(),
});

const attemptIdParamSchema = z.object({
  id: z.string().uuid(),
});

const listAttemptsQuerySchema = z.object({
  limit: z.coerce.number().int().min(1).max(100).default(20),
  offset: z.coerce.number().int().min(0).default(0),
  status: z.enum(['started', 'submitted', 'passed', 'failed']).optional(),
});

function parse<T>(schema: z.ZodType<T, z.ZodTypeDef, unknown>, value: unknown, what: string): T {
  const result = schema.safeParse(value);
  if (!result.success) {
    throw new ValidationError(`Invalid ${what}`, { issues: result.error.issues });
  }
  return result.data;
}

export async function attemptRoutes(app: FastifyInstance) {
  // POST /api/attempts - Start an attempt at a published challenge
  app.post('/api/attempts', { preHandler: [app.authenticate] }, async (request, reply) => {
    const { challengeId } = parse(startAttemptBodySchema, request.body, 'request body');

    const attempt = await app.services.attempts.start(request.user.id, challengeId);

    return reply.status(201).send(toAttemptSummary(attempt));
  });

  // POST /api/attempts/:id/submit - Record a score; XP is awarded asynchronously
  app.post('/api/attempts/:id/submit', { preHandler: [app.authenticate] }, async (request, reply) => {
    const { id } = parse(attemptIdParamSchema, request.params, 'attempt id');
    const body = parse(submitAttemptBodySchema, request.body, 'request body');

    const attempt = await app.services.attempts.submit(id, {
      userId: request.user.id,
      score: body.score,
      solution: body.solution,
      metadata: body.metadata,
    });

    return reply.status(202).send(toAttemptSummary(attempt));
  });

  // GET /api/attempts - The caller's attempts, newest first
  app.get('/api/attempts', { preHandler: [app.authenticate] }, async (request) => {
    const query = parse(listAttemptsQuerySchema, request.query, 'query parameters');

    const attempts = await app.services.attempts.list(request.user.id, query);

    return {
      data: attempts.map(toAttemptSummary),
      pagination: { limit: query.limit, offset: query.offset },
    };
  });

  // GET /api/attempts/:id - One of the caller's attempts
  app.get('/api/attempts/:id', { preHandler: [app.authenticate] }, async (request) => {
    const { id } = parse(attemptIdParamSchema, request.params, 'attempt id');

    const attempt = await app.services.attempts.get(id, request.user.id);

    return toAttemptSummary(attempt);
  });
}
