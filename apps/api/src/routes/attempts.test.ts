import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';

import { TransientStoreFailureError } from '../lib/errors';
import { buildTestApp, type TestApp } from '../test/build-test-app';

const USER_ID = '11111111-1111-4111-8111-111111111111';
const OTHER_USER_ID = '33333333-3333-4333-8333-333333333333';
const CHALLENGE_ID = '22222222-2222-4222-8222-222222222222';

describe('attempt routes', () => {
  let t: TestApp;

  beforeEach(async () => {
    t = await buildTestApp();
    t.users.add({ id: USER_ID, username: 'ada', roles: ['user'] });
    t.challenges.add({ id: CHALLENGE_ID, title: 'Two Sum', xp: 100, published: true });
  });

  afterEach(async () => {
    await t.app.close();
  });

  async function startAttempt(userId: string = USER_ID): Promise<string> {
    const response = await t.app.inject({
      method: 'POST',
      url: '/api/attempts',
      headers: t.authHeader(userId),
      payload: { challengeId: CHALLENGE_ID },
    });
    expect(response.statusCode).toBe(201);
    return response.json<{ id: string }>().id;
  }

  describe('authentication', () => {
    it('rejects a request without a token', async () => {
      const response = await t.app.inject({ method: 'GET', url: '/api/attempts' });

      expect(response.statusCode).toBe(401);
      expect(response.json()).toEqual({
        error: { code: 'UNAUTHORIZED', message: 'Missing or invalid authorization header' },
      });
    });

    it('rejects a token signed with another secret', async () => {
      const response = await t.app.inject({
        method: 'GET',
        url: '/api/attempts',
        headers: { authorization: 'Bearer not-a-real-token' },
      });

      expect(response.statusCode).toBe(401);
      expect(response.json()).toEqual({
        error: { code: 'UNAUTHORIZED', message: 'Invalid or expired access token' },
      });
    });
  });

  describe('POST /api/attempts', () => {
    it('starts an attempt', async () => {
      const response = await t.app.inject({
        method: 'POST',
        url: '/api/attempts',
        headers: t.authHeader(USER_ID),
        payload: { challengeId: CHALLENGE_ID },
      });

      expect(response.statusCode).toBe(201);
      expect(response.json()).toMatchObject({
        challengeId: CHALLENGE_ID,
        status: 'started',
        score: null,
        xpAwarded: null,
        submittedAt: null,
      });
    });

    it('rejects a malformed challenge id', async () => {
      const response = await t.app.inject({
        method: 'POST',
        url: '/api/attempts',
        headers: t.authHeader(USER_ID),
        payload: { challengeId: 'two-sum' },
      });

      expect(response.statusCode).toBe(400);
      expect(response.json()).toMatchObject({ error: { code: 'VALIDATION_ERROR', message: 'Invalid request body' } });
    });

    it('returns 404 for an unpublished challenge', async () => {
      t.challenges.add({ id: CHALLENGE_ID, title: 'Two Sum', xp: 100, published: false });

      const response = await t.app.inject({
        method: 'POST',
        url: '/api/attempts',
        headers: t.authHeader(USER_ID),
        payload: { challengeId: CHALLENGE_ID },
      });

      expect(response.statusCode).toBe(404);
      expect(response.json()).toEqual({
        error: { code: 'NOT_FOUND', message: `Challenge with id '${CHALLENGE_ID}' not found` },
      });
    });
  });

  describe('POST /api/attempts/:id/submit', () => {
    it('records the score and enqueues the award', async () => {
      const attemptId = await startAttempt();

      const response = await t.app.inject({
        method: 'POST',
        url: `/api/attempts/${attemptId}/submit`,
        headers: t.authHeader(USER_ID),
        payload: { score: 85, solution: 'return a + b;' },
      });

      expect(response.statusCode).toBe(202);
      expect(response.json()).toMatchObject({ id: attemptId, status: 'submitted', score: 85 });
      expect(t.queue.enqueued).toEqual([{ attemptId, reason: 'submission' }]);
    });

    it('asks the client to retry when the store is unavailable', async () => {
      const attemptId = await startAttempt();
      vi.spyOn(t.attempts, 'submit').mockRejectedValueOnce(new TransientStoreFailureError('database unavailable'));

      const response = await t.app.inject({
        method: 'POST',
        url: `/api/attempts/${attemptId}/submit`,
        headers: t.authHeader(USER_ID),
        payload: { score: 85 },
      });

      expect(response.statusCode).toBe(503);
      expect(response.headers['retry-after']).toBe('1');
      expect(response.json()).toEqual({
        error: { code: 'TRANSIENT_STORE_FAILURE', message: 'database unavailable' },
      });
    });

    it('rejects a score outside 0..100', async () => {
      const attemptId = await startAttempt();

      const response = await t.app.inject({
        method: 'POST',
        url: `/api/attempts/${attemptId}/submit`,
        headers: t.authHeader(USER_ID),
        payload: { score: 101 },
      });

      expect(response.statusCode).toBe(400);
      expect(response.json()).toEqual({
        error: {
          code: 'VALIDATION_ERROR',
          message: 'Score must be an integer between 0 and 100',
          details: { score: 101 },
        },
      });
    });

    it("forbids submitting another user's attempt", async () => {
      const attemptId = await startAttempt();

      const response = await t.app.inject({
        method: 'POST',
        url: `/api/attempts/${attemptId}/submit`,
        headers: t.authHeader(OTHER_USER_ID),
        payload: { score: 90 },
      });

      expect(response.statusCode).toBe(403);
      expect(response.json()).toMatchObject({ error: { code: 'FORBIDDEN' } });
    });

    it('returns 409 once the attempt has been scored', async () => {
      const attemptId = await startAttempt();
      await t.services.attempts.submit(attemptId, { userId: USER_ID, score: 85 });
      await t.services.pipeline.process(attemptId);

      const response = await t.app.inject({
        method: 'POST',
        url: `/api/attempts/${attemptId}/submit`,
        headers: t.authHeader(USER_ID),
        payload: { score: 100 },
      });

      expect(response.statusCode).toBe(409);
      expect(response.json()).toEqual({
        error: {
          code: 'INVALID_STATE',
          message: 'Attempt is already passed',
          details: { attemptId, status: 'passed' },
        },
      });
    });

    it('returns 404 for an unknown attempt', async () => {
      const response = await t.app.inject({
        method: 'POST',
        url: '/api/attempts/44444444-4444-4444-8444-444444444444/submit',
        headers: t.authHeader(USER_ID),
        payload: { score: 50 },
      });

      expect(response.statusCode).toBe(404);
    });
  });

  describe('GET /api/attempts', () => {
    it("lists only the caller's attempts", async () => {
      const mine = await startAttempt();
      await startAttempt(OTHER_USER_ID);

      const response = await t.app.inject({
        method: 'GET',
        url: '/api/attempts?limit=5',
        headers: t.authHeader(USER_ID),
      });

      expect(response.statusCode).toBe(200);
      const body = response.json<{ data: Array<{ id: string }>; pagination: unknown }>();
      expect(body.data.map((a) => a.id)).toEqual([mine]);
      expect(body.pagination).toEqual({ limit: 5, offset: 0 });
    });

    it('rejects an unknown status filter', async () => {
      const response = await t.app.inject({
        method: 'GET',
        url: '/api/attempts?status=abandoned',
        headers: t.authHeader(USER_ID),
      });

      expect(response.statusCode).toBe(400);
    });
  });

  describe('GET /api/attempts/:id', () => {
    it('shows the awarded XP once the pipeline has run', async () => {
      const attemptId = await startAttempt();
      await t.services.attempts.submit(attemptId, { userId: USER_ID, score: 85 });
      await t.services.pipeline.process(attemptId);

      const response = await t.app.inject({
        method: 'GET',
        url: `/api/attempts/${attemptId}`,
        headers: t.authHeader(USER_ID),
      });

      expect(response.statusCode).toBe(200);
      expect(response.json()).toMatchObject({ id: attemptId, status: 'passed', score: 85, xpAwarded: 85 });
    });

    it('rejects a malformed id', async () => {
      const response = await t.app.inject({
        method: 'GET',
        url: '/api/attempts/not-a-uuid',
        headers: t.authHeader(USER_ID),
      });

      expect(response.statusCode).toBe(400);
      expect(response.json()).toMatchObject({ error: { code: 'VALIDATION_ERROR', message: 'Invalid attempt id' } });
    });
  });
});
