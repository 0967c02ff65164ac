/**
 * Attempt State Machine
 *
 * State Flow:
 * started → submitted → passed | failed
 *
 * - start: creates the attempt for a published challenge
 * - submit: valid from started or submitted (a re-submission overwrites the
 *   pending answer); commits, then enqueues one award job
 * - submitted → passed | failed: performed once, by the award pipeline only
 */

import { isValidAttemptTransition } from '@questline/shared';

import type { Attempt, AttemptStore, ListAttemptsOptions } from './attempt-store';
import type { ChallengeLookup } from './challenge-lookup';
import { ForbiddenError, InvalidStateError, NotFoundError, ValidationError } from './errors';
import { getContextLogger } from './logger';
import { jobFailureTotal } from './metrics';
import type { AwardJobQueue } from './queue';

export interface SubmitInput {
  /** Caller; when given, must own the attempt */
  userId?: string;
  score: number;
  solution?: string | null;
  metadata?: Record<string, unknown> | null;
}

export interface AttemptLifecycleDeps {
  attempts: AttemptStore;
  challenges: ChallengeLookup;
  queue: AwardJobQueue;
}

export class AttemptLifecycle {
  constructor(private readonly deps: AttemptLifecycleDeps) {}

  async start(userId: string, challengeId: string): Promise<Attempt> {
    const challenge = await this.deps.challenges.get(challengeId);
    if (!challenge || !challenge.published) {
      throw new NotFoundError('Challenge', challengeId);
    }

    const attempt = await this.deps.attempts.create(userId, challengeId);
    getContextLogger().info({ attemptId: attempt.id, challengeId }, 'Attempt started');
    return attempt;
  }

  /**
   * Record a submission and hand it to the award queue.
   *
   * The attempt row is committed before the job is enqueued. If the enqueue
   * fails the submission still stands; the reconciliation sweep picks the
   * attempt up once it is stale.
   */
  async submit(attemptId: string, input: SubmitInput): Promise<Attempt> {
    const existing = await this.deps.attempts.get(attemptId);
    if (!existing) {
      throw new NotFoundError('Attempt', attemptId);
    }
    if (input.userId !== undefined && existing.userId !== input.userId) {
      throw new ForbiddenError('Attempt belongs to another user');
    }
    if (!isValidAttemptTransition(existing.status, 'submitted')) {
      throw new InvalidStateError(`Attempt is already ${existing.status}`, {
        attemptId,
        status: existing.status,
      });
    }
    if (!Number.isInteger(input.score) || input.score < 0 || input.score > 100) {
      throw new ValidationError('Score must be an integer between 0 and 100', { score: input.score });
    }

    const submitted = await this.deps.attempts.submit(attemptId, {
      score: input.score,
      solution: input.solution,
      metadata: input.metadata,
    });
    if (!submitted) {
      // Scored between our read and the conditional update
      throw new InvalidStateError('Attempt was scored before the submission was recorded', { attemptId });
    }

    const log = getContextLogger();
    try {
      await this.deps.queue.enqueue(attemptId, 'submission');
      log.info({ attemptId, score: input.score }, 'Attempt submitted');
    } catch (err) {
      jobFailureTotal.inc({ stage: 'enqueue' });
      log.error({ err, attemptId }, 'Failed to enqueue award job; reconciliation will retry');
    }

    return submitted;
  }

  async get(attemptId: string, userId?: string): Promise<Attempt> {
    const attempt = await this.deps.attempts.get(attemptId);
    if (!attempt) {
      throw new NotFoundError('Attempt', attemptId);
    }
    if (userId !== undefined && attempt.userId !== userId) {
      throw new ForbiddenError('Attempt belongs to another user');
    }
    return attempt;
  }

  async list(userId: string, options: ListAttemptsOptions): Promise<Attempt[]> {
    return this.deps.attempts.listForUser(userId, options);
  }
}
