import { and, desc, eq, inArray, isNotNull, isNull, lt, sql } from 'drizzle-orm';
import type { AttemptStatus, TerminalAttemptStatus } from '@questline/shared';

import type { Database } from '../db';
import { attempts, type Attempt } from '../db/schema';

export type { Attempt };

export interface SubmissionFields {
  score: number;
  solution?: string | null;
  metadata?: Record<string, unknown> | null;
}

export interface ScoringFields {
  /** Score the award was computed from; the transition misses if the row holds another */
  score: number;
  xpAwarded: number;
  scoredAt: Date;
}

export interface ListAttemptsOptions {
  limit: number;
  offset?: number;
  status?: AttemptStatus;
}

/**
 * Attempt persistence. Every mutation is conditional on the current status
 * and returns null when the condition did not hold.
 */
export interface AttemptStore {
  get(attemptId: string): Promise<Attempt | null>;
  create(userId: string, challengeId: string): Promise<Attempt>;
  /** Moves a started or submitted attempt to submitted, overwriting the pending answer */
  submit(attemptId: string, fields: SubmissionFields): Promise<Attempt | null>;
  conditionalTransition(
    attemptId: string,
    from: AttemptStatus,
    to: AttemptStatus,
    fields: ScoringFields
  ): Promise<Attempt | null>;
  countByStatus(userId: string, status: TerminalAttemptStatus): Promise<number>;
  /** Distinct UTC dates (YYYY-MM-DD) on which the user's terminal attempts were submitted */
  activityDates(userId: string): Promise<string[]>;
  /** Submitted attempts older than the cutoff, oldest first, excluding dead-lettered ones */
  findStaleSubmitted(olderThan: Date, limit: number): Promise<Attempt[]>;
  markDeadLettered(attemptId: string, at: Date): Promise<void>;
  clearDeadLettered(attemptId: string): Promise<void>;
  listForUser(userId: string, options: ListAttemptsOptions): Promise<Attempt[]>;
}

const TERMINAL: TerminalAttemptStatus[] = ['passed', 'failed'];

export class PgAttemptStore implements AttemptStore {
  constructor(private readonly db: Database) {}

  async get(attemptId: string): Promise<Attempt | null> {
    const [attempt] = await this.db.select().from(attempts).where(eq(attempts.id, attemptId)).limit(1);
    return attempt ?? null;
  }

  async create(userId: string, challengeId: string): Promise<Attempt> {
    const [attempt] = await this.db
      .insert(attempts)
      .values({ userId, challengeId, status: 'started' })
      .returning();
    return attempt;
  }

  async submit(attemptId: string, fields: SubmissionFields): Promise<Attempt | null> {
    const [attempt] = await this.db
      .update(attempts)
      .set({
        status: 'submitted',
        score: fields.score,
        solution: fields.solution ?? null,
        metadata: fields.metadata ?? null,
        submittedAt: new Date(),
        deadLetteredAt: null,
      })
      .where(and(eq(attempts.id, attemptId), inArray(attempts.status, ['started', 'submitted'])))
      .returning();
    return attempt ?? null;
  }

  async conditionalTransition(
    attemptId: string,
    from: AttemptStatus,
    to: AttemptStatus,
    fields: ScoringFields
  ): Promise<Attempt | null> {
    const [attempt] = await this.db
      .update(attempts)
      .set({ status: to, xpAwarded: fields.xpAwarded, scoredAt: fields.scoredAt })
      .where(and(eq(attempts.id, attemptId), eq(attempts.status, from), eq(attempts.score, fields.score)))
      .returning();
    return attempt ?? null;
  }

  async countByStatus(userId: string, status: TerminalAttemptStatus): Promise<number> {
    const [row] = await this.db
      .select({ count: sql<number>`count(*)::int` })
      .from(attempts)
      .where(and(eq(attempts.userId, userId), eq(attempts.status, status)));
    return row?.count ?? 0;
  }

  async activityDates(userId: string): Promise<string[]> {
    const rows = await this.db
      .selectDistinct({
        day: sql<string>`to_char(${attempts.submittedAt} at time zone 'UTC', 'YYYY-MM-DD')`,
      })
      .from(attempts)
      .where(
        and(
          eq(attempts.userId, userId),
          inArray(attempts.status, TERMINAL),
          isNotNull(attempts.submittedAt)
        )
      );
    return rows.map((row) => row.day);
  }

  async findStaleSubmitted(olderThan: Date, limit: number): Promise<Attempt[]> {
    return this.db
      .select()
      .from(attempts)
      .where(
        and(
          eq(attempts.status, 'submitted'),
          lt(attempts.submittedAt, olderThan),
          isNull(attempts.deadLetteredAt)
        )
      )
      .orderBy(attempts.submittedAt)
      .limit(limit);
  }

  async markDeadLettered(attemptId: string, at: Date): Promise<void> {
    await this.db
      .update(attempts)
      .set({ deadLetteredAt: at })
      .where(and(eq(attempts.id, attemptId), eq(attempts.status, 'submitted')));
  }

  async clearDeadLettered(attemptId: string): Promise<void> {
    await this.db.update(attempts).set({ deadLetteredAt: null }).where(eq(attempts.id, attemptId));
  }

  async listForUser(userId: string, options: ListAttemptsOptions): Promise<Attempt[]> {
    const conditions = [eq(attempts.userId, userId)];
    if (options.status) {
      conditions.push(eq(attempts.status, options.status));
    }

    return this.db
      .select()
      .from(attempts)
      .where(and(...conditions))
      .orderBy(desc(attempts.startedAt))
      .limit(options.limit)
      .offset(options.offset ?? 0);
  }
}
