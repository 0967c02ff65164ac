/**
 * In-process stand-ins for the store interfaces.
 *
 * Each operation yields once before touching state and then runs without
 * further awaits, mirroring a single conditional SQL statement: concurrent
 * callers interleave between operations but never inside one.
 */

import type { AttemptStatus, TerminalAttemptStatus } from '@questline/shared';

import type {
  Attempt,
  AttemptStore,
  ListAttemptsOptions,
  ScoringFields,
  SubmissionFields,
} from '../lib/attempt-store';
import type { AwardedBadge, Badge, BadgeStore, NewBadgeDefinition } from '../lib/badge-store';
import type { ChallengeInfo, ChallengeLookup } from '../lib/challenge-lookup';
import { ConflictError } from '../lib/errors';
import type { AwardJobQueue, AwardJobReason } from '../lib/queue';
import type { AwardResult, LedgerStore } from '../lib/score-ledger';
import type { UserDirectory, UserSummary } from '../lib/user-directory';

const yieldTurn = () => Promise.resolve();

/** Sequential ids in UUID form, so route parameter validation accepts them */
export function testUuid(sequence: number): string {
  return `00000000-0000-4000-8000-${String(sequence).padStart(12, '0')}`;
}

export class InMemoryAttemptStore implements AttemptStore {
  readonly rows = new Map<string, Attempt>();
  private sequence = 0;

  /** Insert a row directly, bypassing the lifecycle */
  seed(fields: Partial<Attempt> & Pick<Attempt, 'userId' | 'challengeId'>): Attempt {
    this.sequence++;
    const attempt: Attempt = {
      id: testUuid(this.sequence),
      status: 'started',
      score: null,
      xpAwarded: null,
      solution: null,
      metadata: null,
      startedAt: new Date('2026-01-01T00:00:00Z'),
      submittedAt: null,
      scoredAt: null,
      deadLetteredAt: null,
      ...fields,
    };
    this.rows.set(attempt.id, attempt);
    return attempt;
  }

  async get(attemptId: string): Promise<Attempt | null> {
    await yieldTurn();
    const attempt = this.rows.get(attemptId);
    return attempt ? { ...attempt } : null;
  }

  async create(userId: string, challengeId: string): Promise<Attempt> {
    await yieldTurn();
    return { ...this.seed({ userId, challengeId, startedAt: new Date() }) };
  }

  async submit(attemptId: string, fields: SubmissionFields): Promise<Attempt | null> {
    await yieldTurn();
    const attempt = this.rows.get(attemptId);
    if (!attempt || (attempt.status !== 'started' && attempt.status !== 'submitted')) {
      return null;
    }
    const updated: Attempt = {
      ...attempt,
      status: 'submitted',
      score: fields.score,
      solution: fields.solution ?? null,
      metadata: fields.metadata ?? null,
      submittedAt: new Date(),
      deadLetteredAt: null,
    };
    this.rows.set(attemptId, updated);
    return { ...updated };
  }

  async conditionalTransition(
    attemptId: string,
    from: AttemptStatus,
    to: AttemptStatus,
    fields: ScoringFields
  ): Promise<Attempt | null> {
    await yieldTurn();
    const attempt = this.rows.get(attemptId);
    if (!attempt || attempt.status !== from || attempt.score !== fields.score) {
      return null;
    }
    const updated: Attempt = { ...attempt, status: to, xpAwarded: fields.xpAwarded, scoredAt: fields.scoredAt };
    this.rows.set(attemptId, updated);
    return { ...updated };
  }

  async countByStatus(userId: string, status: TerminalAttemptStatus): Promise<number> {
    await yieldTurn();
    return [...this.rows.values()].filter((a) => a.userId === userId && a.status === status).length;
  }

  async activityDates(userId: string): Promise<string[]> {
    await yieldTurn();
    const days = new Set<string>();
    for (const attempt of this.rows.values()) {
      if (
        attempt.userId === userId &&
        (attempt.status === 'passed' || attempt.status === 'failed') &&
        attempt.submittedAt
      ) {
        days.add(attempt.submittedAt.toISOString().slice(0, 10));
      }
    }
    return [...days];
  }

  async findStaleSubmitted(olderThan: Date, limit: number): Promise<Attempt[]> {
    await yieldTurn();
    return [...this.rows.values()]
      .filter(
        (a) =>
          a.status === 'submitted' && a.submittedAt !== null && a.submittedAt < olderThan && a.deadLetteredAt === null
      )
      .sort((a, b) => (a.submittedAt?.getTime() ?? 0) - (b.submittedAt?.getTime() ?? 0))
      .slice(0, limit)
      .map((a) => ({ ...a }));
  }

  async markDeadLettered(attemptId: string, at: Date): Promise<void> {
    await yieldTurn();
    const attempt = this.rows.get(attemptId);
    if (attempt && attempt.status === 'submitted') {
      this.rows.set(attemptId, { ...attempt, deadLetteredAt: at });
    }
  }

  async clearDeadLettered(attemptId: string): Promise<void> {
    await yieldTurn();
    const attempt = this.rows.get(attemptId);
    if (attempt) {
      this.rows.set(attemptId, { ...attempt, deadLetteredAt: null });
    }
  }

  async listForUser(userId: string, options: ListAttemptsOptions): Promise<Attempt[]> {
    await yieldTurn();
    const offset = options.offset ?? 0;
    return [...this.rows.values()]
      .filter((a) => a.userId === userId && (!options.status || a.status === options.status))
      .sort((a, b) => b.startedAt.getTime() - a.startedAt.getTime())
      .slice(offset, offset + options.limit)
      .map((a) => ({ ...a }));
  }
}

export class InMemoryLedgerStore implements LedgerStore {
  readonly entries = new Map<string, { userId: string; delta: number }>();
  readonly totals = new Map<string, number>();

  async atomicAward(userId: string, attemptId: string, delta: number): Promise<AwardResult> {
    await yieldTurn();
    if (this.entries.has(attemptId)) {
      return { totalXp: this.totals.get(userId) ?? 0, applied: false };
    }
    this.entries.set(attemptId, { userId, delta });
    const totalXp = (this.totals.get(userId) ?? 0) + delta;
    this.totals.set(userId, totalXp);
    return { totalXp, applied: true };
  }

  async getTotal(userId: string): Promise<number> {
    await yieldTurn();
    return this.totals.get(userId) ?? 0;
  }

  async hasEntry(attemptId: string): Promise<boolean> {
    await yieldTurn();
    return this.entries.has(attemptId);
  }
}

export class InMemoryChallengeLookup implements ChallengeLookup {
  readonly rows = new Map<string, ChallengeInfo>();

  add(challenge: ChallengeInfo): ChallengeInfo {
    this.rows.set(challenge.id, challenge);
    return challenge;
  }

  async get(challengeId: string): Promise<ChallengeInfo | null> {
    await yieldTurn();
    return this.rows.get(challengeId) ?? null;
  }
}

export class InMemoryBadgeStore implements BadgeStore {
  readonly definitions: Badge[] = [];
  readonly awards: Array<{ id: string; userId: string; badgeId: string; awardedAt: Date; metadata: Record<string, unknown> | null }> = [];
  private sequence = 0;

  /** Add a definition with an arbitrary stored condition */
  seed(name: string, condition: Record<string, unknown>): Badge {
    this.sequence++;
    const badge: Badge = {
      id: `badge-${this.sequence}`,
      name,
      description: `${name} description`,
      condition,
      iconUrl: null,
      createdAt: new Date('2026-01-01T00:00:00Z'),
    };
    this.definitions.push(badge);
    return badge;
  }

  async listDefinitions(): Promise<Badge[]> {
    await yieldTurn();
    return [...this.definitions];
  }

  async listAwardedBadgeIds(userId: string): Promise<string[]> {
    await yieldTurn();
    return this.awards.filter((a) => a.userId === userId).map((a) => a.badgeId);
  }

  async insertAward(userId: string, badgeId: string, metadata?: Record<string, unknown>): Promise<boolean> {
    await yieldTurn();
    if (this.awards.some((a) => a.userId === userId && a.badgeId === badgeId)) {
      return false;
    }
    this.awards.push({
      id: `award-${this.awards.length + 1}`,
      userId,
      badgeId,
      awardedAt: new Date(),
      metadata: metadata ?? null,
    });
    return true;
  }

  async listAwards(userId: string): Promise<AwardedBadge[]> {
    await yieldTurn();
    const result: AwardedBadge[] = [];
    for (const award of this.awards) {
      const badge = this.definitions.find((d) => d.id === award.badgeId);
      if (award.userId === userId && badge) {
        result.push({
          id: award.id,
          badgeId: badge.id,
          badgeName: badge.name,
          badgeDescription: badge.description,
          badgeIconUrl: badge.iconUrl,
          awardedAt: award.awardedAt,
          metadata: award.metadata,
        });
      }
    }
    return result;
  }

  async countAwards(userId: string): Promise<number> {
    await yieldTurn();
    return this.awards.filter((a) => a.userId === userId).length;
  }

  async createDefinition(definition: NewBadgeDefinition): Promise<Badge> {
    await yieldTurn();
    if (this.definitions.some((d) => d.name === definition.name)) {
      throw new ConflictError(`Badge named '${definition.name}' already exists`);
    }
    const badge = this.seed(definition.name, { ...definition.condition });
    badge.description = definition.description;
    badge.iconUrl = definition.iconUrl ?? null;
    return badge;
  }
}

export class InMemoryUserDirectory implements UserDirectory {
  readonly rows = new Map<string, UserSummary>();

  add(user: UserSummary): UserSummary {
    this.rows.set(user.id, user);
    return user;
  }

  async get(userId: string): Promise<UserSummary | null> {
    await yieldTurn();
    return this.rows.get(userId) ?? null;
  }

  async getMany(userIds: string[]): Promise<Map<string, UserSummary>> {
    await yieldTurn();
    const found = new Map<string, UserSummary>();
    for (const id of userIds) {
      const user = this.rows.get(id);
      if (user) {
        found.set(id, user);
      }
    }
    return found;
  }
}

export class InMemoryAwardQueue implements AwardJobQueue {
  readonly enqueued: Array<{ attemptId: string; reason: AwardJobReason }> = [];
  readonly deadLetters: Array<{ attemptId: string; reason: string; attemptsMade: number }> = [];

  async enqueue(attemptId: string, reason: AwardJobReason): Promise<void> {
    await yieldTurn();
    this.enqueued.push({ attemptId, reason });
  }

  async deadLetter(attemptId: string, reason: string, attemptsMade: number): Promise<void> {
    await yieldTurn();
    this.deadLetters.push({ attemptId, reason, attemptsMade });
  }
}
