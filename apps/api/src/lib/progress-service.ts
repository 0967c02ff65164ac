/**
 * Read path: user progress and the global leaderboard.
 *
 * Totals come from the ledger; rank and ordering come from the rank cache.
 */

import {
  calculateLevel,
  nextLevelXp,
  xpToNextLevel,
  type AttemptSummary,
  type LeaderboardEntry,
  type LeaderboardResponse,
  type UserProgress,
} from '@questline/shared';

import type { Attempt, AttemptStore } from './attempt-store';
import type { BadgeStore } from './badge-store';
import { NotFoundError } from './errors';
import { getContextLogger } from './logger';
import type { RankCache } from './rank-cache';
import type { LedgerStore } from './score-ledger';
import type { UserDirectory } from './user-directory';

const RECENT_ATTEMPTS_LIMIT = 5;

export interface ProgressServiceDeps {
  users: UserDirectory;
  attempts: AttemptStore;
  ledger: LedgerStore;
  badges: BadgeStore;
  rankCache: RankCache;
}

export function toAttemptSummary(attempt: Attempt): AttemptSummary {
  return {
    id: attempt.id,
    challengeId: attempt.challengeId,
    status: attempt.status,
    score: attempt.score,
    xpAwarded: attempt.xpAwarded,
    startedAt: attempt.startedAt.toISOString(),
    submittedAt: attempt.submittedAt ? attempt.submittedAt.toISOString() : null,
  };
}

export class ProgressService {
  constructor(private readonly deps: ProgressServiceDeps) {}

  async getProgress(userId: string): Promise<UserProgress> {
    const user = await this.deps.users.get(userId);
    if (!user) {
      throw new NotFoundError('User', userId);
    }

    const [totalXp, rank, challengesCompleted, badgeCount, recent] = await Promise.all([
      this.deps.ledger.getTotal(userId),
      this.rankOf(userId),
      this.deps.attempts.countByStatus(userId, 'passed'),
      this.deps.badges.countAwards(userId),
      this.deps.attempts.listForUser(userId, { limit: RECENT_ATTEMPTS_LIMIT }),
    ]);

    const level = calculateLevel(totalXp);

    return {
      userId,
      username: user.username,
      totalXp,
      level,
      nextLevelXp: nextLevelXp(level),
      xpToNextLevel: xpToNextLevel(totalXp),
      rank,
      challengesCompleted,
      badgeCount,
      recentAttempts: recent.map(toAttemptSummary),
    };
  }

  async getLeaderboard(limit: number): Promise<LeaderboardResponse> {
    const [top, totalCount] = await Promise.all([this.deps.rankCache.topK(limit), this.deps.rankCache.size()]);
    const users = await this.deps.users.getMany(top.map((entry) => entry.userId));

    const entries: LeaderboardEntry[] = top.map((entry, index) => ({
      userId: entry.userId,
      username: users.get(entry.userId)?.username ?? null,
      totalXp: entry.score,
      level: calculateLevel(entry.score),
      rank: index + 1,
    }));

    return { entries, totalCount };
  }

  /**
   * Progress stays readable while the rank cache is down
   */
  private async rankOf(userId: string): Promise<number | null> {
    try {
      return await this.deps.rankCache.rankOf(userId);
    } catch (err) {
      getContextLogger().warn({ err, userId }, 'Rank cache unavailable, omitting rank');
      return null;
    }
  }
}
