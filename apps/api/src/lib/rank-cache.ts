/**
 * Rank cache: the leaderboard's ordered view of user totals.
 *
 * Order is total XP descending, ties broken by ascending user id. Entries
 * are overwritten with the ledger's total, never incremented, so a stale
 * writer is corrected by the next write from the same pipeline.
 */

import type { Redis } from 'ioredis';

import { RankSkipList } from './skip-list';

export interface RankEntry {
  userId: string;
  score: number;
}

export interface RankCache {
  update(userId: string, score: number): Promise<void>;
  topK(k: number): Promise<RankEntry[]>;
  /** 1-based rank, or null when the user has no entry */
  rankOf(userId: string): Promise<number | null>;
  get(userId: string): Promise<number | null>;
  size(): Promise<number>;
}

/**
 * Sorted set backend. Scores are stored negated so that ascending
 * ZRANGE/ZRANK order is highest XP first, with Redis' lexicographic
 * member order breaking ties.
 */
export class RedisRankCache implements RankCache {
  constructor(
    private readonly redis: Redis,
    private readonly key: string
  ) {}

  async update(userId: string, score: number): Promise<void> {
    await this.redis.zadd(this.key, -score, userId);
  }

  async topK(k: number): Promise<RankEntry[]> {
    if (k <= 0) {
      return [];
    }

    const raw = await this.redis.zrange(this.key, 0, k - 1, 'WITHSCORES');
    const entries: RankEntry[] = [];
    for (let i = 0; i + 1 < raw.length; i += 2) {
      entries.push({ userId: raw[i], score: 0 - Number(raw[i + 1]) });
    }
    return entries;
  }

  async rankOf(userId: string): Promise<number | null> {
    const rank = await this.redis.zrank(this.key, userId);
    return rank === null ? null : rank + 1;
  }

  async get(userId: string): Promise<number | null> {
    const score = await this.redis.zscore(this.key, userId);
    return score === null ? null : 0 - Number(score);
  }

  async size(): Promise<number> {
    return this.redis.zcard(this.key);
  }
}

/**
 * In-process backend for single-node deployments and tests
 */
export class SkipListRankCache implements RankCache {
  private readonly list: RankSkipList;

  constructor(random?: () => number) {
    this.list = new RankSkipList(random);
  }

  async update(userId: string, score: number): Promise<void> {
    this.list.set(userId, score);
  }

  async topK(k: number): Promise<RankEntry[]> {
    return this.list.range(0, k).map(({ member, score }) => ({ userId: member, score }));
  }

  async rankOf(userId: string): Promise<number | null> {
    return this.list.rank(userId);
  }

  async get(userId: string): Promise<number | null> {
    return this.list.score(userId);
  }

  async size(): Promise<number> {
    return this.list.size;
  }
}
