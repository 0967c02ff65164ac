/**
 * Service wiring.
 *
 * Builds the production object graph (Postgres stores, Redis or in-memory
 * rank cache, BullMQ producer) once per process. Routes reach it through
 * `app.services`; tests build the same shape from in-process stores.
 */

import { checkDatabaseConnection, db } from '../db';
import { AttemptLifecycle } from './attempt-state-machine';
import { PgAttemptStore } from './attempt-store';
import { AwardPipeline } from './award-pipeline';
import { BadgeService } from './badge-service';
import { PgBadgeStore } from './badge-store';
import { PgChallengeLookup } from './challenge-lookup';
import { env } from './env';
import { ProgressService } from './progress-service';
import {
  BullAwardJobQueue,
  getAllQueueStats,
  listDeadLetters,
  requeueDeadLetter,
  type AwardJobQueue,
  type DeadLetterView,
  type QueueStats,
} from './queue';
import { RedisRankCache, SkipListRankCache, type RankCache } from './rank-cache';
import { reconcileStaleAttempts, releaseDeadLetter } from './reconciliation';
import { checkRedisConnection, getRedis } from './redis';
import { RuleEngine } from './rule-engine';
import { PgLedgerStore } from './score-ledger';
import { PgUserDirectory, type UserDirectory } from './user-directory';

export interface QueueAdmin {
  getStats(): Promise<QueueStats[]>;
  listDeadLetters(limit: number): Promise<DeadLetterView[]>;
  /** Resolves to the requeued attempt id, or null for an unknown job */
  requeueDeadLetter(jobId: string): Promise<string | null>;
}

export interface HealthChecks {
  database(): Promise<boolean>;
  redis(): Promise<boolean>;
}

export interface Services {
  users: UserDirectory;
  attempts: AttemptLifecycle;
  progress: ProgressService;
  badges: BadgeService;
  pipeline: AwardPipeline;
  queueAdmin: QueueAdmin;
  health: HealthChecks;
  reconcile(staleAfterSeconds: number, batchSize: number): Promise<number>;
  /** Keeps a dead-lettered attempt out of reconciliation sweeps */
  markDeadLettered(attemptId: string): Promise<void>;
}

function createRankCache(): RankCache {
  if (env.RANK_CACHE_DRIVER === 'memory') {
    return new SkipListRankCache();
  }
  return new RedisRankCache(getRedis(), env.LEADERBOARD_KEY);
}

export function createServices(queue: AwardJobQueue = new BullAwardJobQueue()): Services {
  const users = new PgUserDirectory(db);
  const attemptStore = new PgAttemptStore(db);
  const challenges = new PgChallengeLookup(db);
  const ledger = new PgLedgerStore(db);
  const badgeStore = new PgBadgeStore(db);
  const rankCache = createRankCache();

  const ruleEngine = new RuleEngine({ attempts: attemptStore, ledger, badges: badgeStore });

  const pipeline = new AwardPipeline(
    { attempts: attemptStore, challenges, ledger, rankCache, ruleEngine },
    {
      passingScore: env.PASSING_SCORE,
      rankScoreFloor: env.RANK_SCORE_FLOOR,
      rankCacheRetryAttempts: env.RANK_CACHE_RETRY_ATTEMPTS,
      rankCacheRetryDelayMs: env.RANK_CACHE_RETRY_DELAY_MS,
    }
  );

  return {
    users,
    attempts: new AttemptLifecycle({ attempts: attemptStore, challenges, queue }),
    progress: new ProgressService({ users, attempts: attemptStore, ledger, badges: badgeStore, rankCache }),
    badges: new BadgeService(badgeStore),
    pipeline,
    queueAdmin: {
      getStats: getAllQueueStats,
      listDeadLetters,
      requeueDeadLetter: (jobId) => releaseDeadLetter({ attempts: attemptStore, requeue: requeueDeadLetter }, jobId),
    },
    health: {
      database: checkDatabaseConnection,
      redis: checkRedisConnection,
    },
    reconcile: (staleAfterSeconds, batchSize) =>
      reconcileStaleAttempts({ attempts: attemptStore, queue }, { staleAfterSeconds, batchSize }),
    markDeadLettered: (attemptId) => attemptStore.markDeadLettered(attemptId, new Date()),
  };
}
