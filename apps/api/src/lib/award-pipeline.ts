/**
 * Award Pipeline
 *
 * process(attemptId):
 * 1. Load the attempt. Missing → NotFound; never submitted → InvalidState.
 * 2. Compute XP and pass/fail from the challenge and the recorded score.
 * 3. Conditional transition submitted → passed|failed, persisting xp_awarded.
 *    The transition also requires the score read in step 1; a miss re-reads
 *    the attempt and starts over.
 * 4. Ledger award keyed by the attempt id.
 * 5. Rank cache write with the ledger's freshly read total.
 * 6. Badge rule evaluation.
 *
 * A terminal attempt whose ledger entry is missing (a crash between steps 3
 * and 4) resumes at step 4. A terminal attempt with a ledger entry awards
 * nothing; steps 5 and 6 still run, since a failure in either is what gets
 * a job redelivered after the ledger write. Every step is idempotent, so
 * redelivery and concurrent runs for the same user are safe.
 */

import type { TerminalAttemptStatus } from '@questline/shared';

import type { Attempt, AttemptStore } from './attempt-store';
import type { ChallengeLookup } from './challenge-lookup';
import { AppError, InvalidStateError, NotFoundError, TransientStoreFailureError } from './errors';
import { getContextLogger } from './logger';
import { ledgerDuplicateTotal, rankCacheRetryTotal, recordAwardOutcome } from './metrics';
import type { RankCache } from './rank-cache';
import { withRetry } from './retry';
import type { RuleEngine } from './rule-engine';
import { computeAward, type LedgerStore } from './score-ledger';

export type AwardOutcome = 'scored' | 'resumed' | 'noop';

export interface AwardPipelineResult {
  attemptId: string;
  outcome: AwardOutcome;
  status?: TerminalAttemptStatus;
  xpAwarded: number;
  totalXp?: number;
  newBadgeIds: string[];
}

export interface AwardPipelineConfig {
  passingScore: number;
  /** Totals at or below the floor are kept out of the rank cache */
  rankScoreFloor: number;
  rankCacheRetryAttempts: number;
  rankCacheRetryDelayMs: number;
}

export interface AwardPipelineDeps {
  attempts: AttemptStore;
  challenges: ChallengeLookup;
  ledger: LedgerStore;
  rankCache: RankCache;
  ruleEngine: RuleEngine;
}

// Bounds the read-write-verify loop when other writers keep moving the total
const MAX_RANK_SYNC_ROUNDS = 5;
// Bounds re-scoring when re-submissions keep replacing the score mid-run
const MAX_SCORING_ROUNDS = 3;

export class AwardPipeline {
  constructor(
    private readonly deps: AwardPipelineDeps,
    private readonly config: AwardPipelineConfig
  ) {}

  async process(attemptId: string): Promise<AwardPipelineResult> {
    const startTime = process.hrtime.bigint();
    try {
      const result = await this.run(attemptId);
      const durationSeconds = Number(process.hrtime.bigint() - startTime) / 1e9;
      const label = result.outcome === 'scored' ? result.status : result.outcome;
      if (label) {
        recordAwardOutcome(label, durationSeconds);
      }
      return result;
    } catch (error) {
      if (error instanceof AppError) {
        throw error;
      }
      throw new TransientStoreFailureError(`Award pipeline failed for attempt ${attemptId}`, error);
    }
  }

  private async run(attemptId: string): Promise<AwardPipelineResult> {
    const log = getContextLogger();

    for (let round = 0; round < MAX_SCORING_ROUNDS; round++) {
      const attempt = await this.deps.attempts.get(attemptId);
      if (!attempt) {
        throw new NotFoundError('Attempt', attemptId);
      }

      switch (attempt.status) {
        case 'started':
          throw new InvalidStateError('Attempt has not been submitted', { attemptId });
        case 'passed':
        case 'failed':
          return this.completeTerminal(attempt);
        case 'submitted':
          break;
      }

      const challenge = await this.deps.challenges.get(attempt.challengeId);
      if (!challenge) {
        throw new NotFoundError('Challenge', attempt.challengeId);
      }

      const score = attempt.score ?? 0;
      const award = computeAward(challenge.xp, score, this.config.passingScore);

      // Only applies while the row still holds the score the award was computed from
      const scored = await this.deps.attempts.conditionalTransition(attemptId, 'submitted', award.status, {
        score,
        xpAwarded: award.xpAwarded,
        scoredAt: new Date(),
      });

      if (!scored) {
        // Another run scored it first, or a re-submission replaced the score
        log.debug({ attemptId, round }, 'Scoring transition missed, re-reading attempt');
        continue;
      }

      log.info(
        { attemptId, userId: attempt.userId, status: award.status, xpAwarded: award.xpAwarded },
        'Attempt scored'
      );

      const { totalXp, newBadgeIds } = await this.applyEffects(attempt.userId, attemptId, award.xpAwarded);

      return {
        attemptId,
        outcome: 'scored',
        status: award.status,
        xpAwarded: award.xpAwarded,
        totalXp,
        newBadgeIds,
      };
    }

    throw new TransientStoreFailureError(`Attempt ${attemptId} changed on every scoring round`);
  }

  /**
   * Terminal attempts either finished every step already or stopped between
   * the transition and the ledger write
   */
  private async completeTerminal(attempt: Attempt): Promise<AwardPipelineResult> {
    const xpAwarded = attempt.xpAwarded ?? 0;
    const status = attempt.status === 'passed' ? 'passed' : 'failed';

    if (await this.deps.ledger.hasEntry(attempt.id)) {
      getContextLogger().debug({ attemptId: attempt.id }, 'Attempt already awarded');
      const newBadgeIds = await this.refreshDerived(attempt.userId);
      return { attemptId: attempt.id, outcome: 'noop', status, xpAwarded, newBadgeIds };
    }

    getContextLogger().warn({ attemptId: attempt.id }, 'Resuming award for scored attempt without ledger entry');
    const { totalXp, newBadgeIds } = await this.applyEffects(attempt.userId, attempt.id, xpAwarded);

    return { attemptId: attempt.id, outcome: 'resumed', status, xpAwarded, totalXp, newBadgeIds };
  }

  private async applyEffects(
    userId: string,
    attemptId: string,
    xpAwarded: number
  ): Promise<{ totalXp: number; newBadgeIds: string[] }> {
    const { totalXp, applied } = await this.deps.ledger.atomicAward(userId, attemptId, xpAwarded);
    if (!applied) {
      ledgerDuplicateTotal.inc();
    }

    const newBadgeIds = await this.refreshDerived(userId);
    return { totalXp, newBadgeIds };
  }

  /**
   * Steps 5 and 6: state derived from the ledger total
   */
  private async refreshDerived(userId: string): Promise<string[]> {
    await this.syncRankCache(userId);
    return this.deps.ruleEngine.evaluate(userId);
  }

  /**
   * Write the ledger's current total to the rank cache, then confirm the
   * ledger did not move underneath the write. A concurrent pipeline for the
   * same user may have written an older total after ours; re-reading until
   * the total is stable leaves the cache at the latest value.
   */
  private async syncRankCache(userId: string): Promise<void> {
    await withRetry(
      async () => {
        let total = await this.deps.ledger.getTotal(userId);

        for (let round = 0; round < MAX_RANK_SYNC_ROUNDS; round++) {
          if (total > this.config.rankScoreFloor) {
            await this.deps.rankCache.update(userId, total);
          }
          const latest = await this.deps.ledger.getTotal(userId);
          if (latest === total) {
            return total;
          }
          total = latest;
        }

        if (total > this.config.rankScoreFloor) {
          await this.deps.rankCache.update(userId, total);
        }
        return total;
      },
      {
        maxAttempts: this.config.rankCacheRetryAttempts,
        initialDelayMs: this.config.rankCacheRetryDelayMs,
        shouldRetry: () => true,
        onRetry: () => rankCacheRetryTotal.inc(),
      },
      'rank-cache-sync'
    );
  }
}
