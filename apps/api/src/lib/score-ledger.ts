/**
 * Score ledger: the authoritative per-user XP total.
 *
 * `atomicAward` is one statement. The ledger-entry insert is keyed by the
 * attempt id and does nothing on conflict; its RETURNING feeds the upsert
 * that increments the user's total, so a duplicate award never reaches the
 * increment. Totals are never read, modified and written back.
 */

import { calculateXpAwarded, isPassingScore } from '@questline/shared';
import type { TerminalAttemptStatus } from '@questline/shared';
import { eq, sql } from 'drizzle-orm';

import type { Database } from '../db';
import { userScores, xpLedgerEntries } from '../db/schema';

export interface AwardResult {
  totalXp: number;
  /** False when the attempt was already in the ledger */
  applied: boolean;
}

export interface LedgerStore {
  atomicAward(userId: string, attemptId: string, delta: number): Promise<AwardResult>;
  getTotal(userId: string): Promise<number>;
  hasEntry(attemptId: string): Promise<boolean>;
}

export interface ComputedAward {
  xpAwarded: number;
  status: TerminalAttemptStatus;
}

/**
 * XP and outcome for a scored attempt. Failing scores still earn their
 * proportional XP.
 */
export function computeAward(challengeXp: number, score: number, passingScore: number): ComputedAward {
  return {
    xpAwarded: calculateXpAwarded(challengeXp, score),
    status: isPassingScore(score, passingScore) ? 'passed' : 'failed',
  };
}

export class PgLedgerStore implements LedgerStore {
  constructor(private readonly db: Database) {}

  async atomicAward(userId: string, attemptId: string, delta: number): Promise<AwardResult> {
    const result = await this.db.execute<{ total_xp: number }>(sql`
      WITH inserted AS (
        INSERT INTO xp_ledger_entries (attempt_id, user_id, delta)
        VALUES (${attemptId}, ${userId}, ${delta})
        ON CONFLICT (attempt_id) DO NOTHING
        RETURNING user_id, delta
      )
      INSERT INTO user_scores (user_id, total_xp, level, updated_at)
      SELECT user_id, delta, floor(sqrt(delta / 100.0))::int + 1, now()
      FROM inserted
      ON CONFLICT (user_id) DO UPDATE
        SET total_xp = user_scores.total_xp + excluded.total_xp,
            level = floor(sqrt((user_scores.total_xp + excluded.total_xp) / 100.0))::int + 1,
            updated_at = now()
      RETURNING total_xp
    `);

    const row = result.rows[0];
    if (row) {
      return { totalXp: Number(row.total_xp), applied: true };
    }

    return { totalXp: await this.getTotal(userId), applied: false };
  }

  async getTotal(userId: string): Promise<number> {
    const [row] = await this.db
      .select({ totalXp: userScores.totalXp })
      .from(userScores)
      .where(eq(userScores.userId, userId))
      .limit(1);
    return row?.totalXp ?? 0;
  }

  async hasEntry(attemptId: string): Promise<boolean> {
    const [row] = await this.db
      .select({ id: xpLedgerEntries.id })
      .from(xpLedgerEntries)
      .where(eq(xpLedgerEntries.attemptId, attemptId))
      .limit(1);
    return row !== undefined;
  }
}
