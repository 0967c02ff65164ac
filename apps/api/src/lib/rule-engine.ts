/**
 * Badge rule engine.
 *
 * Evaluates every badge the user does not hold yet against facts read at
 * evaluation time. Each decision depends only on the user's current facts,
 * never on the order in which attempts were scored. Awards are conditional
 * inserts, so concurrent evaluations for one user grant a badge once.
 */

import type { BadgeCondition } from '@questline/shared';

import type { AttemptStore } from './attempt-store';
import { parseBadgeCondition } from './badge-conditions';
import type { BadgeStore } from './badge-store';
import { getContextLogger } from './logger';
import { badgesAwardedTotal } from './metrics';
import type { LedgerStore } from './score-ledger';

export interface RuleEngineDeps {
  attempts: AttemptStore;
  ledger: LedgerStore;
  badges: BadgeStore;
}

const DAY_MS = 24 * 60 * 60 * 1000;

/**
 * Longest run of consecutive calendar dates in a list of YYYY-MM-DD strings
 */
export function longestDailyStreak(dates: string[]): number {
  const days = [...new Set(dates)]
    .map((date) => Date.parse(`${date}T00:00:00Z`))
    .filter((time) => !Number.isNaN(time))
    .sort((a, b) => a - b);

  let longest = 0;
  let current = 0;
  let previous: number | null = null;

  for (const day of days) {
    current = previous !== null && day - previous === DAY_MS ? current + 1 : 1;
    longest = Math.max(longest, current);
    previous = day;
  }

  return longest;
}

/**
 * Facts are loaded lazily, once per evaluation
 */
class UserFacts {
  private totalXp?: Promise<number>;
  private readonly counts = new Map<string, Promise<number>>();
  private streak?: Promise<number>;

  constructor(
    private readonly userId: string,
    private readonly deps: RuleEngineDeps
  ) {}

  getTotalXp(): Promise<number> {
    if (!this.totalXp) {
      this.totalXp = this.deps.ledger.getTotal(this.userId);
    }
    return this.totalXp;
  }

  getCount(status: 'passed' | 'failed'): Promise<number> {
    let count = this.counts.get(status);
    if (!count) {
      count = this.deps.attempts.countByStatus(this.userId, status);
      this.counts.set(status, count);
    }
    return count;
  }

  getStreak(): Promise<number> {
    if (!this.streak) {
      this.streak = this.deps.attempts.activityDates(this.userId).then(longestDailyStreak);
    }
    return this.streak;
  }
}

async function isSatisfied(condition: BadgeCondition, facts: UserFacts): Promise<boolean> {
  switch (condition.type) {
    case 'xp':
      return (await facts.getTotalXp()) >= condition.threshold;
    case 'attempt_count':
      return (await facts.getCount(condition.status)) >= condition.count;
    case 'consecutive_days':
      return (await facts.getStreak()) >= condition.days;
    default: {
      const unreachable: never = condition;
      throw new Error(`Unhandled badge condition: ${JSON.stringify(unreachable)}`);
    }
  }
}

export class RuleEngine {
  constructor(private readonly deps: RuleEngineDeps) {}

  /**
   * Award every badge the user newly qualifies for.
   * Returns only the badges whose award row this call created.
   */
  async evaluate(userId: string): Promise<string[]> {
    const log = getContextLogger();
    const [definitions, awardedIds] = await Promise.all([
      this.deps.badges.listDefinitions(),
      this.deps.badges.listAwardedBadgeIds(userId),
    ]);

    const held = new Set(awardedIds);
    const facts = new UserFacts(userId, this.deps);
    const newlyAwarded: string[] = [];

    for (const badge of definitions) {
      if (held.has(badge.id)) {
        continue;
      }

      const condition = parseBadgeCondition(badge.condition);
      if (!condition) {
        log.warn({ badgeId: badge.id, condition: badge.condition }, 'Skipping badge with malformed condition');
        continue;
      }

      if (!(await isSatisfied(condition, facts))) {
        continue;
      }

      const created = await this.deps.badges.insertAward(userId, badge.id, { condition: condition.type });
      if (created) {
        newlyAwarded.push(badge.id);
        badgesAwardedTotal.inc({ condition_type: condition.type });
        log.info({ userId, badgeId: badge.id, badgeName: badge.name }, 'Badge awarded');
      }
    }

    return newlyAwarded;
  }
}
