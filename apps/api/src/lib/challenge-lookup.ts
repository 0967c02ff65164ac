import { eq } from 'drizzle-orm';

import type { Database } from '../db';
import { challenges } from '../db/schema';

export interface ChallengeInfo {
  id: string;
  title: string;
  xp: number;
  published: boolean;
}

export interface ChallengeLookup {
  get(challengeId: string): Promise<ChallengeInfo | null>;
}

export class PgChallengeLookup implements ChallengeLookup {
  constructor(private readonly db: Database) {}

  async get(challengeId: string): Promise<ChallengeInfo | null> {
    const [challenge] = await this.db
      .select({
        id: challenges.id,
        title: challenges.title,
        xp: challenges.xp,
        published: challenges.published,
      })
      .from(challenges)
      .where(eq(challenges.id, challengeId))
      .limit(1);
    return challenge ?? null;
  }
}
