import { count, desc, eq } from 'drizzle-orm';
import type { BadgeCondition } from '@questline/shared';

import type { Database } from '../db';
import { badges, userBadges, type Badge } from '../db/schema';
import { ConflictError } from './errors';

export type { Badge };

export interface NewBadgeDefinition {
  name: string;
  description: string;
  condition: BadgeCondition;
  iconUrl?: string | null;
}

export interface AwardedBadge {
  id: string;
  badgeId: string;
  badgeName: string;
  badgeDescription: string;
  badgeIconUrl: string | null;
  awardedAt: Date;
  metadata: Record<string, unknown> | null;
}

export interface BadgeStore {
  listDefinitions(): Promise<Badge[]>;
  listAwardedBadgeIds(userId: string): Promise<string[]>;
  /** Conditional insert; false when the user already holds the badge */
  insertAward(userId: string, badgeId: string, metadata?: Record<string, unknown>): Promise<boolean>;
  listAwards(userId: string): Promise<AwardedBadge[]>;
  countAwards(userId: string): Promise<number>;
  createDefinition(definition: NewBadgeDefinition): Promise<Badge>;
}

export class PgBadgeStore implements BadgeStore {
  constructor(private readonly db: Database) {}

  async listDefinitions(): Promise<Badge[]> {
    return this.db.select().from(badges).orderBy(badges.createdAt);
  }

  async listAwardedBadgeIds(userId: string): Promise<string[]> {
    const rows = await this.db
      .select({ badgeId: userBadges.badgeId })
      .from(userBadges)
      .where(eq(userBadges.userId, userId));
    return rows.map((row) => row.badgeId);
  }

  async insertAward(userId: string, badgeId: string, metadata?: Record<string, unknown>): Promise<boolean> {
    const inserted = await this.db
      .insert(userBadges)
      .values({ userId, badgeId, metadata: metadata ?? null })
      .onConflictDoNothing({ target: [userBadges.userId, userBadges.badgeId] })
      .returning({ id: userBadges.id });
    return inserted.length > 0;
  }

  async listAwards(userId: string): Promise<AwardedBadge[]> {
    return this.db
      .select({
        id: userBadges.id,
        badgeId: badges.id,
        badgeName: badges.name,
        badgeDescription: badges.description,
        badgeIconUrl: badges.iconUrl,
        awardedAt: userBadges.awardedAt,
        metadata: userBadges.metadata,
      })
      .from(userBadges)
      .innerJoin(badges, eq(userBadges.badgeId, badges.id))
      .where(eq(userBadges.userId, userId))
      .orderBy(desc(userBadges.awardedAt));
  }

  async countAwards(userId: string): Promise<number> {
    const [row] = await this.db
      .select({ value: count() })
      .from(userBadges)
      .where(eq(userBadges.userId, userId));
    return row?.value ?? 0;
  }

  async createDefinition(definition: NewBadgeDefinition): Promise<Badge> {
    const [badge] = await this.db
      .insert(badges)
      .values({
        name: definition.name,
        description: definition.description,
        condition: { ...definition.condition },
        iconUrl: definition.iconUrl ?? null,
      })
      .onConflictDoNothing({ target: badges.name })
      .returning();

    if (!badge) {
      throw new ConflictError(`Badge named '${definition.name}' already exists`);
    }
    return badge;
  }
}
