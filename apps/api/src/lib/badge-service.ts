import type { BadgeDefinitionView, UserBadgeView } from '@questline/shared';

import { parseBadgeCondition } from './badge-conditions';
import type { Badge, BadgeStore, NewBadgeDefinition } from './badge-store';
import { auditLog, getContextLogger } from './logger';

export class BadgeService {
  constructor(private readonly badges: BadgeStore) {}

  /**
   * Definitions whose stored condition no longer parses are left out
   */
  async listDefinitions(): Promise<BadgeDefinitionView[]> {
    const definitions = await this.badges.listDefinitions();
    const views: BadgeDefinitionView[] = [];

    for (const badge of definitions) {
      const view = toDefinitionView(badge);
      if (view) {
        views.push(view);
      } else {
        getContextLogger().warn({ badgeId: badge.id }, 'Badge definition has a malformed condition');
      }
    }
    return views;
  }

  async createDefinition(definition: NewBadgeDefinition, actorUserId?: string): Promise<BadgeDefinitionView> {
    try {
      const badge = await this.badges.createDefinition(definition);
      auditLog('badge.create', {
        userId: actorUserId,
        targetId: badge.id,
        targetType: 'badge',
        result: 'success',
        metadata: { name: badge.name, condition: definition.condition.type },
      });
      return {
        id: badge.id,
        name: badge.name,
        description: badge.description,
        condition: definition.condition,
        iconUrl: badge.iconUrl,
        createdAt: badge.createdAt.toISOString(),
      };
    } catch (error) {
      auditLog('badge.create', {
        userId: actorUserId,
        targetType: 'badge',
        result: 'failure',
        reason: error instanceof Error ? error.message : String(error),
        metadata: { name: definition.name },
      });
      throw error;
    }
  }

  async getUserBadges(userId: string): Promise<UserBadgeView[]> {
    const awards = await this.badges.listAwards(userId);
    return awards.map((award) => ({
      id: award.id,
      badgeId: award.badgeId,
      badgeName: award.badgeName,
      badgeDescription: award.badgeDescription,
      badgeIconUrl: award.badgeIconUrl,
      awardedAt: award.awardedAt.toISOString(),
      metadata: award.metadata,
    }));
  }
}

function toDefinitionView(badge: Badge): BadgeDefinitionView | null {
  const condition = parseBadgeCondition(badge.condition);
  if (!condition) {
    return null;
  }
  return {
    id: badge.id,
    name: badge.name,
    description: badge.description,
    condition,
    iconUrl: badge.iconUrl,
    createdAt: badge.createdAt.toISOString(),
  };
}
