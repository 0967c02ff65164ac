import { describe, it, expect, beforeEach } from 'vitest';

import { InMemoryBadgeStore } from '../test/in-memory-stores';
import { BadgeService } from './badge-service';
import { ConflictError } from './errors';

describe('BadgeService', () => {
  let store: InMemoryBadgeStore;
  let service: BadgeService;

  beforeEach(() => {
    store = new InMemoryBadgeStore();
    service = new BadgeService(store);
  });

  it('lists definitions with defaults applied and malformed ones left out', async () => {
    const streak = store.seed('Week Streak', { type: 'consecutive_days' });
    store.seed('Broken', { type: 'mystery' });

    const definitions = await service.listDefinitions();

    expect(definitions).toEqual([
      {
        id: streak.id,
        name: 'Week Streak',
        description: 'Week Streak description',
        condition: { type: 'consecutive_days', days: 7 },
        iconUrl: null,
        createdAt: '2026-01-01T00:00:00.000Z',
      },
    ]);
  });

  it('creates a definition', async () => {
    const created = await service.createDefinition(
      { name: 'Centurion', description: 'Earn 100 XP', condition: { type: 'xp', threshold: 100 } },
      'admin-1'
    );

    expect(created).toMatchObject({
      name: 'Centurion',
      description: 'Earn 100 XP',
      condition: { type: 'xp', threshold: 100 },
      iconUrl: null,
    });
    expect(store.definitions).toHaveLength(1);
  });

  it('rejects a duplicate name', async () => {
    const definition = { name: 'Centurion', description: 'Earn 100 XP', condition: { type: 'xp' as const, threshold: 100 } };
    await service.createDefinition(definition);

    await expect(service.createDefinition(definition)).rejects.toBeInstanceOf(ConflictError);
  });

  it("returns a user's awarded badges", async () => {
    const badge = store.seed('Centurion', { type: 'xp', threshold: 100 });
    await store.insertAward('user-1', badge.id, { condition: 'xp' });

    const awarded = await service.getUserBadges('user-1');

    expect(awarded).toHaveLength(1);
    expect(awarded[0]).toMatchObject({
      badgeId: badge.id,
      badgeName: 'Centurion',
      badgeDescription: 'Centurion description',
      metadata: { condition: 'xp' },
    });
    expect(await service.getUserBadges('user-2')).toEqual([]);
  });
});
