import { pgTable, uuid, varchar, text, timestamp, jsonb, uniqueIndex, index } from 'drizzle-orm/pg-core';

import { users } from './users';

// Badge definitions. `condition` holds the tagged JSON variant, e.g.
// {"type": "xp", "threshold": 1000}; it is parsed when rules are evaluated.
export const badges = pgTable('badges', {
  id: uuid('id').primaryKey().defaultRandom(),
  name: varchar('name', { length: 100 }).notNull().unique(),
  description: text('description').notNull(),
  condition: jsonb('condition').notNull().$type<Record<string, unknown>>(),
  iconUrl: varchar('icon_url', { length: 500 }),
  createdAt: timestamp('created_at', { withTimezone: true }).notNull().defaultNow(),
});

// Awarded badges
export const userBadges = pgTable(
  'user_badges',
  {
    id: uuid('id').primaryKey().defaultRandom(),
    userId: uuid('user_id')
      .notNull()
      .references(() => users.id, { onDelete: 'cascade' }),
    badgeId: uuid('badge_id')
      .notNull()
      .references(() => badges.id, { onDelete: 'cascade' }),
    awardedAt: timestamp('awarded_at', { withTimezone: true }).notNull().defaultNow(),
    metadata: jsonb('metadata').$type<Record<string, unknown>>(),
  },
  (table) => ({
    userBadgeUnique: uniqueIndex('user_badges_user_badge_unique').on(table.userId, table.badgeId),
    userIdIdx: index('user_badges_user_id_idx').on(table.userId),
  })
);

// Types
export type Badge = typeof badges.$inferSelect;
export type NewBadge = typeof badges.$inferInsert;
export type UserBadge = typeof userBadges.$inferSelect;
