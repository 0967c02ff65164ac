import { pgTable, uuid, timestamp, integer, index } from 'drizzle-orm/pg-core';

import { attempts } from './attempts';
import { users } from './users';

// Cumulative score per user. Only the ledger's single-statement increment writes it.
export const userScores = pgTable(
  'user_scores',
  {
    userId: uuid('user_id')
      .primaryKey()
      .references(() => users.id, { onDelete: 'cascade' }),
    totalXp: integer('total_xp').notNull().default(0),
    level: integer('level').notNull().default(1),
    updatedAt: timestamp('updated_at', { withTimezone: true }).notNull().defaultNow(),
  },
  (table) => ({
    totalXpIdx: index('user_scores_total_xp_idx').on(table.totalXp),
  })
);

// One row per scored attempt; the unique attempt_id makes awards idempotent
export const xpLedgerEntries = pgTable(
  'xp_ledger_entries',
  {
    id: uuid('id').primaryKey().defaultRandom(),
    attemptId: uuid('attempt_id')
      .notNull()
      .unique()
      .references(() => attempts.id, { onDelete: 'cascade' }),
    userId: uuid('user_id')
      .notNull()
      .references(() => users.id, { onDelete: 'cascade' }),
    delta: integer('delta').notNull(),
    createdAt: timestamp('created_at', { withTimezone: true }).notNull().defaultNow(),
  },
  (table) => ({
    userIdIdx: index('xp_ledger_entries_user_id_idx').on(table.userId),
  })
);

// Types
export type UserScore = typeof userScores.$inferSelect;
export type XpLedgerEntry = typeof xpLedgerEntries.$inferSelect;
export type NewXpLedgerEntry = typeof xpLedgerEntries.$inferInsert;
