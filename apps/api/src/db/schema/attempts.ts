import { pgTable, uuid, text, timestamp, integer, jsonb, pgEnum, index } from 'drizzle-orm/pg-core';

import { challenges } from './challenges';
import { users } from './users';

// Attempt status enum
export const attemptStatusEnum = pgEnum('attempt_status', ['started', 'submitted', 'passed', 'failed']);

// Attempts table
export const attempts = pgTable(
  'attempts',
  {
    id: uuid('id').primaryKey().defaultRandom(),
    userId: uuid('user_id')
      .notNull()
      .references(() => users.id, { onDelete: 'cascade' }),
    challengeId: uuid('challenge_id')
      .notNull()
      .references(() => challenges.id, { onDelete: 'cascade' }),
    status: attemptStatusEnum('status').notNull().default('started'),
    score: integer('score'),
    // Written once, by the award pipeline, together with the terminal status
    xpAwarded: integer('xp_awarded'),
    solution: text('solution'),
    metadata: jsonb('metadata').$type<Record<string, unknown>>(),
    startedAt: timestamp('started_at', { withTimezone: true }).notNull().defaultNow(),
    submittedAt: timestamp('submitted_at', { withTimezone: true }),
    scoredAt: timestamp('scored_at', { withTimezone: true }),
    // Set when the award job ran out of retries; reconciliation skips these until re-submitted or requeued
    deadLetteredAt: timestamp('dead_lettered_at', { withTimezone: true }),
  },
  (table) => ({
    userStatusIdx: index('attempts_user_status_idx').on(table.userId, table.status),
    statusSubmittedIdx: index('attempts_status_submitted_idx').on(table.status, table.submittedAt),
  })
);

// Types
export type Attempt = typeof attempts.$inferSelect;
export type NewAttempt = typeof attempts.$inferInsert;
