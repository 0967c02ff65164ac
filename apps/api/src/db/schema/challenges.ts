import { pgTable, uuid, varchar, text, timestamp, boolean, integer, jsonb, pgEnum } from 'drizzle-orm/pg-core';

// Challenge difficulty enum
export const challengeDifficultyEnum = pgEnum('challenge_difficulty', ['easy', 'medium', 'hard']);

// Challenges table
export const challenges = pgTable('challenges', {
  id: uuid('id').primaryKey().defaultRandom(),
  title: varchar('title', { length: 200 }).notNull(),
  description: text('description').notNull(),
  xp: integer('xp').notNull().default(100),
  difficulty: challengeDifficultyEnum('difficulty').notNull().default('medium'),
  tags: jsonb('tags').notNull().$type<string[]>().default([]),
  published: boolean('published').notNull().default(false),
  createdAt: timestamp('created_at', { withTimezone: true }).notNull().defaultNow(),
});

// Types
export type Challenge = typeof challenges.$inferSelect;
export type NewChallenge = typeof challenges.$inferInsert;
