import { z } from 'zod';
import type { BadgeCondition } from '@questline/shared';

/**
 * Stored badge conditions, e.g. {"type": "attempt_count", "count": 5, "status": "passed"}.
 * Missing parameters take the defaults below.
 */
export const badgeConditionSchema = z.discriminatedUnion('type', [
  z.object({
    type: z.literal('xp'),
    threshold: z.number().int().min(0).default(0),
  }),
  z.object({
    type: z.literal('attempt_count'),
    count: z.number().int().min(1).default(1),
    status: z.enum(['passed', 'failed']).default('passed'),
  }),
  z.object({
    type: z.literal('consecutive_days'),
    days: z.number().int().min(1).default(7),
  }),
]);

export type ParsedBadgeCondition = z.infer<typeof badgeConditionSchema>;

export function parseBadgeCondition(raw: unknown): BadgeCondition | null {
  const result = badgeConditionSchema.safeParse(raw);
  return result.success ? result.data : null;
}
