import type { AttemptStatus, BadgeConditionType, TerminalAttemptStatus } from './types';

// Re-export all types
export * from './types';
export * from './progression';

// Constants
export const ATTEMPT_STATUS_TRANSITIONS: Record<AttemptStatus, AttemptStatus[]> = {
  started: ['submitted'],
  submitted: ['submitted', 'passed', 'failed'],
  passed: [],
  failed: [],
};

export const TERMINAL_ATTEMPT_STATUSES: readonly TerminalAttemptStatus[] = ['passed', 'failed'];

export const BADGE_CONDITION_TYPES: readonly BadgeConditionType[] = [
  'xp',
  'attempt_count',
  'consecutive_days',
];

export const CHALLENGE_DIFFICULTIES = ['easy', 'medium', 'hard'] as const;

export const USER_ROLES = ['user', 'admin'] as const;

// Utility functions
export function isValidAttemptTransition(from: AttemptStatus, to: AttemptStatus): boolean {
  return ATTEMPT_STATUS_TRANSITIONS[from].includes(to);
}

export function isTerminalStatus(status: AttemptStatus): status is TerminalAttemptStatus {
  return status === 'passed' || status === 'failed';
}
