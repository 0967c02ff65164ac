// Attempt Types
export type AttemptStatus = 'started' | 'submitted' | 'passed' | 'failed';
export type TerminalAttemptStatus = 'passed' | 'failed';

export interface AttemptSummary {
  id: string;
  challengeId: string;
  status: AttemptStatus;
  score: number | null;
  xpAwarded: number | null;
  startedAt: string;
  submittedAt: string | null;
}

// Challenge Types
export type ChallengeDifficulty = 'easy' | 'medium' | 'hard';

// Badge Types
export type BadgeConditionType = 'xp' | 'attempt_count' | 'consecutive_days';

export interface XpThresholdCondition {
  type: 'xp';
  threshold: number;
}

export interface AttemptCountCondition {
  type: 'attempt_count';
  count: number;
  status: TerminalAttemptStatus;
}

export interface ConsecutiveDaysCondition {
  type: 'consecutive_days';
  days: number;
}

export type BadgeCondition = XpThresholdCondition | AttemptCountCondition | ConsecutiveDaysCondition;

export interface BadgeDefinitionView {
  id: string;
  name: string;
  description: string;
  condition: BadgeCondition;
  iconUrl: string | null;
  createdAt: string;
}

export interface UserBadgeView {
  id: string;
  badgeId: string;
  badgeName: string;
  badgeDescription: string;
  badgeIconUrl: string | null;
  awardedAt: string;
  metadata: Record<string, unknown> | null;
}

// Progress & Leaderboard Types
export interface UserProgress {
  userId: string;
  username: string;
  totalXp: number;
  level: number;
  nextLevelXp: number;
  xpToNextLevel: number;
  rank: number | null;
  challengesCompleted: number;
  badgeCount: number;
  recentAttempts: AttemptSummary[];
}

export interface LeaderboardEntry {
  userId: string;
  username: string | null;
  totalXp: number;
  level: number;
  rank: number;
}

export interface LeaderboardResponse {
  entries: LeaderboardEntry[];
  totalCount: number;
}
