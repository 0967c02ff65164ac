/**
 * Progression formulas shared by the award service and its clients.
 *
 * level(xp) = floor(sqrt(xp / 100)) + 1, so level L starts at (L - 1)^2 * 100 XP.
 */

export const DEFAULT_PASSING_SCORE = 70;
export const XP_PER_LEVEL_UNIT = 100;

/**
 * XP earned for a challenge worth `challengeXp` at `score` percent.
 * Exact halves round to the even neighbour (82.5 -> 82, 67.5 -> 68).
 */
export function calculateXpAwarded(challengeXp: number, score: number): number {
  const hundredths = challengeXp * score;
  const whole = Math.floor(hundredths / 100);
  const remainder = hundredths - whole * 100;

  if (remainder > 50 || (remainder === 50 && whole % 2 !== 0)) {
    return whole + 1;
  }
  return whole;
}

export function calculateLevel(totalXp: number): number {
  if (totalXp <= 0) {
    return 1;
  }
  return Math.floor(Math.sqrt(totalXp / XP_PER_LEVEL_UNIT)) + 1;
}

/**
 * Total XP at which the level after `level` begins
 */
export function nextLevelXp(level: number): number {
  return level * level * XP_PER_LEVEL_UNIT;
}

export function xpToNextLevel(totalXp: number): number {
  return nextLevelXp(calculateLevel(totalXp)) - totalXp;
}

export function isPassingScore(score: number, threshold: number = DEFAULT_PASSING_SCORE): boolean {
  return score >= threshold;
}
