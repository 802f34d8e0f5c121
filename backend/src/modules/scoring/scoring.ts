/**
 * Marking scheme
 * --------------
 * +4 for a correct answer, -1 for a wrong one.
 *
 * Streaks count consecutive correct answers. Any wrong answer resets the current streak
 * to 0; the best streak never decreases. Given only these deltas, every global row
 * satisfies:  score == 4 * correct - (attempted - correct).
 */

export const CORRECT_POINTS = 4;
export const WRONG_PENALTY = 1;

export type GlobalStats = {
  userId: number;
  attempted: number;
  correct: number;
  score: number;
  currentStreak: number;
  maxStreak: number;
  lastActivityDate: string | null; // YYYY-MM-DD
};

export type DailyStats = {
  userId: number;
  day: string; // YYYY-MM-DD
  attempted: number;
  correct: number;
};

export type GroupStats = {
  groupId: number;
  userId: number;
  attempted: number;
  correct: number;
  score: number;
};

export function scoreDelta(correct: boolean): number {
  return correct ? CORRECT_POINTS : -WRONG_PENALTY;
}

export function applyToGlobal(prev: GlobalStats | null, userId: number, correct: boolean, day: string): GlobalStats {
  const base: GlobalStats = prev ?? {
    userId,
    attempted: 0,
    correct: 0,
    score: 0,
    currentStreak: 0,
    maxStreak: 0,
    lastActivityDate: null
  };

  const currentStreak = correct ? base.currentStreak + 1 : 0;
  return {
    userId,
    attempted: base.attempted + 1,
    correct: base.correct + (correct ? 1 : 0),
    score: base.score + scoreDelta(correct),
    currentStreak,
    maxStreak: Math.max(base.maxStreak, currentStreak),
    lastActivityDate: day
  };
}

export function applyToDaily(prev: DailyStats | null, userId: number, correct: boolean, day: string): DailyStats {
  return {
    userId,
    day,
    attempted: (prev?.attempted ?? 0) + 1,
    correct: (prev?.correct ?? 0) + (correct ? 1 : 0)
  };
}

export function applyToGroup(prev: GroupStats | null, groupId: number, userId: number, correct: boolean): GroupStats {
  return {
    groupId,
    userId,
    attempted: (prev?.attempted ?? 0) + 1,
    correct: (prev?.correct ?? 0) + (correct ? 1 : 0),
    score: (prev?.score ?? 0) + scoreDelta(correct)
  };
}

/** Display-only points: never stored, floored at 0. */
export function xpOf(stats: Pick<GlobalStats, "attempted" | "correct">): number {
  const wrong = stats.attempted - stats.correct;
  return Math.max(0, stats.correct * CORRECT_POINTS - wrong * WRONG_PENALTY);
}

const RANK_TITLES: ReadonlyArray<readonly [number, string]> = [
  [500, "Legendary Surgeon"],
  [300, "Chief Resident"],
  [150, "Gold Intern"],
  [50, "Elite Aspirant"]
];

export function rankTitle(xp: number): string {
  for (const [threshold, title] of RANK_TITLES) {
    if (xp > threshold) return title;
  }
  return "Medical Student";
}

/** Percentage with one decimal; 0 when nothing was attempted. */
export function accuracyPercent(stats: Pick<GlobalStats, "attempted" | "correct">): number {
  if (stats.attempted === 0) return 0;
  return Math.round((stats.correct / stats.attempted) * 1000) / 10;
}
