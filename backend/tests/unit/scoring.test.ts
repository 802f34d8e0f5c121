import { describe, expect, it } from "vitest";
import {
  accuracyPercent,
  applyToDaily,
  applyToGlobal,
  applyToGroup,
  rankTitle,
  scoreDelta,
  xpOf,
  type GlobalStats
} from "../../src/modules/scoring/scoring";

const DAY = "2024-05-01";

function play(answers: boolean[]): GlobalStats[] {
  const history: GlobalStats[] = [];
  let stats: GlobalStats | null = null;
  for (const correct of answers) {
    stats = applyToGlobal(stats, 7, correct, DAY);
    history.push(stats);
  }
  return history;
}

describe("scoring rules", () => {
  it("awards +4 for correct and -1 for wrong", () => {
    expect(scoreDelta(true)).toBe(4);
    expect(scoreDelta(false)).toBe(-1);
  });

  it("three correct then one wrong", () => {
    const last = play([true, true, true, false]).at(-1);
    expect(last).toEqual({
      userId: 7,
      attempted: 4,
      correct: 3,
      score: 11,
      currentStreak: 0,
      maxStreak: 3,
      lastActivityDate: DAY
    });
  });

  it("keeps the streak and score laws over a long mixed sequence", () => {
    const answers = [true, false, true, true, false, false, true, true, true, true, false, true];
    const history = play(answers);

    let prevMax = 0;
    history.forEach((s, i) => {
      expect(s.maxStreak).toBeGreaterThanOrEqual(prevMax);
      expect(s.maxStreak).toBeGreaterThanOrEqual(s.currentStreak);
      if (!answers[i]) expect(s.currentStreak).toBe(0);
      expect(s.score).toBe(4 * s.correct - (s.attempted - s.correct));
      prevMax = s.maxStreak;
    });
    expect(history.at(-1)?.maxStreak).toBe(4);
  });

  it("scores can go negative", () => {
    expect(play([false, false]).at(-1)?.score).toBe(-2);
  });

  it("accumulates daily and group rows", () => {
    const daily = applyToDaily(applyToDaily(null, 7, true, DAY), 7, false, DAY);
    expect(daily).toEqual({ userId: 7, day: DAY, attempted: 2, correct: 1 });

    const group = applyToGroup(applyToGroup(null, -100, 7, true), -100, 7, false);
    expect(group).toEqual({ groupId: -100, userId: 7, attempted: 2, correct: 1, score: 3 });
  });
});

describe("profile figures", () => {
  it("floors xp at zero", () => {
    expect(xpOf({ attempted: 10, correct: 1 })).toBe(0);
    expect(xpOf({ attempted: 4, correct: 3 })).toBe(11);
  });

  it("picks titles on strict thresholds", () => {
    expect(rankTitle(501)).toBe("Legendary Surgeon");
    expect(rankTitle(500)).toBe("Chief Resident");
    expect(rankTitle(301)).toBe("Chief Resident");
    expect(rankTitle(151)).toBe("Gold Intern");
    expect(rankTitle(51)).toBe("Elite Aspirant");
    expect(rankTitle(50)).toBe("Medical Student");
  });

  it("rounds accuracy to one decimal", () => {
    expect(accuracyPercent({ attempted: 0, correct: 0 })).toBe(0);
    expect(accuracyPercent({ attempted: 3, correct: 2 })).toBe(66.7);
    expect(accuracyPercent({ attempted: 4, correct: 3 })).toBe(75);
  });
});
