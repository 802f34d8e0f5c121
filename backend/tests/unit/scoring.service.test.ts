import { beforeEach, describe, expect, it } from "vitest";
import { ScoringEngine } from "../../src/modules/scoring/scoring.service";
import { TransientStoreError } from "../../src/utils/errors";
import { ManualClock } from "../fakes/gateway";
import { createMemoryRepositories, type MemoryState } from "../fakes/memory";

describe("ScoringEngine", () => {
  let state: MemoryState;
  let engine: ScoringEngine;
  let clock: ManualClock;

  beforeEach(() => {
    const repos = createMemoryRepositories();
    state = repos.state;
    clock = new ManualClock(new Date("2024-05-01T20:00:00Z"));
    engine = new ScoringEngine(repos.scores, {
      clock,
      timeZone: "Asia/Kolkata",
      retry: { attempts: 3, delayMs: 0 }
    });
  });

  it("serializes concurrent answers for the same user", async () => {
    const answers = Array.from({ length: 40 }, (_, i) => i % 3 !== 0);
    await Promise.all(answers.map((isCorrect) => engine.recordAnswer({ userId: 5, groupId: -10, isCorrect })));

    const correct = answers.filter(Boolean).length;
    const global = state.global.get(5);
    expect(global?.attempted).toBe(40);
    expect(global?.correct).toBe(correct);
    expect(global?.score).toBe(4 * correct - (40 - correct));
    expect(state.group.get("-10:5")?.attempted).toBe(40);
    expect(state.maxConcurrentUnits).toBe(1);
  });

  it("files daily stats under the calendar day of the configured zone", async () => {
    // 20:00 UTC is 01:30 the next day in Asia/Kolkata
    await engine.recordAnswer({ userId: 5, groupId: null, isCorrect: true });
    expect(state.daily.get("5:2024-05-02")).toEqual({ userId: 5, day: "2024-05-02", attempted: 1, correct: 1 });
    expect(state.global.get(5)?.lastActivityDate).toBe("2024-05-02");
  });

  it("skips group stats for private answers", async () => {
    await engine.recordAnswer({ userId: 5, groupId: null, isCorrect: false });
    expect(state.group.size).toBe(0);
    expect(state.global.get(5)?.score).toBe(-1);
  });

  it("scores a poll answer once per user", async () => {
    const first = await engine.recordAnswer({ userId: 5, groupId: -10, isCorrect: true, pollId: "p1" });
    const second = await engine.recordAnswer({ userId: 5, groupId: -10, isCorrect: true, pollId: "p1" });
    const other = await engine.recordAnswer({ userId: 6, groupId: -10, isCorrect: false, pollId: "p1" });

    expect(first).toMatchObject({ status: "recorded", scoreDelta: 4 });
    expect(second).toEqual({ status: "duplicate" });
    expect(other).toMatchObject({ status: "recorded", scoreDelta: -1 });
    expect(state.global.get(5)?.attempted).toBe(1);
  });

  it("keeps profile fields that an answer omits", async () => {
    await engine.recordAnswer({ userId: 5, groupId: null, isCorrect: true, username: "asha", displayName: "Asha" });
    await engine.recordAnswer({ userId: 5, groupId: null, isCorrect: true, username: null });
    expect(state.users.get(5)).toEqual({ username: "asha", firstName: "Asha" });
  });

  it("retries transient failures without partial writes", async () => {
    state.failingCommits = 2;
    const outcome = await engine.recordAnswer({ userId: 5, groupId: -10, isCorrect: true, pollId: "p9" });

    expect(outcome.status).toBe("recorded");
    expect(state.global.get(5)?.attempted).toBe(1);
    expect(state.group.get("-10:5")?.attempted).toBe(1);
    expect(state.pollAnswers.has("p9:5")).toBe(true);
  });

  it("gives up after the configured attempts and leaves nothing behind", async () => {
    state.failingCommits = 3;
    await expect(engine.recordAnswer({ userId: 5, groupId: -10, isCorrect: true, pollId: "p9" })).rejects.toBeInstanceOf(
      TransientStoreError
    );

    expect(state.global.has(5)).toBe(false);
    expect(state.daily.size).toBe(0);
    expect(state.group.size).toBe(0);
    expect(state.pollAnswers.size).toBe(0);
  });
});
