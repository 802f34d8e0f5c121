import { calendarDay, type Clock } from "../../utils/clock";
import { withRetry, type RetryOptions } from "../../utils/retry";
import type { ScoreRepository } from "./scoring.repository";
import { applyToDaily, applyToGlobal, applyToGroup, scoreDelta, type GlobalStats } from "./scoring";

export type AnswerInput = {
  userId: number;
  groupId: number | null;
  isCorrect: boolean;
  username?: string | null;
  displayName?: string | null;
  /** When set, the answer is scored at most once per (poll, user). */
  pollId?: string;
};

export type RecordOutcome =
  | { status: "recorded"; stats: GlobalStats; scoreDelta: number }
  | { status: "duplicate" };

export type ScoringOptions = {
  clock: Clock;
  timeZone: string;
  retry: RetryOptions;
};

export class ScoringEngine {
  constructor(private readonly repo: ScoreRepository, private readonly options: ScoringOptions) {}

  /**
   * Applies one answer to the profile, global, daily and (optionally) group aggregates
   * as a single unit. Transient store failures are retried a bounded number of times.
   */
  async recordAnswer(input: AnswerInput): Promise<RecordOutcome> {
    const day = calendarDay(this.options.clock.now(), this.options.timeZone);
    const { userId, groupId, isCorrect } = input;

    return withRetry(
      () =>
        this.repo.withUserLock(userId, async (unit): Promise<RecordOutcome> => {
          if (input.pollId !== undefined && !(await unit.claimPollAnswer(input.pollId, userId))) {
            return { status: "duplicate" };
          }

          await unit.upsertProfile({ userId, username: input.username, firstName: input.displayName });

          const stats = applyToGlobal(await unit.getGlobalStats(userId), userId, isCorrect, day);
          await unit.saveGlobalStats(stats);

          await unit.saveDailyStats(applyToDaily(await unit.getDailyStats(userId, day), userId, isCorrect, day));

          if (groupId !== null) {
            await unit.saveGroupStats(applyToGroup(await unit.getGroupStats(groupId, userId), groupId, userId, isCorrect));
          }

          return { status: "recorded", stats, scoreDelta: scoreDelta(isCorrect) };
        }),
      this.options.retry
    );
  }
}
