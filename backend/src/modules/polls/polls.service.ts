import type { Clock } from "../../utils/clock";
import { ConflictError } from "../../utils/errors";
import { withRetry, type RetryOptions } from "../../utils/retry";
import type { OptionIndex } from "../questions/answerKey";
import type { PollEntry, PollRepository } from "./polls.repository";

const DAY_MS = 24 * 60 * 60 * 1000;

function sameEntry(found: PollEntry | null, entry: PollEntry): boolean {
  return found !== null && found.groupId === entry.groupId && found.correctOptionIndex === entry.correctOptionIndex;
}

/**
 * Poll id -> (group, correct option) for dispatched polls.
 *
 * An entry serves every user who answers its poll; what is single-use is each user's
 * answer, claimed inside the scoring transaction.
 */
export class PollTrackingService {
  constructor(
    private readonly repo: PollRepository,
    private readonly clock: Clock,
    private readonly retry: RetryOptions
  ) {}

  async trackPoll(pollId: string, groupId: number | null, correctOptionIndex: OptionIndex): Promise<void> {
    const entry: PollEntry = { pollId, groupId, correctOptionIndex };
    let attempt = 0;
    const inserted = await withRetry(async () => {
      attempt++;
      if (await this.repo.insert(entry)) return true;
      // a retry may find the row its failed attempt already wrote
      return attempt > 1 && sameEntry(await this.repo.find(pollId), entry);
    }, this.retry);
    if (!inserted) throw new ConflictError(`Poll ${pollId} is already tracked`);
  }

  /** `null` for unknown or pruned polls: such answers are simply not scoreable. */
  resolvePoll(pollId: string): Promise<PollEntry | null> {
    return withRetry(() => this.repo.find(pollId), this.retry);
  }

  /** Like resolvePoll, but `null` once this user's answer to the poll has been scored. */
  async resolvePollForUser(pollId: string, userId: number): Promise<PollEntry | null> {
    const entry = await this.resolvePoll(pollId);
    if (!entry) return null;
    const answered = await withRetry(() => this.repo.isAnswered(pollId, userId), this.retry);
    return answered ? null : entry;
  }

  prune(retentionDays: number): Promise<number> {
    const cutoff = new Date(this.clock.now().getTime() - retentionDays * DAY_MS);
    return this.repo.deleteOlderThan(cutoff);
  }
}
