import { wallClock, type Clock } from "../utils/clock";
import type { Settings } from "../modules/settings/settings.service";

export type SchedulerJobs = {
  periodicQuiz(): Promise<unknown>;
  dailyDigest(): Promise<unknown>;
};

export type SchedulerOptions = {
  settings: { current(): Settings };
  clock: Clock;
  timeZone: string;
  /** HH:MM in `timeZone`. */
  digestTime: string;
  tickMs: number;
};

type JobName = "periodic quiz" | "daily digest";

/**
 * In-process ticker for the periodic quiz and the nightly digest.
 * Settings are read on every tick, so changes apply without a restart.
 */
export class Scheduler {
  private timer: NodeJS.Timeout | null = null;
  private lastQuizAt: number | null = null;
  private lastDigestDay: string | null = null;
  private readonly running = new Map<JobName, Promise<void>>();

  constructor(private readonly jobs: SchedulerJobs, private readonly options: SchedulerOptions) {}

  start(): void {
    if (this.timer) return;
    this.timer = setInterval(() => {
      this.tick().catch((e) => {
        // eslint-disable-next-line no-console
        console.error("Scheduler tick failed:", e);
      });
    }, this.options.tickMs);
  }

  /** Stops ticking and waits for jobs already running. */
  async stop(): Promise<void> {
    if (this.timer) {
      clearInterval(this.timer);
      this.timer = null;
    }
    await Promise.all(this.running.values());
  }

  async tick(): Promise<void> {
    const now = this.options.clock.now();
    const started: Promise<void>[] = [];

    if (!this.running.has("periodic quiz") && this.quizDue(now)) {
      started.push(this.launch("periodic quiz", () => this.jobs.periodicQuiz()));
    }
    if (!this.running.has("daily digest") && this.digestDue(now)) {
      started.push(this.launch("daily digest", () => this.jobs.dailyDigest()));
    }

    await Promise.all(started);
  }

  private quizDue(now: Date): boolean {
    const { autoquizEnabled, autoquizIntervalMinutes } = this.options.settings.current();
    if (!autoquizEnabled) {
      // re-enabling waits a full interval
      this.lastQuizAt = null;
      return false;
    }
    if (this.lastQuizAt === null) {
      this.lastQuizAt = now.getTime();
      return false;
    }
    if (now.getTime() - this.lastQuizAt < autoquizIntervalMinutes * 60_000) return false;

    this.lastQuizAt = now.getTime();
    return true;
  }

  private digestDue(now: Date): boolean {
    const { day, time } = wallClock(now, this.options.timeZone);
    const { digestTime } = this.options;

    if (this.lastDigestDay === null) {
      // Started after today's digest minute: today's digest is considered sent.
      this.lastDigestDay = time > digestTime ? day : "";
    }
    if (time < digestTime || this.lastDigestDay === day) return false;

    this.lastDigestDay = day;
    return true;
  }

  private launch(name: JobName, job: () => Promise<unknown>): Promise<void> {
    const run = (async () => {
      try {
        await job();
      } catch (e) {
        // eslint-disable-next-line no-console
        console.error(`Scheduled ${name} failed:`, e);
      } finally {
        this.running.delete(name);
      }
    })();
    this.running.set(name, run);
    return run;
  }
}
