import { setTimeout as sleep } from "timers/promises";
import { TransientStoreError } from "./errors";

export type RetryOptions = {
  attempts: number;
  delayMs: number;
};

/**
 * Runs `fn`, retrying only on TransientStoreError with linear back-off.
 * After `attempts` tries the last error is rethrown.
 */
export async function withRetry<T>(fn: () => Promise<T>, options: RetryOptions): Promise<T> {
  let attempt = 0;
  for (;;) {
    attempt++;
    try {
      return await fn();
    } catch (e) {
      if (!(e instanceof TransientStoreError) || attempt >= options.attempts) throw e;
      // eslint-disable-next-line no-console
      console.warn(`Transient store failure (attempt ${attempt}/${options.attempts}), retrying:`, e.message);
      if (options.delayMs > 0) await sleep(options.delayMs * attempt);
    }
  }
}
