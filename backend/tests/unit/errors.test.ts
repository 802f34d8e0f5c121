import { afterEach, describe, expect, it, vi } from "vitest";
import { NotFoundError, toStoreError, TransientStoreError, ValidationError } from "../../src/utils/errors";
import { withRetry } from "../../src/utils/retry";

afterEach(() => {
  vi.restoreAllMocks();
});

describe("toStoreError", () => {
  it("wraps retryable driver failures", () => {
    for (const code of ["40001", "40P01", "57P01", "08006", "ECONNRESET"]) {
      const mapped = toStoreError(Object.assign(new Error("driver"), { code }));
      expect(mapped).toBeInstanceOf(TransientStoreError);
    }
  });

  it("passes everything else through", () => {
    const unique = Object.assign(new Error("duplicate key"), { code: "23505" });
    expect(toStoreError(unique)).toBe(unique);
    const notFound = new NotFoundError();
    expect(toStoreError(notFound)).toBe(notFound);
  });
});

describe("withRetry", () => {
  it("retries transient failures until one succeeds", async () => {
    vi.spyOn(console, "warn").mockImplementation(() => undefined);
    const fn = vi
      .fn<() => Promise<string>>()
      .mockRejectedValueOnce(new TransientStoreError("busy"))
      .mockResolvedValueOnce("done");

    await expect(withRetry(fn, { attempts: 3, delayMs: 0 })).resolves.toBe("done");
    expect(fn).toHaveBeenCalledTimes(2);
  });

  it("rethrows after the last attempt", async () => {
    vi.spyOn(console, "warn").mockImplementation(() => undefined);
    const fn = vi.fn<() => Promise<string>>().mockRejectedValue(new TransientStoreError("busy"));

    await expect(withRetry(fn, { attempts: 3, delayMs: 0 })).rejects.toBeInstanceOf(TransientStoreError);
    expect(fn).toHaveBeenCalledTimes(3);
  });

  it("does not retry other errors", async () => {
    const fn = vi.fn<() => Promise<string>>().mockRejectedValue(new ValidationError("bad"));

    await expect(withRetry(fn, { attempts: 3, delayMs: 0 })).rejects.toBeInstanceOf(ValidationError);
    expect(fn).toHaveBeenCalledTimes(1);
  });
});
