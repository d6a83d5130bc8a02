import { describe, test, expect } from "vitest";
import { DEFAULT_RETRY_POLICY, backoffDelay, isTransientError, withRetry, withTimeout } from "@/lib/retry";
import { HttpError, TimeoutError } from "@/lib/errors";

function recordingSleep() {
  const delays: number[] = [];
  return { delays, sleep: async (ms: number) => void delays.push(ms) };
}

describe("withRetry", () => {
  test("retries transient failures with exponential backoff", async () => {
    const { delays, sleep } = recordingSleep();
    let calls = 0;
    const value = await withRetry(
      async () => {
        calls++;
        if (calls < 3) throw new HttpError(503, "unavailable");
        return "ok";
      },
      DEFAULT_RETRY_POLICY,
      { label: "test", sleep },
    );
    expect(value).toBe("ok");
    expect(calls).toBe(3);
    expect(delays).toEqual([1000, 2000]);
  });

  test("does not retry client errors", async () => {
    const { delays, sleep } = recordingSleep();
    let calls = 0;
    await expect(
      withRetry(
        async () => {
          calls++;
          throw new HttpError(400, "bad request");
        },
        DEFAULT_RETRY_POLICY,
        { label: "test", sleep },
      ),
    ).rejects.toThrow("bad request");
    expect(calls).toBe(1);
    expect(delays).toEqual([]);
  });

  test("gives up after the last attempt", async () => {
    const { delays, sleep } = recordingSleep();
    let calls = 0;
    await expect(
      withRetry(
        async () => {
          calls++;
          throw new HttpError(429, "slow down");
        },
        { ...DEFAULT_RETRY_POLICY, maxAttempts: 3 },
        { label: "test", sleep },
      ),
    ).rejects.toThrow("slow down");
    expect(calls).toBe(3);
    expect(delays).toEqual([1000, 2000]);
  });
});

describe("withRetry cancellation", () => {
  test("does not retry once the signal has aborted", async () => {
    const { delays, sleep } = recordingSleep();
    const controller = new AbortController();
    let calls = 0;
    await expect(
      withRetry(
        async () => {
          calls++;
          controller.abort();
          throw new HttpError(503, "unavailable");
        },
        DEFAULT_RETRY_POLICY,
        { label: "test", sleep, signal: controller.signal },
      ),
    ).rejects.toThrow("unavailable");
    expect(calls).toBe(1);
    expect(delays).toEqual([]);
  });

  test("an abort during backoff rejects with the abort reason", async () => {
    const controller = new AbortController();
    let calls = 0;
    await expect(
      withRetry(
        async () => {
          calls++;
          throw new HttpError(503, "unavailable");
        },
        DEFAULT_RETRY_POLICY,
        {
          label: "test",
          sleep: () => {
            controller.abort(new Error("run cancelled"));
            return new Promise<void>(() => {});
          },
          signal: controller.signal,
        },
      ),
    ).rejects.toThrow("run cancelled");
    expect(calls).toBe(1);
  });
});

describe("isTransientError", () => {
  test("classifies timeouts, network codes, statuses and causes", () => {
    expect(isTransientError(new TimeoutError("x", 5))).toBe(true);
    expect(isTransientError({ code: "ECONNRESET" })).toBe(true);
    expect(isTransientError(new Error("wrapped", { cause: new HttpError(502, "bad gateway") }))).toBe(true);
    expect(isTransientError({ status: 401 })).toBe(false);
    expect(isTransientError(new Error("plain"))).toBe(false);
    expect(isTransientError("nope")).toBe(false);
  });
});

describe("backoffDelay", () => {
  test("caps at the maximum delay", () => {
    expect(backoffDelay(DEFAULT_RETRY_POLICY, 3)).toBe(4000);
    expect(backoffDelay(DEFAULT_RETRY_POLICY, 10)).toBe(30_000);
  });
});

describe("withTimeout", () => {
  test("rejects and aborts the call's signal when time runs out", async () => {
    let seen: AbortSignal | undefined;
    await expect(
      withTimeout(
        (signal) => {
          seen = signal;
          return new Promise<never>(() => {});
        },
        10,
        "slow call",
      ),
    ).rejects.toThrow("slow call timed out after 10ms");
    expect(seen?.aborted).toBe(true);
  });

  test("an outer abort rejects at once and aborts the call's signal", async () => {
    const controller = new AbortController();
    let seen: AbortSignal | undefined;
    const pending = withTimeout(
      (signal) => {
        seen = signal;
        return new Promise<never>(() => {});
      },
      10_000,
      "slow call",
      controller.signal,
    );
    controller.abort(new Error("run cancelled"));
    await expect(pending).rejects.toThrow("run cancelled");
    expect(seen?.aborted).toBe(true);
  });

  test("passes through a value in time", async () => {
    expect(await withTimeout(async () => 42, 1000, "fast")).toBe(42);
  });
});
