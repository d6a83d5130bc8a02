/**
 * Retry policy and per-call timeout for adapters that perform network I/O.
 * Never wrapped around the match cascade itself.
 */

import { HttpError, TimeoutError, errorMessage } from "@/lib/errors";
import type { Logger } from "@/lib/logger";
import { silentLogger } from "@/lib/logger";

// ─── Policy ──────────────────────────────────────────────

export interface RetryPolicy {
  maxAttempts: number;
  baseDelayMs: number;
  maxDelayMs: number;
  /** Multiplier applied per attempt (exponential backoff). */
  factor: number;
  isRetryable: (err: unknown) => boolean;
}

const RETRYABLE_STATUS = new Set([408, 409, 429, 500, 502, 503, 504]);
const RETRYABLE_CODES = new Set(["ECONNRESET", "ETIMEDOUT", "ECONNREFUSED", "EAI_AGAIN", "EPIPE"]);

function readStatus(err: object): number | null {
  if (err instanceof HttpError) return err.status;
  // openai SDK errors expose `status`
  const status: unknown = Reflect.get(err, "status");
  return typeof status === "number" ? status : null;
}

export function isTransientError(err: unknown): boolean {
  if (err instanceof TimeoutError) return true;
  if (typeof err !== "object" || err === null) return false;
  const status = readStatus(err);
  if (status !== null) return RETRYABLE_STATUS.has(status);
  const code: unknown = Reflect.get(err, "code");
  if (typeof code === "string" && RETRYABLE_CODES.has(code)) return true;
  const cause: unknown = Reflect.get(err, "cause");
  return cause !== undefined && cause !== err ? isTransientError(cause) : false;
}

export const DEFAULT_RETRY_POLICY: RetryPolicy = {
  maxAttempts: 4,
  baseDelayMs: 1000,
  maxDelayMs: 30_000,
  factor: 2,
  isRetryable: isTransientError,
};

export function backoffDelay(policy: RetryPolicy, attempt: number): number {
  return Math.min(policy.baseDelayMs * policy.factor ** (attempt - 1), policy.maxDelayMs);
}

// ─── Execution ───────────────────────────────────────────

export type Sleep = (ms: number) => Promise<void>;

const defaultSleep: Sleep = (ms) => new Promise((resolve) => setTimeout(resolve, ms));

export interface RetryOptions {
  label: string;
  logger?: Logger;
  sleep?: Sleep;
  /** Once aborted, no further attempt starts and a pending backoff ends. */
  signal?: AbortSignal;
}

/** Resolves after `sleep(ms)`, or rejects with the abort reason if `signal` fires first. */
function sleepUnlessAborted(sleep: Sleep, ms: number, signal?: AbortSignal): Promise<void> {
  if (!signal) return sleep(ms);
  return new Promise<void>((resolve, reject) => {
    const onAbort = () => reject(signal.reason);
    signal.addEventListener("abort", onAbort, { once: true });
    sleep(ms).then(
      () => {
        signal.removeEventListener("abort", onAbort);
        resolve();
      },
      (err: unknown) => {
        signal.removeEventListener("abort", onAbort);
        reject(err);
      },
    );
  });
}

export async function withRetry<T>(
  fn: (attempt: number) => Promise<T>,
  policy: RetryPolicy,
  { label, logger = silentLogger, sleep = defaultSleep, signal }: RetryOptions,
): Promise<T> {
  for (let attempt = 1; ; attempt++) {
    signal?.throwIfAborted();
    try {
      return await fn(attempt);
    } catch (err) {
      if (signal?.aborted || attempt >= policy.maxAttempts || !policy.isRetryable(err)) throw err;
      const delay = backoffDelay(policy, attempt);
      logger.warn(`${label} failed, retrying`, {
        attempt,
        maxAttempts: policy.maxAttempts,
        delayMs: delay,
        error: errorMessage(err),
      });
      await sleepUnlessAborted(sleep, delay, signal);
    }
  }
}

/**
 * Rejects with `TimeoutError` if `fn` does not settle in time, or with the
 * abort reason when `signal` fires; either way the signal given to `fn` aborts.
 */
export async function withTimeout<T>(
  fn: (signal: AbortSignal) => Promise<T>,
  timeoutMs: number,
  label: string,
  signal?: AbortSignal,
): Promise<T> {
  signal?.throwIfAborted();
  const controller = new AbortController();
  let timer: ReturnType<typeof setTimeout> | undefined;
  let onAbort: (() => void) | undefined;
  const stop = new Promise<never>((_, reject) => {
    timer = setTimeout(() => {
      controller.abort();
      reject(new TimeoutError(label, timeoutMs));
    }, timeoutMs);
    if (signal) {
      const outer = signal;
      onAbort = () => {
        controller.abort();
        reject(outer.reason);
      };
      outer.addEventListener("abort", onAbort, { once: true });
    }
  });
  try {
    return await Promise.race([fn(controller.signal), stop]);
  } finally {
    clearTimeout(timer);
    if (onAbort) signal?.removeEventListener("abort", onAbort);
  }
}

export interface CallPolicy {
  retry: RetryPolicy;
  timeoutMs: number;
  logger?: Logger;
  sleep?: Sleep;
}

/** Retry + timeout around one adapter call; `signal` cancels the whole sequence. */
export function guardedCall<T>(
  label: string,
  fn: (signal: AbortSignal) => Promise<T>,
  policy: CallPolicy,
  signal?: AbortSignal,
): Promise<T> {
  return withRetry(() => withTimeout(fn, policy.timeoutMs, label, signal), policy.retry, {
    label,
    logger: policy.logger,
    sleep: policy.sleep,
    signal,
  });
}
