import { ConflictError, HttpError, RateLimitError } from "./errors.js";
import type { SleepFn } from "./types.js";
import { logWarn, sleep as defaultSleep, throwIfAborted } from "./utils.js";

/**
 * One retry strategy: which failures it owns, how many attempts it allows in
 * total and how long to wait before the next one.
 */
export type RetryPolicy = {
  name: string;
  maxAttempts: number;
  matches: (error: unknown) => boolean;
  waitMs: (error: unknown, attempt: number) => number;
};

export type RetryRunOptions = {
  sleep?: SleepFn;
  signal?: AbortSignal;
  operation?: string;
};

export type RetryStats = {
  attempts: number;
  retriesByPolicy: Record<string, number>;
};

export function isConflictError(error: unknown): error is ConflictError {
  return error instanceof ConflictError;
}

export function isRateLimitError(error: unknown): error is RateLimitError {
  return error instanceof RateLimitError;
}

export function conflictPolicy(
  options: { maxAttempts?: number; minWaitMs?: number; maxWaitMs?: number; random?: () => number } = {},
): RetryPolicy {
  const minWaitMs = options.minWaitMs ?? 10_000;
  const maxWaitMs = Math.max(minWaitMs, options.maxWaitMs ?? 20_000);
  const random = options.random ?? Math.random;
  return {
    name: "conflict",
    maxAttempts: options.maxAttempts ?? 5,
    matches: isConflictError,
    waitMs: () => minWaitMs + random() * (maxWaitMs - minWaitMs),
  };
}

export function rateLimitPolicy(options: { maxAttempts?: number; defaultWaitMs?: number } = {}): RetryPolicy {
  const defaultWaitMs = options.defaultWaitMs ?? 60_000;
  return {
    name: "rateLimit",
    maxAttempts: options.maxAttempts ?? 10,
    matches: isRateLimitError,
    waitMs: (error) => (error instanceof RateLimitError && error.retryAfterMs !== null ? error.retryAfterMs : defaultWaitMs),
  };
}

/**
 * Runs `operation` until it succeeds, a failure matches no policy, or the
 * matching policy has used all of its attempts. Attempts are counted per policy,
 * so a path guarded by several policies gets each one's full budget.
 */
export async function runWithRetry<T>(
  operation: (attempt: number) => Promise<T>,
  policies: RetryPolicy[],
  options: RetryRunOptions = {},
  stats?: RetryStats,
): Promise<T> {
  const sleep = options.sleep ?? defaultSleep;
  const failuresByPolicy = new Map<string, number>();
  let attempt = 0;

  // eslint-disable-next-line no-constant-condition
  while (true) {
    throwIfAborted(options.signal);
    attempt++;
    if (stats) stats.attempts = attempt;
    try {
      return await operation(attempt);
    } catch (e) {
      const policy = policies.find((p) => p.matches(e));
      if (!policy) throw e;

      const failures = (failuresByPolicy.get(policy.name) ?? 0) + 1;
      failuresByPolicy.set(policy.name, failures);
      if (failures >= policy.maxAttempts) throw e;

      const waitMs = Math.max(0, Math.round(policy.waitMs(e, failures)));
      if (stats) stats.retriesByPolicy[policy.name] = failures;
      logWarn("retry.scheduled", {
        policy: policy.name,
        operation: options.operation ?? "request",
        attempt: failures,
        maxAttempts: policy.maxAttempts,
        waitMs,
        status: e instanceof HttpError ? e.statusCode : null,
        error: e instanceof Error ? `${e.name}: ${e.message}` : String(e),
      });
      await sleep(waitMs, options.signal);
    }
  }
}
