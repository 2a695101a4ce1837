import type { PollingConfig } from "../config";
import { abortReason, raceDeadline, systemClock, type Clock } from "../core/clock";
import { TimeoutExceededError, describeError, isAutowaitError } from "../core/errors";
import type { Logger } from "../core/logging";

export type Verdict = boolean | { pass: boolean; reason?: string };

export type Probe<T> = (signal?: AbortSignal) => Promise<T> | T;
export type SuccessPredicate<T> = (value: T) => Verdict;

export type RetryOptions = {
  /** 0 disables the deadline. */
  timeoutMs: number;
  /** Constant interval between polls. When omitted the `polling` backoff applies. */
  pollIntervalMs?: number;
  polling?: PollingConfig;
  signal?: AbortSignal;
  clock?: Clock;
  operation?: string;
  logger?: Logger;
  nodeId?: string;
};

export type RetryResult<T> = {
  value: T;
  attempts: number;
  elapsedMs: number;
};

export const DEFAULT_POLLING: PollingConfig = {
  initialMs: 20,
  factor: 2,
  maxMs: 100
};

/** Yields the wait before each follow-up poll: constant, or exponential up to a cap. */
export function createIntervalSequence(options: Pick<RetryOptions, "pollIntervalMs" | "polling">): () => number {
  if (typeof options.pollIntervalMs === "number") {
    const fixed = Math.max(0, options.pollIntervalMs);
    return () => fixed;
  }
  const policy = options.polling ?? DEFAULT_POLLING;
  let next = policy.initialMs;
  return () => {
    const current = Math.min(next, policy.maxMs);
    next = Math.min(next * policy.factor, policy.maxMs);
    return current;
  };
}

function normalizeVerdict(verdict: Verdict): { pass: boolean; reason?: string } {
  return typeof verdict === "boolean" ? { pass: verdict } : verdict;
}

/**
 * Polls `probe` until `predicate` accepts its value. The first poll is immediate;
 * polls never overlap, and polling stops on the first success. Past the deadline
 * the call fails with the last concrete failure reason. A probe error counts as a
 * failed poll unless it is one of our own errors (disconnection and friends).
 */
export async function retry<T>(
  probe: Probe<T>,
  predicate: SuccessPredicate<T>,
  options: RetryOptions
): Promise<RetryResult<T>> {
  const clock = options.clock ?? systemClock;
  const signal = options.signal;
  const operation = options.operation ?? "retry";
  const startedAt = clock.now();
  const deadline = options.timeoutMs > 0 ? startedAt + options.timeoutMs : Number.POSITIVE_INFINITY;
  const nextInterval = createIntervalSequence(options);
  let attempts = 0;
  let lastReason: string | null = null;
  const timeout = (reason: string) => {
    options.logger?.warn("retry.timeout", {
      nodeId: options.nodeId,
      data: { operation, attempts, timeoutMs: options.timeoutMs, lastReason: reason }
    });
    return new TimeoutExceededError({ operation, timeoutMs: options.timeoutMs, lastReason: reason, attempts });
  };

  while (true) {
    if (signal?.aborted) {
      throw abortReason(signal);
    }
    attempts += 1;
    try {
      // a poll that never settles must not outlive the deadline
      const value = await raceDeadline(Promise.resolve().then(() => probe(signal)), {
        clock,
        deadline,
        signal,
        onTimeout: () => timeout(lastReason ?? "poll did not complete")
      });
      const verdict = normalizeVerdict(predicate(value));
      if (verdict.pass) {
        const elapsedMs = clock.now() - startedAt;
        options.logger?.debug("retry.succeeded", { nodeId: options.nodeId, data: { operation, attempts, elapsedMs } });
        return { value, attempts, elapsedMs };
      }
      lastReason = verdict.reason ?? "condition not met";
    } catch (error) {
      if (signal?.aborted) {
        throw abortReason(signal);
      }
      if (isAutowaitError(error)) {
        throw error;
      }
      lastReason = describeError(error);
    }

    const now = clock.now();
    if (now >= deadline) {
      throw timeout(lastReason ?? "condition not met");
    }
    await clock.sleep(Math.min(nextInterval(), deadline - now), signal);
  }
}
