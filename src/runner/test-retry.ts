import { createExpect, type Expect } from "../browser/assertions";
import { SoftAssertionCollector } from "../browser/soft-assertions";
import { describeError } from "../core/errors";
import type { FixtureHandle } from "../fixtures/fixture-registry";
import type { FixtureScope } from "../fixtures/fixture-scope";
import type { WorkerLane } from "./worker-lane";

export type TestContext = {
  attempt: number;
  scope: FixtureScope;
  expect: Expect;
  use: <T>(handle: FixtureHandle<T>) => Promise<T>;
};

export type TestFn = (context: TestContext) => Promise<void> | void;

export type AttemptRecord = {
  attempt: number;
  status: "passed" | "failed";
  durationMs: number;
  softFailures: number;
  error?: Error;
};

export type TestStatus = "passed" | "flaky" | "failed";

export type TestOutcome = {
  title: string;
  status: TestStatus;
  attempts: AttemptRecord[];
  /** Failure of the last failed attempt; null when the test never failed. */
  error: Error | null;
};

export type RunWithRetryOptions = {
  lane: WorkerLane;
  title?: string;
};

function asError(value: unknown): Error {
  return value instanceof Error ? value : new Error(describeError(value));
}

/**
 * Runs `testFn` up to `maxAttempts` times. Every attempt gets a fresh test scope
 * and soft-assertion collector; worker and process fixtures carry over.
 */
export async function runWithRetry(testFn: TestFn, maxAttempts: number, options: RunWithRetryOptions): Promise<TestOutcome> {
  if (!Number.isInteger(maxAttempts) || maxAttempts < 1) {
    throw new Error(`maxAttempts must be a positive integer, got ${maxAttempts}`);
  }
  const { lane } = options;
  const title = options.title ?? "test";
  const logger = lane.logger.child("test");
  const attempts: AttemptRecord[] = [];
  let lastError: Error | null = null;

  for (let attempt = 1; attempt <= maxAttempts; attempt += 1) {
    const startedAt = lane.clock.now();
    const scope = lane.scope.child("test");
    const collector = new SoftAssertionCollector(logger);
    const context: TestContext = {
      attempt,
      scope,
      expect: createExpect({ collector }),
      use: (handle) => lane.registry.resolve(handle, scope)
    };

    let failure: Error | null = null;
    try {
      await testFn(context);
    } catch (error) {
      failure = asError(error);
    }
    const softFailures = collector.count();
    if (!failure) {
      try {
        collector.flush();
      } catch (error) {
        failure = asError(error);
      }
    }
    try {
      await scope.close();
    } catch (error) {
      failure = failure ?? asError(error);
      logger.warn("test.teardown_failed", { data: { title, attempt, error: describeError(error) } });
    }

    const record: AttemptRecord = {
      attempt,
      status: failure ? "failed" : "passed",
      durationMs: lane.clock.now() - startedAt,
      softFailures,
      ...(failure ? { error: failure } : {})
    };
    attempts.push(record);

    if (!failure) {
      const status: TestStatus = attempt === 1 ? "passed" : "flaky";
      logger.info("test.finished", { data: { title, status, attempts: attempt } });
      return { title, status, attempts, error: lastError };
    }
    lastError = failure;
    logger.warn("test.attempt_failed", { data: { title, attempt, maxAttempts, error: failure.message } });
  }

  logger.error("test.finished", { data: { title, status: "failed", attempts: maxAttempts } });
  return { title, status: "failed", attempts, error: lastError };
}
