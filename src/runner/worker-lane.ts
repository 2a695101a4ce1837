import { systemClock, type Clock } from "../core/clock";
import { createLogger, silentSink, type Logger } from "../core/logging";
import type { FixtureRegistry } from "../fixtures/fixture-registry";
import type { FixtureScope } from "../fixtures/fixture-scope";
import { runWithRetry, type TestFn, type TestOutcome } from "./test-retry";

export type WorkerLaneOptions = {
  index?: number;
  /** Extra attempts after the first failure; defaults to 0. */
  retries?: number;
  logger?: Logger;
  clock?: Clock;
};

/**
 * One worker: a worker scope under the process scope and a queue that runs its
 * tests one after another.
 */
export class WorkerLane {
  readonly index: number;
  readonly scope: FixtureScope;
  readonly logger: Logger;
  readonly clock: Clock;
  private readonly retries: number;
  private queue: Promise<void> = Promise.resolve();
  private closing: Promise<void> | null = null;

  constructor(
    readonly registry: FixtureRegistry,
    processScope: FixtureScope,
    options: WorkerLaneOptions = {}
  ) {
    this.index = options.index ?? 0;
    this.scope = processScope.child("worker");
    this.logger = (options.logger ?? createLogger("runner", { sink: silentSink })).child(`worker-${this.index}`);
    this.clock = options.clock ?? systemClock;
    this.retries = options.retries ?? 0;
  }

  /** Queues a test; it starts once every earlier test of this lane finished. */
  test(title: string, fn: TestFn, options: { retries?: number } = {}): Promise<TestOutcome> {
    if (this.closing) {
      return Promise.reject(new Error(`Worker lane ${this.index} is closed`));
    }
    const maxAttempts = (options.retries ?? this.retries) + 1;
    const run = () => runWithRetry(fn, maxAttempts, { lane: this, title });
    const result = this.queue.then(run, run);
    this.queue = result.then(() => undefined, () => undefined);
    return result;
  }

  /** Waits for queued tests, then tears the worker scope down. */
  close(): Promise<void> {
    if (!this.closing) {
      this.closing = this.queue.then(() => this.scope.close());
    }
    return this.closing;
  }
}
