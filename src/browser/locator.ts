import { abortReason, raceAbort, raceDeadline } from "../core/clock";
import { TimeoutExceededError } from "../core/errors";
import { createActionabilityPredicate, type ActionabilityCheck } from "./actionability";
import type { Document, DocumentEnvironment } from "./document";
import type { ElementAction, ElementSnapshot } from "./driver-types";
import type { SubDocument } from "./nodes";
import { retry, type RetryResult } from "./retry-engine";

export type ActionOptions = {
  timeoutMs?: number;
  /** Overrides the configured backoff with a constant poll interval. */
  pollIntervalMs?: number;
};

export type ActionReport = {
  action: ElementAction["type"];
  selector: string;
  attempts: number;
  elapsedMs: number;
};

const ACTION_CHECKS: Record<ElementAction["type"], ActionabilityCheck[]> = {
  click: ["attached", "visible", "stable", "receivesEvents", "enabled"],
  check: ["attached", "visible", "stable", "receivesEvents", "enabled"],
  hover: ["attached", "visible", "stable", "receivesEvents"],
  fill: ["attached", "visible", "enabled"],
  press: ["attached"]
};

export class Locator {
  constructor(
    readonly document: Document,
    readonly frame: SubDocument,
    readonly selector: string
  ) {}

  /** Reads the element state once, without waiting. */
  async snapshot(): Promise<ElementSnapshot> {
    if (this.frame.signal.aborted) {
      throw abortReason(this.frame.signal);
    }
    return raceAbort(this.document.driver.probe(this.frame.frameId, this.selector), this.frame.signal);
  }

  /** Polls the element state until `predicate` holds; the building block for assertions. */
  waitFor<T>(
    read: (snapshot: ElementSnapshot) => T,
    predicate: (value: T) => boolean | { pass: boolean; reason?: string },
    options: { timeoutMs: number; pollIntervalMs?: number; operation: string }
  ): Promise<RetryResult<T>> {
    const hierarchy = this.hierarchyEnv();
    return retry(
      async () => read(await this.document.driver.probe(this.frame.frameId, this.selector)),
      predicate,
      {
        timeoutMs: options.timeoutMs,
        pollIntervalMs: options.pollIntervalMs,
        polling: hierarchy.config.polling,
        signal: this.frame.signal,
        clock: hierarchy.clock,
        operation: options.operation,
        logger: hierarchy.logger,
        nodeId: this.frame.id
      }
    );
  }

  click(options: ActionOptions = {}): Promise<ActionReport> {
    return this.act({ type: "click" }, options);
  }

  hover(options: ActionOptions = {}): Promise<ActionReport> {
    return this.act({ type: "hover" }, options);
  }

  check(options: ActionOptions = {}): Promise<ActionReport> {
    return this.act({ type: "check" }, options);
  }

  fill(value: string, options: ActionOptions = {}): Promise<ActionReport> {
    return this.act({ type: "fill", value }, options);
  }

  press(key: string, options: ActionOptions = {}): Promise<ActionReport> {
    return this.act({ type: "press", key }, options);
  }

  /**
   * Waits for actionability, performs the action, then waits for any dialog or
   * popup the action raised to be resolved. One deadline covers all three steps.
   */
  private act(action: ElementAction, options: ActionOptions): Promise<ActionReport> {
    const env = this.hierarchyEnv();
    const timeoutMs = options.timeoutMs ?? env.config.timeouts.actionMs;
    const operation = `locator.${action.type}(${this.selector})`;

    return this.document.runExclusive(async () => {
      const startedAt = env.clock.now();
      const deadline = timeoutMs > 0 ? startedAt + timeoutMs : undefined;
      const ready = await this.waitFor(
        (snapshot) => snapshot,
        createActionabilityPredicate(ACTION_CHECKS[action.type]),
        { timeoutMs, pollIntervalMs: options.pollIntervalMs, operation }
      );

      await this.untilDeadline(
        this.document.driver.perform(this.frame.frameId, this.selector, action),
        deadline,
        timeoutMs,
        operation,
        `${action.type} did not complete`
      );
      await this.document.hub.idle({
        deadline,
        signal: this.document.signal,
        operation,
        timeoutMs
      });

      env.logger.debug("locator.action", {
        nodeId: this.frame.id,
        data: { operation, attempts: ready.attempts }
      });
      return {
        action: action.type,
        selector: this.selector,
        attempts: ready.attempts,
        elapsedMs: env.clock.now() - startedAt
      };
    });
  }

  private untilDeadline<T>(
    task: Promise<T>,
    deadline: number | undefined,
    timeoutMs: number,
    operation: string,
    fallbackReason: string
  ): Promise<T> {
    return raceDeadline(task, {
      clock: this.hierarchyEnv().clock,
      deadline,
      signal: this.frame.signal,
      onTimeout: () => new TimeoutExceededError({
        operation,
        timeoutMs,
        lastReason: this.document.hub.blockingReason() ?? fallbackReason
      })
    });
  }

  private hierarchyEnv(): DocumentEnvironment {
    return this.document.environment();
  }
}
