import { TimeoutExceededError } from "../core/errors";
import type { ElementSnapshot } from "./driver-types";
import type { Locator } from "./locator";
import { SoftAssertionCollector } from "./soft-assertions";

export type ExpectOptions = {
  timeoutMs?: number;
  pollIntervalMs?: number;
};

type AssertionSettings = {
  negate: boolean;
  /** Set for soft assertions: timeouts are recorded here instead of thrown. */
  collector: SoftAssertionCollector | null;
  timeoutMs?: number;
};

type Expectation<T> = {
  name: string;
  read: (snapshot: ElementSnapshot) => T;
  matches: (value: T) => boolean;
  expected: string;
  received: (value: T) => string;
};

const NOT_FOUND = "<element not found>";

export function normalizeWhitespace(value: string): string {
  return value.replace(/\s+/g, " ").trim();
}

function quote(value: string): string {
  return JSON.stringify(value);
}

/**
 * Web-first assertions: each one polls the element until the expectation holds
 * or the deadline passes. The timeout reason names expected and received values.
 */
export class LocatorAssertions {
  constructor(
    private readonly locator: Locator,
    private readonly settings: AssertionSettings
  ) {}

  get not(): LocatorAssertions {
    return new LocatorAssertions(this.locator, { ...this.settings, negate: !this.settings.negate });
  }

  toBeVisible(options: ExpectOptions = {}): Promise<void> {
    return this.assert({
      name: "toBeVisible",
      read: (snapshot) => (snapshot.exists ? (snapshot.visible ? "visible" : "hidden") : "detached"),
      matches: (state) => state === "visible",
      expected: "visible",
      received: (state) => state
    }, options);
  }

  toBeHidden(options: ExpectOptions = {}): Promise<void> {
    return this.assert({
      name: "toBeHidden",
      read: (snapshot) => (snapshot.exists ? (snapshot.visible ? "visible" : "hidden") : "detached"),
      matches: (state) => state !== "visible",
      expected: "hidden",
      received: (state) => state
    }, options);
  }

  toBeEnabled(options: ExpectOptions = {}): Promise<void> {
    return this.assert({
      name: "toBeEnabled",
      read: (snapshot) => (snapshot.exists ? (snapshot.enabled ? "enabled" : "disabled") : "detached"),
      matches: (state) => state === "enabled",
      expected: "enabled",
      received: (state) => state
    }, options);
  }

  /** Strings compare after whitespace is collapsed on both sides; patterns test the collapsed text. */
  toHaveText(expected: string | RegExp, options: ExpectOptions = {}): Promise<void> {
    const wanted = typeof expected === "string" ? normalizeWhitespace(expected) : expected;
    return this.assert<string | null>({
      name: "toHaveText",
      read: (snapshot) => (snapshot.exists ? normalizeWhitespace(snapshot.text ?? "") : null),
      matches: (text) => text !== null && (typeof wanted === "string" ? text === wanted : wanted.test(text)),
      expected: `text ${typeof wanted === "string" ? quote(wanted) : String(wanted)}`,
      received: (text) => (text === null ? NOT_FOUND : quote(text))
    }, options);
  }

  toHaveCount(expected: number, options: ExpectOptions = {}): Promise<void> {
    return this.assert({
      name: "toHaveCount",
      read: (snapshot) => (snapshot.exists ? snapshot.count : 0),
      matches: (count) => count === expected,
      expected: `count ${expected}`,
      received: (count) => String(count)
    }, options);
  }

  toHaveAttribute(name: string, expected: string | RegExp, options: ExpectOptions = {}): Promise<void> {
    return this.assert<string | null>({
      name: "toHaveAttribute",
      read: (snapshot) => (snapshot.exists ? snapshot.attributes?.[name] ?? null : null),
      matches: (value) => value !== null && (typeof expected === "string" ? value === expected : expected.test(value)),
      expected: `attribute ${quote(name)} to be ${typeof expected === "string" ? quote(expected) : String(expected)}`,
      received: (value) => (value === null ? "<absent>" : quote(value))
    }, options);
  }

  private async assert<T>(expectation: Expectation<T>, options: ExpectOptions): Promise<void> {
    const { negate, collector } = this.settings;
    const env = this.locator.document.environment();
    const timeoutMs = options.timeoutMs ?? this.settings.timeoutMs ?? env.config.timeouts.expectMs;
    const operation = `expect(${this.locator.selector})${negate ? ".not" : ""}.${expectation.name}`;
    try {
      await this.locator.waitFor(
        expectation.read,
        (value) => {
          if (expectation.matches(value) !== negate) return true;
          return {
            pass: false,
            reason: `expected ${negate ? "not " : ""}${expectation.expected}, received ${expectation.received(value)}`
          };
        },
        { timeoutMs, pollIntervalMs: options.pollIntervalMs, operation }
      );
    } catch (error) {
      if (collector && error instanceof TimeoutExceededError) {
        collector.record(error);
        return;
      }
      throw error;
    }
  }
}

export type Expect = {
  (locator: Locator, options?: { timeoutMs?: number }): LocatorAssertions;
  /** Records a failed expectation in `collector` and lets the test continue. */
  soft: (locator: Locator, options?: { timeoutMs?: number }) => LocatorAssertions;
  collector: SoftAssertionCollector;
};

export type CreateExpectOptions = {
  collector?: SoftAssertionCollector;
  timeoutMs?: number;
};

export function createExpect(options: CreateExpectOptions = {}): Expect {
  const collector = options.collector ?? new SoftAssertionCollector();
  const hard = (locator: Locator, local: { timeoutMs?: number } = {}) => new LocatorAssertions(locator, {
    negate: false,
    collector: null,
    timeoutMs: local.timeoutMs ?? options.timeoutMs
  });
  const soft = (locator: Locator, local: { timeoutMs?: number } = {}) => new LocatorAssertions(locator, {
    negate: false,
    collector,
    timeoutMs: local.timeoutMs ?? options.timeoutMs
  });
  return Object.assign(hard, { soft, collector });
}
