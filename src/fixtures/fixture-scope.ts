import { randomUUID } from "crypto";
import { describeError } from "../core/errors";
import { createLogger, silentSink, type Logger } from "../core/logging";

export type ScopeKind = "test" | "worker" | "process";

/** Larger lives longer. */
export const SCOPE_RANK: Record<ScopeKind, number> = {
  test: 0,
  worker: 1,
  process: 2
};

export type TeardownEntry = {
  fixture: string;
  teardown: () => Promise<void> | void;
};

/**
 * One lifetime instance (a test attempt, a worker, the process). Holds the
 * teardowns of fixtures set up in it, in setup order.
 */
export class FixtureScope {
  readonly id = randomUUID();
  private entries: TeardownEntry[] = [];
  private children = new Set<FixtureScope>();
  private closing: Promise<void> | null = null;
  private readonly logger: Logger;

  constructor(
    readonly kind: ScopeKind,
    readonly parent: FixtureScope | null = null,
    logger?: Logger
  ) {
    if (parent && SCOPE_RANK[parent.kind] <= SCOPE_RANK[kind]) {
      throw new Error(`A ${kind} scope cannot be nested in a ${parent.kind} scope`);
    }
    this.logger = logger ?? parent?.logger ?? createLogger("fixtures", { sink: silentSink });
  }

  get closed(): boolean {
    return this.closing !== null;
  }

  child(kind: ScopeKind): FixtureScope {
    if (this.closing) {
      throw new Error(`Scope ${this.kind} is closed`);
    }
    const scope = new FixtureScope(kind, this, this.logger);
    this.children.add(scope);
    return scope;
  }

  /** This scope or the nearest ancestor of `kind`; fixtures of that scope live there. */
  forScope(kind: ScopeKind): FixtureScope {
    let current: FixtureScope | null = this;
    while (current) {
      if (current.kind === kind) return current;
      current = current.parent;
    }
    throw new Error(`No ${kind} scope is active above this ${this.kind} scope`);
  }

  /** Fixture names in setup order. */
  setupOrder(): string[] {
    return this.entries.map((entry) => entry.fixture);
  }

  add(entry: TeardownEntry): void {
    this.entries.push(entry);
  }

  /** Removes and runs one teardown; used to roll back a failed resolution. */
  async release(entry: TeardownEntry): Promise<void> {
    const index = this.entries.indexOf(entry);
    if (index < 0) return;
    this.entries.splice(index, 1);
    await this.runTeardown(entry);
  }

  /**
   * Closes child scopes, then tears down this scope's fixtures in reverse setup
   * order. Every teardown runs; failures are raised together afterwards.
   */
  close(): Promise<void> {
    if (!this.closing) {
      this.closing = this.closeOnce();
    }
    return this.closing;
  }

  private async closeOnce(): Promise<void> {
    const failures: unknown[] = [];
    for (const child of Array.from(this.children).reverse()) {
      try {
        await child.close();
      } catch (error) {
        failures.push(error);
      }
    }
    this.children.clear();
    this.parent?.children.delete(this);

    const entries = this.entries.reverse();
    this.entries = [];
    for (const entry of entries) {
      try {
        await this.runTeardown(entry);
      } catch (error) {
        failures.push(error);
      }
    }
    this.logger.debug("fixture.scope_closed", { data: { scope: this.kind, failures: failures.length } });
    if (failures.length === 1) {
      throw failures[0];
    }
    if (failures.length > 1) {
      throw new AggregateError(failures, `${failures.length} fixture teardowns failed in ${this.kind} scope`);
    }
  }

  private async runTeardown(entry: TeardownEntry): Promise<void> {
    try {
      await entry.teardown();
      this.logger.debug("fixture.teardown", { data: { fixture: entry.fixture, scope: this.kind } });
    } catch (error) {
      this.logger.warn("fixture.teardown_failed", {
        data: { fixture: entry.fixture, scope: this.kind, error: describeError(error) }
      });
      throw error;
    }
  }
}
