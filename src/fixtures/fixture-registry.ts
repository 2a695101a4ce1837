import { DependencyCycleError, FixtureSetupFailedError, describeError } from "../core/errors";
import { createLogger, silentSink, type Logger } from "../core/logging";
import { FixtureScope, SCOPE_RANK, type ScopeKind, type TeardownEntry } from "./fixture-scope";

/** Access to the values of a fixture's declared dependencies, all set up before `setup` runs. */
export type FixtureDeps = {
  use: <T>(handle: FixtureHandle<T>) => T;
  get: (name: string) => unknown;
};

export type FixtureDefinition<T> = {
  name: string;
  scope: ScopeKind;
  dependencies?: string[];
  setup: (deps: FixtureDeps, scope: FixtureScope) => Promise<T> | T;
  teardown?: (value: T) => Promise<void> | void;
};

type Settled<T> = { value: T };

/** Typed reference to a registered fixture; values are cached per owning scope. */
export class FixtureHandle<T> {
  private readonly inflight = new WeakMap<FixtureScope, Promise<T>>();
  private readonly settled = new WeakMap<FixtureScope, Settled<T>>();

  constructor(readonly definition: FixtureDefinition<T>) {}

  get name(): string {
    return this.definition.name;
  }

  get scope(): ScopeKind {
    return this.definition.scope;
  }

  get dependencies(): string[] {
    return this.definition.dependencies ?? [];
  }

  valueIn(owner: FixtureScope): Settled<T> | undefined {
    return this.settled.get(owner);
  }

  /** Runs `create` once per owner; concurrent callers share the in-flight promise. */
  instanceIn(owner: FixtureScope, create: () => Promise<T>): Promise<T> {
    const existing = this.inflight.get(owner);
    if (existing) return existing;
    const pending = create().then(
      (value) => {
        this.settled.set(owner, { value });
        return value;
      },
      (error: unknown) => {
        this.inflight.delete(owner);
        throw error;
      }
    );
    this.inflight.set(owner, pending);
    return pending;
  }

  forget(owner: FixtureScope): void {
    this.inflight.delete(owner);
    this.settled.delete(owner);
  }
}

type ErasedHandle = {
  readonly name: string;
  readonly scope: ScopeKind;
  readonly dependencies: string[];
  valueIn: (owner: FixtureScope) => { value: unknown } | undefined;
  forget: (owner: FixtureScope) => void;
  resolveIn: (owner: FixtureScope, deps: FixtureDeps, chain: ChainEntry[]) => Promise<unknown>;
};

type ChainEntry = {
  handle: ErasedHandle;
  owner: FixtureScope;
  entry: TeardownEntry;
};

/**
 * Named fixtures with scopes and dependencies. Dependencies are set up first and
 * torn down last; a failed setup rolls back what its resolution chain created.
 */
export class FixtureRegistry {
  private readonly fixtures = new Map<string, ErasedHandle>();
  private readonly logger: Logger;

  constructor(options: { logger?: Logger } = {}) {
    this.logger = options.logger ?? createLogger("fixtures", { sink: silentSink });
  }

  register<T>(definition: FixtureDefinition<T>): FixtureHandle<T> {
    if (this.fixtures.has(definition.name)) {
      throw new Error(`Fixture "${definition.name}" is already registered`);
    }
    const handle = new FixtureHandle(definition);
    const dependencies = handle.dependencies;
    const cycle = this.findCycle(definition.name, dependencies);
    if (cycle) {
      throw new DependencyCycleError(cycle);
    }
    for (const dependency of dependencies) {
      const known = this.fixtures.get(dependency);
      if (known) this.assertScopeRule(definition.name, definition.scope, known);
    }
    // setup and teardown close over T, so the registry itself never needs to know it
    const erased: ErasedHandle = {
      name: handle.name,
      scope: handle.scope,
      dependencies,
      valueIn: (owner) => handle.valueIn(owner),
      forget: (owner) => handle.forget(owner),
      resolveIn: (owner, deps, chain) => handle.instanceIn(owner, async () => {
        if (owner.closed) {
          throw new Error(`Scope ${owner.kind} is closed`);
        }
        const value = await definition.setup(deps, owner);
        if (owner.closed) {
          // the scope's teardowns already ran; this value would otherwise never be released
          this.logger.warn("fixture.setup_outlived_scope", { data: { fixture: definition.name, scope: owner.kind } });
          await definition.teardown?.(value);
          throw new Error(`Scope ${owner.kind} closed while "${definition.name}" was being set up`);
        }
        const entry: TeardownEntry = {
          fixture: definition.name,
          teardown: () => definition.teardown?.(value)
        };
        owner.add(entry);
        chain.push({ handle: erased, owner, entry });
        this.logger.debug("fixture.setup", { data: { fixture: definition.name, scope: owner.kind } });
        return value;
      })
    };
    this.fixtures.set(definition.name, erased);
    return handle;
  }

  has(name: string): boolean {
    return this.fixtures.has(name);
  }

  names(): string[] {
    return Array.from(this.fixtures.keys());
  }

  resolve<T>(target: FixtureHandle<T>, scope: FixtureScope): Promise<T>;
  resolve(target: string, scope: FixtureScope): Promise<unknown>;
  async resolve<T>(target: FixtureHandle<T> | string, scope: FixtureScope): Promise<T | unknown> {
    const name = typeof target === "string" ? target : target.name;
    const chain: ChainEntry[] = [];
    try {
      const value = await this.resolveNamed(name, scope, chain, []);
      if (typeof target === "string") {
        return value;
      }
      const owner = scope.forScope(target.scope);
      const settled = target.valueIn(owner);
      if (!settled) {
        throw new Error(`Fixture "${name}" resolved without a value`);
      }
      return settled.value;
    } catch (error) {
      await this.rollback(chain);
      throw error;
    }
  }

  private async resolveNamed(name: string, scope: FixtureScope, chain: ChainEntry[], path: string[]): Promise<unknown> {
    const handle = this.fixtures.get(name);
    if (!handle) {
      const requiredBy = path[path.length - 1];
      throw new Error(requiredBy
        ? `Fixture "${requiredBy}" depends on unknown fixture "${name}"`
        : `Unknown fixture "${name}"`);
    }
    const owner = scope.forScope(handle.scope);
    const cached = handle.valueIn(owner);
    if (cached) {
      return cached.value;
    }

    const values = new Map<string, unknown>();
    for (const dependency of handle.dependencies) {
      const known = this.fixtures.get(dependency);
      if (known) this.assertScopeRule(handle.name, handle.scope, known);
      // dependencies resolve from the owner, so a worker fixture never sees a test scope
      values.set(dependency, await this.resolveNamed(dependency, owner, chain, [...path, name]));
    }

    const deps: FixtureDeps = {
      use: (dependency) => {
        if (!values.has(dependency.name)) {
          throw new Error(`Fixture "${name}" did not declare a dependency on "${dependency.name}"`);
        }
        const settled = dependency.valueIn(owner.forScope(dependency.scope));
        if (!settled) {
          throw new Error(`Fixture "${dependency.name}" is not set up`);
        }
        return settled.value;
      },
      get: (dependency) => {
        if (!values.has(dependency)) {
          throw new Error(`Fixture "${name}" did not declare a dependency on "${dependency}"`);
        }
        return values.get(dependency);
      }
    };

    try {
      return await handle.resolveIn(owner, deps, chain);
    } catch (error) {
      if (error instanceof FixtureSetupFailedError) throw error;
      this.logger.error("fixture.setup_failed", { data: { fixture: name, scope: owner.kind, error: describeError(error) } });
      throw new FixtureSetupFailedError(name, error);
    }
  }

  private async rollback(chain: ChainEntry[]): Promise<void> {
    for (const { handle, owner, entry } of chain.reverse()) {
      handle.forget(owner);
      try {
        await owner.release(entry);
      } catch (error) {
        this.logger.warn("fixture.rollback_failed", { data: { fixture: handle.name, error: describeError(error) } });
      }
    }
  }

  private assertScopeRule(name: string, scope: ScopeKind, dependency: ErasedHandle): void {
    if (SCOPE_RANK[dependency.scope] < SCOPE_RANK[scope]) {
      throw new Error(
        `Fixture "${name}" (${scope}) cannot depend on "${dependency.name}" (${dependency.scope}): it outlives it`
      );
    }
  }

  /** Path from `start` back to itself through the known graph, if registering it would close a loop. */
  private findCycle(start: string, dependencies: string[]): string[] | null {
    const visited = new Set<string>();
    const visit = (name: string, path: string[]): string[] | null => {
      const next = name === start ? dependencies : this.fixtures.get(name)?.dependencies ?? [];
      for (const dependency of next) {
        if (dependency === start) {
          return [...path, dependency];
        }
        if (visited.has(dependency)) continue;
        visited.add(dependency);
        const found = visit(dependency, [...path, dependency]);
        if (found) return found;
      }
      return null;
    };
    return visit(start, [start]);
  }
}
