import { describe, expect, it } from "vitest";
import { FixtureRegistry } from "../src/fixtures/fixture-registry";
import { FixtureScope } from "../src/fixtures/fixture-scope";
import { DependencyCycleError, FixtureSetupFailedError } from "../src/core/errors";

const createScopes = () => {
  const processScope = new FixtureScope("process");
  const worker = processScope.child("worker");
  const test = worker.child("test");
  return { processScope, worker, test };
};

describe("FixtureRegistry", () => {
  it("sets dependencies up first and tears them down last", async () => {
    const registry = new FixtureRegistry();
    const events: string[] = [];
    const track = (name: string, dependencies: string[] = []) => registry.register({
      name,
      scope: "test",
      dependencies,
      setup: () => {
        events.push(`setup:${name}`);
        return name.toUpperCase();
      },
      teardown: () => {
        events.push(`teardown:${name}`);
      }
    });
    track("c");
    track("b", ["c"]);
    const a = track("a", ["b"]);
    const { test } = createScopes();

    await expect(registry.resolve(a, test)).resolves.toBe("A");
    expect(test.setupOrder()).toEqual(["c", "b", "a"]);
    await test.close();

    expect(events).toEqual(["setup:c", "setup:b", "setup:a", "teardown:a", "teardown:b", "teardown:c"]);
  });

  it("hands dependency values to setup", async () => {
    const registry = new FixtureRegistry();
    const baseUrl = registry.register({ name: "baseUrl", scope: "worker", setup: () => "https://example.test" });
    const loginUrl = registry.register({
      name: "loginUrl",
      scope: "test",
      dependencies: ["baseUrl"],
      setup: (deps) => `${deps.use(baseUrl)}/login`
    });
    const { test } = createScopes();

    expect(await registry.resolve(loginUrl, test)).toBe("https://example.test/login");
    expect(await registry.resolve("baseUrl", test)).toBe("https://example.test");
  });

  it("refuses access to undeclared dependencies", async () => {
    const registry = new FixtureRegistry();
    const token = registry.register({ name: "token", scope: "test", setup: () => "test-secret" });
    const client = registry.register({
      name: "client",
      scope: "test",
      setup: (deps) => deps.use(token)
    });
    const { test } = createScopes();

    await expect(registry.resolve(client, test)).rejects.toMatchObject({
      fixture: "client",
      message: 'Fixture "client" setup failed: Fixture "client" did not declare a dependency on "token"'
    });
  });

  it("sets a fixture up once per scope instance, even for concurrent resolves", async () => {
    const registry = new FixtureRegistry();
    let setups = 0;
    const server = registry.register({
      name: "server",
      scope: "worker",
      setup: async () => {
        setups += 1;
        await new Promise((resolve) => setTimeout(resolve, 5));
        return { port: 4000 + setups };
      }
    });
    const { worker } = createScopes();
    const firstTest = worker.child("test");
    const secondTest = worker.child("test");

    const [one, two] = await Promise.all([registry.resolve(server, firstTest), registry.resolve(server, secondTest)]);
    expect(one).toBe(two);
    expect(setups).toBe(1);

    const otherWorker = new FixtureScope("process").child("worker");
    expect(await registry.resolve(server, otherWorker.child("test"))).toEqual({ port: 4002 });
  });

  it("keeps worker fixtures alive across test scopes", async () => {
    const registry = new FixtureRegistry();
    const events: string[] = [];
    registry.register({
      name: "db",
      scope: "worker",
      setup: () => "db",
      teardown: () => {
        events.push("teardown:db");
      }
    });
    const { worker, test } = createScopes();

    await registry.resolve("db", test);
    await test.close();
    expect(events).toEqual([]);
    expect(worker.setupOrder()).toEqual(["db"]);

    await worker.close();
    expect(events).toEqual(["teardown:db"]);
  });

  it("detects cycles when they are registered", () => {
    const registry = new FixtureRegistry();
    registry.register({ name: "a", scope: "test", dependencies: ["b"], setup: () => 1 });
    registry.register({ name: "b", scope: "test", dependencies: ["c"], setup: () => 2 });

    let caught: unknown = null;
    try {
      registry.register({ name: "c", scope: "test", dependencies: ["a"], setup: () => 3 });
    } catch (error) {
      caught = error;
    }
    expect(caught).toBeInstanceOf(DependencyCycleError);
    expect(caught).toMatchObject({ cycle: ["c", "a", "b", "c"], message: "Fixture dependency cycle: c -> a -> b -> c" });
    expect(registry.has("c")).toBe(false);
  });

  it("rejects a fixture that depends on itself", () => {
    const registry = new FixtureRegistry();
    expect(() => registry.register({ name: "loop", scope: "test", dependencies: ["loop"], setup: () => 0 }))
      .toThrow("Fixture dependency cycle: loop -> loop");
  });

  it("rejects dependencies on shorter-lived scopes", async () => {
    const registry = new FixtureRegistry();
    registry.register({ name: "page", scope: "test", setup: () => "page" });
    expect(() => registry.register({ name: "pool", scope: "worker", dependencies: ["page"], setup: () => "pool" }))
      .toThrow('Fixture "pool" (worker) cannot depend on "page" (test): it outlives it');

    registry.register({ name: "cache", scope: "process", dependencies: ["later"], setup: () => "cache" });
    registry.register({ name: "later", scope: "worker", setup: () => "later" });
    await expect(registry.resolve("cache", createScopes().test)).rejects.toThrow(
      'Fixture "cache" (process) cannot depend on "later" (worker): it outlives it'
    );
  });

  it("reports unknown dependencies on first resolve", async () => {
    const registry = new FixtureRegistry();
    registry.register({ name: "user", scope: "test", dependencies: ["account"], setup: () => "user" });

    await expect(registry.resolve("user", createScopes().test)).rejects.toThrow(
      'Fixture "user" depends on unknown fixture "account"'
    );
    await expect(registry.resolve("nothing", createScopes().test)).rejects.toThrow('Unknown fixture "nothing"');
  });

  it("rolls back the chain when a setup fails", async () => {
    const registry = new FixtureRegistry();
    const events: string[] = [];
    registry.register({
      name: "c",
      scope: "test",
      setup: () => events.push("setup:c"),
      teardown: () => {
        events.push("teardown:c");
      }
    });
    registry.register({
      name: "b",
      scope: "test",
      dependencies: ["c"],
      setup: () => events.push("setup:b"),
      teardown: () => {
        events.push("teardown:b");
      }
    });
    registry.register({
      name: "a",
      scope: "test",
      dependencies: ["b"],
      setup: () => {
        throw new Error("port in use");
      }
    });
    const { test } = createScopes();

    const failure = registry.resolve("a", test);
    await expect(failure).rejects.toBeInstanceOf(FixtureSetupFailedError);
    await expect(failure).rejects.toMatchObject({ fixture: "a", message: 'Fixture "a" setup failed: port in use' });
    expect(events).toEqual(["setup:c", "setup:b", "teardown:b", "teardown:c"]);
    expect(test.setupOrder()).toEqual([]);

    await registry.resolve("b", test);
    expect(events.slice(4)).toEqual(["setup:c", "setup:b"]);
  });

  it("raises teardown errors after every teardown ran", async () => {
    const registry = new FixtureRegistry();
    const events: string[] = [];
    for (const name of ["first", "second", "third"]) {
      registry.register({
        name,
        scope: "test",
        setup: () => name,
        teardown: () => {
          events.push(name);
          if (name !== "second") throw new Error(`${name} teardown failed`);
        }
      });
    }
    const { test } = createScopes();
    await registry.resolve("first", test);
    await registry.resolve("second", test);
    await registry.resolve("third", test);

    let caught: unknown = null;
    try {
      await test.close();
    } catch (error) {
      caught = error;
    }
    expect(events).toEqual(["third", "second", "first"]);
    expect(caught).toBeInstanceOf(AggregateError);
    expect(caught).toMatchObject({ message: "2 fixture teardowns failed in test scope" });
  });

  it("tears down a fixture whose scope closed while it was being set up", async () => {
    const registry = new FixtureRegistry();
    const teardowns: string[] = [];
    let finishSetup: (value: string) => void = () => {};
    const slow = registry.register({
      name: "slow",
      scope: "test",
      setup: () => new Promise<string>((resolve) => {
        finishSetup = resolve;
      }),
      teardown: (value) => {
        teardowns.push(value);
      }
    });
    const { test } = createScopes();

    const pending = registry.resolve(slow, test);
    const assertion = expect(pending).rejects.toThrow(
      'Fixture "slow" setup failed: Scope test closed while "slow" was being set up'
    );
    await test.close();
    expect(teardowns).toEqual([]);
    finishSetup("slow");
    await assertion;

    expect(teardowns).toEqual(["slow"]);
    expect(test.setupOrder()).toEqual([]);
    await expect(registry.resolve(slow, test)).rejects.toThrow("Scope test is closed");
  });

  it("refuses duplicate names", () => {
    const registry = new FixtureRegistry();
    registry.register({ name: "dup", scope: "test", setup: () => 1 });
    expect(() => registry.register({ name: "dup", scope: "test", setup: () => 2 }))
      .toThrow('Fixture "dup" is already registered');
  });
});

describe("FixtureScope", () => {
  it("finds the owning scope for each lifetime", () => {
    const { processScope, worker, test } = createScopes();
    expect(test.forScope("test")).toBe(test);
    expect(test.forScope("worker")).toBe(worker);
    expect(test.forScope("process")).toBe(processScope);
    expect(() => new FixtureScope("worker").forScope("process")).toThrow("No process scope is active above this worker scope");
  });

  it("closes open child scopes before its own fixtures", async () => {
    const { worker, test } = createScopes();
    const events: string[] = [];
    worker.add({ fixture: "browser", teardown: () => { events.push("browser"); } });
    test.add({ fixture: "page", teardown: () => { events.push("page"); } });

    await worker.close();

    expect(events).toEqual(["page", "browser"]);
    expect(test.closed).toBe(true);
  });

  it("does not nest a scope inside a shorter-lived one", () => {
    expect(() => new FixtureScope("test").child("worker")).toThrow("A worker scope cannot be nested in a test scope");
  });
});
