import { describe, expect, it, vi } from "vitest";
import { FixtureRegistry } from "../src/fixtures/fixture-registry";
import { FixtureScope } from "../src/fixtures/fixture-scope";
import { SoftAssertionError } from "../src/core/errors";
import { runWithRetry } from "../src/runner/test-retry";
import { WorkerLane } from "../src/runner/worker-lane";

const createLane = (retries = 0) => {
  const registry = new FixtureRegistry();
  const processScope = new FixtureScope("process");
  const lane = new WorkerLane(registry, processScope, { retries });
  return { registry, processScope, lane };
};

describe("runWithRetry", () => {
  it("passes on the first attempt", async () => {
    const { lane } = createLane();
    const testFn = vi.fn();

    const outcome = await runWithRetry(testFn, 3, { lane, title: "loads home" });

    expect(outcome).toMatchObject({ title: "loads home", status: "passed", error: null });
    expect(outcome.attempts).toHaveLength(1);
    expect(testFn).toHaveBeenCalledTimes(1);
  });

  it("reports a test that passes after a failure as flaky", async () => {
    const { lane } = createLane();
    const testFn = vi.fn(({ attempt }: { attempt: number }) => {
      if (attempt === 1) throw new Error("network blip");
    });

    const outcome = await runWithRetry(testFn, 3, { lane });

    expect(outcome.status).toBe("flaky");
    expect(outcome.attempts.map((record) => record.status)).toEqual(["failed", "passed"]);
    expect(outcome.error?.message).toBe("network blip");
  });

  it("fails after the last attempt and keeps every record", async () => {
    const { lane } = createLane();
    let calls = 0;

    const outcome = await runWithRetry(() => {
      calls += 1;
      throw new Error(`failure ${calls}`);
    }, 2, { lane });

    expect(outcome.status).toBe("failed");
    expect(outcome.attempts.map((record) => record.error?.message)).toEqual(["failure 1", "failure 2"]);
    expect(outcome.error?.message).toBe("failure 2");
  });

  it("fails an attempt that recorded soft assertion failures", async () => {
    const { lane } = createLane();

    const outcome = await runWithRetry(({ expect: softExpect }) => {
      softExpect.collector.record(new Error("expected title"));
    }, 1, { lane });

    expect(outcome.status).toBe("failed");
    expect(outcome.attempts[0]?.softFailures).toBe(1);
    expect(outcome.error).toBeInstanceOf(SoftAssertionError);
    expect(outcome.error?.message).toBe("1 soft assertion(s) failed:\n  1) expected title");
  });

  it("gives each attempt fresh test fixtures and reuses worker fixtures", async () => {
    const { registry, lane } = createLane();
    const setups: string[] = [];
    const teardowns: string[] = [];
    const server = registry.register({
      name: "server",
      scope: "worker",
      setup: () => {
        setups.push("server");
        return "server";
      },
      teardown: () => {
        teardowns.push("server");
      }
    });
    const page = registry.register({
      name: "page",
      scope: "test",
      dependencies: ["server"],
      setup: (deps) => {
        setups.push("page");
        return `${deps.use(server)}/page`;
      },
      teardown: () => {
        teardowns.push("page");
      }
    });
    const seenScopes = new Set<string>();

    const outcome = await runWithRetry(async ({ attempt, use, scope }) => {
      seenScopes.add(scope.id);
      expect(await use(page)).toBe("server/page");
      if (attempt < 3) throw new Error("retry me");
    }, 3, { lane });

    expect(outcome.status).toBe("flaky");
    expect(seenScopes.size).toBe(3);
    expect(setups).toEqual(["server", "page", "page", "page"]);
    expect(teardowns).toEqual(["page", "page", "page"]);

    await lane.close();
    expect(teardowns).toEqual(["page", "page", "page", "server"]);
  });

  it("fails an attempt whose teardown fails", async () => {
    const { registry, lane } = createLane();
    const handle = registry.register({
      name: "tmp",
      scope: "test",
      setup: () => "dir",
      teardown: () => {
        throw new Error("cannot remove dir");
      }
    });

    const outcome = await runWithRetry(async ({ use }) => {
      await use(handle);
    }, 1, { lane });

    expect(outcome.status).toBe("failed");
    expect(outcome.error?.message).toBe("cannot remove dir");
  });

  it("rejects a non-positive attempt budget", async () => {
    const { lane } = createLane();
    await expect(runWithRetry(() => {}, 0, { lane })).rejects.toThrow("maxAttempts must be a positive integer, got 0");
  });
});

describe("WorkerLane", () => {
  it("runs its tests one after another with the configured retries", async () => {
    const { lane } = createLane(1);
    const order: string[] = [];

    const first = lane.test("first", async () => {
      order.push("first:start");
      await new Promise((resolve) => setTimeout(resolve, 10));
      order.push("first:end");
    });
    const second = lane.test("second", ({ attempt }) => {
      order.push(`second:${attempt}`);
      if (attempt === 1) throw new Error("flaky");
    });

    const outcomes = await Promise.all([first, second]);

    expect(order).toEqual(["first:start", "first:end", "second:1", "second:2"]);
    expect(outcomes.map((outcome) => outcome.status)).toEqual(["passed", "flaky"]);
  });

  it("refuses new tests once closed", async () => {
    const { lane, processScope } = createLane();
    await lane.close();

    await expect(lane.test("late", () => {})).rejects.toThrow("Worker lane 0 is closed");
    expect(lane.scope.closed).toBe(true);
    await processScope.close();
  });
});
