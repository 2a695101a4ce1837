import { describe, expect, it, vi } from "vitest";
import { createAutowaitCore } from "../src/core/bootstrap";
import { resolveConfig } from "../src/config";
import type { LogEnvelope } from "../src/core/logging";
import { FakeBrowser } from "./fake-driver";

const createCore = (retries = 0) => {
  const browser = new FakeBrowser();
  const launch = vi.fn(async () => browser);
  const entries: LogEnvelope[] = [];
  const core = createAutowaitCore({
    config: resolveConfig({ retries }),
    launch,
    logSink: (entry) => entries.push(entry)
  });
  return { core, browser, launch, entries };
};

describe("createAutowaitCore", () => {
  it("gives each test its own session and document on a shared worker browser", async () => {
    const { core, browser, launch } = createCore();
    const lane = core.createLane();
    const documentIds: string[] = [];

    const outcomes = await Promise.all([
      lane.test("first", async ({ use }) => {
        documentIds.push((await use(core.fixtures.document)).id);
      }),
      lane.test("second", async ({ use }) => {
        documentIds.push((await use(core.fixtures.document)).id);
      })
    ]);

    expect(outcomes.map((outcome) => outcome.status)).toEqual(["passed", "passed"]);
    expect(launch).toHaveBeenCalledTimes(1);
    expect(launch).toHaveBeenCalledWith(core.config);
    expect(new Set(documentIds).size).toBe(2);
    expect(browser.contexts.map((context) => context.closeCount)).toEqual([1, 1]);
    expect(browser.pages().map((page) => page.closeCount)).toEqual([1, 1]);
    expect(browser.closeCount).toBe(0);

    await core.dispose();
    expect(browser.closeCount).toBe(1);
  });

  it("closes lanes, scopes and browsers once on dispose", async () => {
    const { core, browser, entries } = createCore();
    const lane = core.createLane();
    await lane.test("opens a document", async ({ use }) => {
      await use(core.fixtures.document);
    });

    await Promise.all([core.dispose(), core.dispose()]);

    expect(lane.scope.closed).toBe(true);
    expect(core.processScope.closed).toBe(true);
    const [context] = browser.contexts;
    const [page] = browser.pages();
    expect(browser.log).toEqual([`page:${page?.id}`, `context:${context?.id}`, "browser"]);
    expect(entries.filter((entry) => entry.event === "core.disposed")).toHaveLength(1);
    expect(() => core.createLane()).toThrow("Core is disposed");
  });

  it("applies configured retries to new lanes", async () => {
    const { core } = createCore(1);
    const lane = core.createLane();

    const outcome = await lane.test("flaky", ({ attempt }) => {
      if (attempt === 1) throw new Error("first try");
    });

    expect(outcome.status).toBe("flaky");
    expect(lane.index).toBe(0);
    expect(core.createLane().index).toBe(1);
    await core.dispose();
  });

  it("logs with the configured level", () => {
    const { core, entries } = createCore();
    core.logger.debug("core.debug_sample");
    core.logger.info("core.info_sample");

    expect(entries.map((entry) => entry.event)).toEqual(["core.info_sample"]);
  });
});
