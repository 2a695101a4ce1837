import { SessionHierarchy } from "../browser/session-hierarchy";
import { createPlaywrightLauncher } from "../browser/playwright-driver";
import { loadGlobalConfig } from "../config";
import { registerBrowserFixtures } from "../fixtures/browser-fixtures";
import { FixtureRegistry } from "../fixtures/fixture-registry";
import { FixtureScope } from "../fixtures/fixture-scope";
import { WorkerLane } from "../runner/worker-lane";
import { systemClock } from "./clock";
import { describeError } from "./errors";
import { createLogger } from "./logging";
import type { AutowaitCore, CoreOptions } from "./types";

export function createAutowaitCore(options: CoreOptions = {}): AutowaitCore {
  const config = options.config ?? loadGlobalConfig(options.configPath);
  const clock = options.clock ?? systemClock;
  const logger = createLogger("autowait", { sink: options.logSink, minLevel: config.logLevel });
  const hierarchy = new SessionHierarchy({ config, clock, logger: logger.child("hierarchy") });
  const registry = new FixtureRegistry({ logger: logger.child("fixtures") });
  const processScope = new FixtureScope("process", null, logger.child("fixtures"));
  const fixtures = registerBrowserFixtures(registry, {
    hierarchy,
    launch: options.launch ?? createPlaywrightLauncher(logger.child("driver"))
  });
  const lanes = new Set<WorkerLane>();
  let disposing: Promise<void> | null = null;

  const createLane: AutowaitCore["createLane"] = (laneOptions = {}) => {
    if (disposing) {
      throw new Error("Core is disposed");
    }
    const lane = new WorkerLane(registry, processScope, {
      retries: config.retries,
      ...laneOptions,
      index: laneOptions.index ?? lanes.size,
      logger: logger.child("runner"),
      clock
    });
    lanes.add(lane);
    return lane;
  };

  const disposeOnce = async (): Promise<void> => {
    const failures: unknown[] = [];
    for (const lane of lanes) {
      try {
        await lane.close();
      } catch (error) {
        failures.push(error);
      }
    }
    lanes.clear();
    try {
      await processScope.close();
    } catch (error) {
      failures.push(error);
    }
    for (const node of hierarchy.tree()) {
      if (node.kind !== "browser") continue;
      try {
        await hierarchy.close(node.id);
      } catch (error) {
        failures.push(error);
      }
    }
    if (failures.length > 0) {
      logger.error("core.dispose_failed", { data: { errors: failures.map(describeError) } });
      throw failures[0];
    }
    logger.info("core.disposed");
  };

  return {
    config,
    logger,
    clock,
    hierarchy,
    registry,
    processScope,
    fixtures,
    createLane,
    dispose: () => {
      if (!disposing) {
        disposing = disposeOnce();
      }
      return disposing;
    }
  };
}
