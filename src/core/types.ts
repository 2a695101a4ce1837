import type { BrowserFixtures, BrowserLauncher } from "../fixtures/browser-fixtures";
import type { FixtureRegistry } from "../fixtures/fixture-registry";
import type { FixtureScope } from "../fixtures/fixture-scope";
import type { SessionHierarchy } from "../browser/session-hierarchy";
import type { WorkerLane, WorkerLaneOptions } from "../runner/worker-lane";
import type { AutowaitConfig } from "../config";
import type { Clock } from "./clock";
import type { Logger, LogSink } from "./logging";

export type CoreOptions = {
  /** Validated configuration; when omitted the global `autowait.jsonc` is loaded. */
  config?: AutowaitConfig;
  configPath?: string;
  launch?: BrowserLauncher;
  logSink?: LogSink;
  clock?: Clock;
};

export type AutowaitCore = {
  config: AutowaitConfig;
  logger: Logger;
  clock: Clock;
  hierarchy: SessionHierarchy;
  registry: FixtureRegistry;
  processScope: FixtureScope;
  fixtures: BrowserFixtures;
  createLane: (options?: Omit<WorkerLaneOptions, "logger" | "clock">) => WorkerLane;
  /** Closes every lane, the process scope, and whatever browsers are still registered. */
  dispose: () => Promise<void>;
};
