export { createAutowaitCore } from "./core/bootstrap";
export type { AutowaitCore, CoreOptions } from "./core/types";
export {
  AutowaitError,
  TimeoutExceededError,
  SessionDisconnectedError,
  AlreadyResolvedError,
  FixtureSetupFailedError,
  DependencyCycleError,
  SoftAssertionError,
  ConfigurationError,
  formatErrorPayload,
  toAutowaitError
} from "./core/errors";
export type { AutowaitErrorCode, ErrorPayload } from "./core/errors";
export { createLogger, silentSink } from "./core/logging";
export type { LogEnvelope, LogLevel, LogSink, Logger } from "./core/logging";
export { systemClock } from "./core/clock";
export type { Clock } from "./core/clock";
export { loadGlobalConfig, resolveConfig, getGlobalConfigPath, CONFIG_FILE_NAME } from "./config";
export type { AutowaitConfig, PollingConfig, TimeoutsConfig } from "./config";

export { SessionHierarchy } from "./browser/session-hierarchy";
export type { CloseEvent, NodeSummary, SessionOptions } from "./browser/session-hierarchy";
export { Browser, IsolatedSession, SubDocument } from "./browser/nodes";
export { Document } from "./browser/document";
export { Locator } from "./browser/locator";
export type { ActionOptions, ActionReport } from "./browser/locator";
export { SessionStorage } from "./browser/storage";
export { retry, createIntervalSequence } from "./browser/retry-engine";
export type { RetryOptions, RetryResult } from "./browser/retry-engine";
export { createActionabilityPredicate } from "./browser/actionability";
export { DialogHub, PendingDialog, PendingPopup } from "./browser/dialog-hub";
export type { DialogResolution, HubState } from "./browser/dialog-hub";
export { createExpect, LocatorAssertions } from "./browser/assertions";
export type { Expect, ExpectOptions } from "./browser/assertions";
export { SoftAssertionCollector } from "./browser/soft-assertions";
export { createPlaywrightLauncher, wrapBrowser } from "./browser/playwright-driver";
export type * from "./browser/driver-types";

export { FixtureRegistry, FixtureHandle } from "./fixtures/fixture-registry";
export type { FixtureDefinition, FixtureDeps } from "./fixtures/fixture-registry";
export { FixtureScope } from "./fixtures/fixture-scope";
export type { ScopeKind } from "./fixtures/fixture-scope";
export { registerBrowserFixtures } from "./fixtures/browser-fixtures";
export type { BrowserFixtures, BrowserLauncher } from "./fixtures/browser-fixtures";
export { runWithRetry } from "./runner/test-retry";
export type { TestContext, TestFn, TestOutcome, AttemptRecord } from "./runner/test-retry";
export { WorkerLane } from "./runner/worker-lane";
