export type AutowaitErrorCode =
  | "timeout_exceeded"
  | "session_disconnected"
  | "already_resolved"
  | "fixture_setup_failed"
  | "dependency_cycle"
  | "soft_assertion_failed"
  | "configuration"
  | "internal";

export class AutowaitError extends Error {
  readonly code: AutowaitErrorCode;

  constructor(code: AutowaitErrorCode, message: string, options: { cause?: unknown } = {}) {
    super(message, { cause: options.cause });
    this.name = "AutowaitError";
    this.code = code;
  }
}

/**
 * Deadline reached. `lastReason` is the last concrete failure observed before the
 * deadline ("element not visible", "expected text ..."), never a generic message.
 */
export class TimeoutExceededError extends AutowaitError {
  readonly timeoutMs: number;
  readonly lastReason: string;
  readonly attempts: number;

  constructor(options: { operation: string; timeoutMs: number; lastReason: string; attempts?: number }) {
    super(
      "timeout_exceeded",
      `${options.operation}: timeout ${options.timeoutMs}ms exceeded (last reason: ${options.lastReason})`
    );
    this.name = "TimeoutExceededError";
    this.timeoutMs = options.timeoutMs;
    this.lastReason = options.lastReason;
    this.attempts = options.attempts ?? 0;
  }
}

export class SessionDisconnectedError extends AutowaitError {
  readonly nodeId: string;

  constructor(nodeId: string, detail = "closed") {
    super("session_disconnected", `Session disconnected (${nodeId}): ${detail}`);
    this.name = "SessionDisconnectedError";
    this.nodeId = nodeId;
  }
}

export class AlreadyResolvedError extends AutowaitError {
  constructor(subject: string) {
    super("already_resolved", `${subject} has already been resolved`);
    this.name = "AlreadyResolvedError";
  }
}

export class FixtureSetupFailedError extends AutowaitError {
  readonly fixture: string;

  constructor(fixture: string, cause: unknown) {
    super("fixture_setup_failed", `Fixture "${fixture}" setup failed: ${describeError(cause)}`, { cause });
    this.name = "FixtureSetupFailedError";
    this.fixture = fixture;
  }
}

export class DependencyCycleError extends AutowaitError {
  readonly cycle: string[];

  constructor(cycle: string[]) {
    super("dependency_cycle", `Fixture dependency cycle: ${cycle.join(" -> ")}`);
    this.name = "DependencyCycleError";
    this.cycle = cycle;
  }
}

export class SoftAssertionError extends AutowaitError {
  readonly failures: Error[];

  constructor(failures: Error[]) {
    const lines = failures.map((failure, index) => `  ${index + 1}) ${failure.message}`);
    super("soft_assertion_failed", [`${failures.length} soft assertion(s) failed:`, ...lines].join("\n"));
    this.name = "SoftAssertionError";
    this.failures = failures;
  }
}

export class ConfigurationError extends AutowaitError {
  constructor(message: string) {
    super("configuration", message);
    this.name = "ConfigurationError";
  }
}

export function describeError(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }
  return String(error);
}

export function isAutowaitError(value: unknown): value is AutowaitError {
  return value instanceof AutowaitError;
}

export function toAutowaitError(error: unknown): AutowaitError {
  if (isAutowaitError(error)) {
    return error;
  }
  return new AutowaitError("internal", describeError(error) || "Unknown failure", { cause: error });
}

export type ErrorPayload = {
  success: false;
  code: AutowaitErrorCode;
  error: string;
};

export function formatErrorPayload(error: unknown): ErrorPayload {
  const normalized = toAutowaitError(error);
  return {
    success: false,
    code: normalized.code,
    error: normalized.message
  };
}
