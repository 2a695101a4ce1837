import { SoftAssertionError } from "../core/errors";
import type { Logger } from "../core/logging";

/**
 * Failures recorded by `expect.soft` during one test attempt. The test keeps
 * running; `flush()` reports them together at the end.
 */
export class SoftAssertionCollector {
  private failures: Error[] = [];

  constructor(private readonly logger?: Logger) {}

  record(error: Error): void {
    this.failures.push(error);
    this.logger?.warn("expect.soft_failed", { data: { error: error.message, total: this.failures.length } });
  }

  count(): number {
    return this.failures.length;
  }

  list(): Error[] {
    return [...this.failures];
  }

  /** Throws one error carrying every recorded failure, then starts over empty. */
  flush(): void {
    if (this.failures.length === 0) return;
    const failures = this.failures;
    this.failures = [];
    throw new SoftAssertionError(failures);
  }
}
