import type { AutowaitConfig } from "../config";
import { abortReason, raceAbort, raceDeadline, type Clock } from "../core/clock";
import type { Logger } from "../core/logging";
import { TimeoutExceededError } from "../core/errors";
import { DialogHub, type DialogResolution, type PendingDialog } from "./dialog-hub";
import type { PageDriver } from "./driver-types";
import type { Locator } from "./locator";
import type { IsolatedSession, SubDocument } from "./nodes";
import type { SessionHierarchy } from "./session-hierarchy";

export type WaitOptions = {
  timeoutMs?: number;
};

export type DocumentEnvironment = {
  config: AutowaitConfig;
  clock: Clock;
  logger: Logger;
};

export type DocumentInit = {
  hierarchy: SessionHierarchy;
  id: string;
  signal: AbortSignal;
  sessionId: string;
  driver: PageDriver;
  /** False for popups, which stay unusable until their opener's hub acknowledges them. */
  acknowledged: boolean;
};

/**
 * One page. Its identity, hub and subscriptions survive navigation; actions
 * against it run one at a time.
 */
export class Document {
  readonly kind = "document" as const;
  readonly id: string;
  readonly signal: AbortSignal;
  readonly sessionId: string;
  readonly driver: PageDriver;
  readonly hub: DialogHub;
  private readonly hierarchy: SessionHierarchy;
  private queue: Promise<void> = Promise.resolve();
  private readonly ready: Promise<void>;
  private acknowledged: boolean;
  private markReady: () => void = () => {};

  constructor(init: DocumentInit) {
    this.hierarchy = init.hierarchy;
    this.id = init.id;
    this.signal = init.signal;
    this.sessionId = init.sessionId;
    this.driver = init.driver;
    this.acknowledged = init.acknowledged;
    this.ready = init.acknowledged
      ? Promise.resolve()
      : new Promise<void>((resolve) => {
        this.markReady = resolve;
      });
    this.hub = new DialogHub({
      documentId: init.id,
      transport: init.driver,
      logger: init.hierarchy.logger.child("dialog"),
      clock: init.hierarchy.clock,
      popupAckMs: init.hierarchy.config.timeouts.popupAckMs
    });
    this.signal.addEventListener("abort", () => this.hub.dispose(abortReason(this.signal)), { once: true });
  }

  get session(): IsolatedSession {
    return this.hierarchy.sessionOf(this.sessionId);
  }

  /** Configuration, clock and logger shared by everything under this hierarchy. */
  environment(): DocumentEnvironment {
    const { config, clock, logger } = this.hierarchy;
    return { config, clock, logger };
  }

  get isAcknowledged(): boolean {
    return this.acknowledged;
  }

  url(): string {
    return this.hierarchy.urlOf(this.id);
  }

  mainFrame(): SubDocument {
    return this.hierarchy.mainFrameOf(this.id);
  }

  /** Every frame of the document, root first, depth-first. */
  frames(): SubDocument[] {
    const root = this.mainFrame();
    return [root, ...root.descendants()];
  }

  frameByUrl(pattern: string | RegExp): SubDocument | null {
    return this.frames().find((frame) => (
      typeof pattern === "string" ? frame.url() === pattern : pattern.test(frame.url())
    )) ?? null;
  }

  locator(selector: string): Locator {
    return this.mainFrame().locator(selector);
  }

  async goto(url: string, options: WaitOptions = {}): Promise<void> {
    const timeoutMs = options.timeoutMs ?? this.hierarchy.config.timeouts.actionMs;
    await this.runExclusive(async () => {
      await raceAbort(this.driver.navigate(url, timeoutMs), this.signal);
    });
  }

  markAcknowledged(): void {
    if (this.acknowledged) return;
    this.acknowledged = true;
    this.markReady();
  }

  /**
   * Runs `task` after every earlier task on this document finished. Popups wait
   * for their acknowledgement first.
   */
  runExclusive<T>(task: () => Promise<T>): Promise<T> {
    const run = async (): Promise<T> => {
      this.hierarchy.assertOpen(this.id);
      await raceAbort(this.ready, this.signal);
      return task();
    };
    const result = this.queue.then(run, run);
    this.queue = result.then(() => undefined, () => undefined);
    return result;
  }

  /**
   * Runs `trigger` with a one-shot dialog handler installed and returns how the
   * dialog was resolved. The handler must call `resolve`; if it does not, the
   * trigger's own timeout applies.
   */
  async waitForDialog(
    trigger: () => Promise<unknown>,
    handler: (dialog: PendingDialog) => void,
    options: WaitOptions = {}
  ): Promise<DialogResolution> {
    const timeoutMs = options.timeoutMs ?? this.hierarchy.config.timeouts.actionMs;
    let unsubscribe: () => void = () => {};
    const seen = new Promise<PendingDialog>((resolve) => {
      unsubscribe = this.hub.once("dialog", (dialog) => {
        handler(dialog);
        resolve(dialog);
      });
    });
    try {
      await trigger();
      const dialog = await this.withDeadline(seen, timeoutMs, "waitForDialog", "no dialog was opened");
      const outcome = dialog.outcome;
      if (!outcome) {
        throw new TimeoutExceededError({ operation: "waitForDialog", timeoutMs, lastReason: "dialog handler did not resolve the dialog" });
      }
      return outcome;
    } finally {
      unsubscribe();
    }
  }

  /** Runs `trigger` and returns the popup it opened, acknowledged and ready to use. */
  async waitForPopup(trigger: () => Promise<unknown>, options: WaitOptions = {}): Promise<Document> {
    const timeoutMs = options.timeoutMs ?? this.hierarchy.config.timeouts.actionMs;
    let unsubscribe: () => void = () => {};
    const opened = new Promise<Document>((resolve) => {
      unsubscribe = this.hub.once("popup", (popup) => {
        if (!popup.acknowledged) {
          popup.acknowledge();
        }
        resolve(popup.document);
      });
    });
    try {
      await trigger();
      return await this.withDeadline(opened, timeoutMs, "waitForPopup", "no popup was opened");
    } finally {
      unsubscribe();
    }
  }

  isClosed(): boolean {
    return this.hierarchy.isClosed(this.id);
  }

  close(): Promise<void> {
    return this.hierarchy.close(this);
  }

  private withDeadline<T>(task: Promise<T>, timeoutMs: number, operation: string, reason: string): Promise<T> {
    const clock = this.hierarchy.clock;
    return raceDeadline(task, {
      clock,
      deadline: timeoutMs > 0 ? clock.now() + timeoutMs : undefined,
      signal: this.signal,
      onTimeout: () => new TimeoutExceededError({ operation, timeoutMs, lastReason: reason })
    });
  }
}
