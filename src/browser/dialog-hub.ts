import { abortReason, schedule, systemClock, type Clock } from "../core/clock";
import { AlreadyResolvedError, TimeoutExceededError, describeError } from "../core/errors";
import type { Logger } from "../core/logging";
import type { DialogKind, DocumentTransport } from "./driver-types";
import type { Document } from "./document";

export type DialogDecisionKind = "accept" | "dismiss";

export type DialogResolution = {
  decision: DialogDecisionKind;
  accepted: boolean;
  /** Text sent back for textual dialogs that were accepted. */
  text?: string;
};

export type HubState = "idle" | "awaiting_resolution";

function resolveDialogText(
  kind: DialogKind,
  decision: DialogDecisionKind,
  text: string | undefined,
  defaultText: string | undefined
): DialogResolution {
  if (decision === "dismiss") {
    return { decision, accepted: false };
  }
  switch (kind) {
    case "textual":
      return { decision, accepted: true, text: text ?? defaultText ?? "" };
    case "informational":
    case "confirmable":
      return { decision, accepted: true };
    default: {
      const unreachable: never = kind;
      throw new Error(`Unknown dialog kind: ${String(unreachable)}`);
    }
  }
}

export class PendingDialog {
  readonly id: string;
  readonly kind: DialogKind;
  readonly message: string;
  readonly defaultText?: string;
  private resolution: DialogResolution | null = null;
  private readonly onResolve: (dialog: PendingDialog, resolution: DialogResolution) => void;

  constructor(
    init: { dialogId: string; kind: DialogKind; message: string; defaultText?: string },
    onResolve: (dialog: PendingDialog, resolution: DialogResolution) => void
  ) {
    this.id = init.dialogId;
    this.kind = init.kind;
    this.message = init.message;
    this.defaultText = init.kind === "textual" ? init.defaultText ?? "" : undefined;
    this.onResolve = onResolve;
  }

  get resolved(): boolean {
    return this.resolution !== null;
  }

  get outcome(): DialogResolution | null {
    return this.resolution;
  }

  /**
   * Applies the decision exactly once. Accepting a textual dialog without `text`
   * sends its default text; dismissing ignores `text`.
   */
  resolve(decision: DialogDecisionKind, text?: string): DialogResolution {
    if (this.resolution) {
      throw new AlreadyResolvedError(`Dialog "${this.message}"`);
    }
    const resolution = resolveDialogText(this.kind, decision, text, this.defaultText);
    this.resolution = resolution;
    this.onResolve(this, resolution);
    return resolution;
  }

  accept(text?: string): DialogResolution {
    return this.resolve("accept", text);
  }

  dismiss(): DialogResolution {
    return this.resolve("dismiss");
  }
}

export class PendingPopup {
  readonly document: Document;
  private mode: "manual" | "automatic" | null = null;
  private readonly onAcknowledge: (popup: PendingPopup) => void;

  constructor(document: Document, onAcknowledge: (popup: PendingPopup) => void) {
    this.document = document;
    this.onAcknowledge = onAcknowledge;
  }

  get acknowledged(): boolean {
    return this.mode !== null;
  }

  get acknowledgedBy(): "manual" | "automatic" | null {
    return this.mode;
  }

  /** Makes the popup document usable and lets the opening action return. */
  acknowledge(): Document {
    this.settle("manual");
    return this.document;
  }

  acknowledgeAutomatically(): void {
    this.settle("automatic");
  }

  private settle(mode: "manual" | "automatic"): void {
    if (this.mode) {
      throw new AlreadyResolvedError(`Popup ${this.document.id}`);
    }
    this.mode = mode;
    this.onAcknowledge(this);
  }
}

type HubEventMap = {
  dialog: PendingDialog;
  popup: PendingPopup;
};

export type HubEventType = keyof HubEventMap;
export type HubListener<K extends HubEventType> = (event: HubEventMap[K]) => void | Promise<void>;

type Subscription<K extends HubEventType> = {
  listener: HubListener<K>;
  once: boolean;
};

type SubscriptionMap = { [K in HubEventType]: Array<Subscription<K>> };

type HubEntry =
  | { type: "dialog"; dialog: PendingDialog }
  | { type: "popup"; popup: PendingPopup; cancelAutoAck?: () => void };

type IdleWaiter = {
  resolve: () => void;
  reject: (error: Error) => void;
};

export type IdleOptions = {
  /** Absolute clock time; omitted means wait without a deadline. */
  deadline?: number;
  signal?: AbortSignal;
  operation?: string;
  timeoutMs?: number;
};

export type DialogHubOptions = {
  documentId: string;
  transport: DocumentTransport;
  logger: Logger;
  clock?: Clock;
  popupAckMs: number;
};

/**
 * Per-document interception of dialogs and popups. While an event is outstanding
 * the hub is awaiting resolution and `idle()` callers stay suspended; further
 * events queue behind it and are delivered in arrival order.
 */
export class DialogHub {
  private readonly documentId: string;
  private readonly transport: DocumentTransport;
  private readonly logger: Logger;
  private readonly clock: Clock;
  private readonly popupAckMs: number;
  private readonly subscriptions: SubscriptionMap = { dialog: [], popup: [] };
  private readonly queue: HubEntry[] = [];
  private current: HubEntry | null = null;
  private waiters = new Set<IdleWaiter>();
  private disposedWith: Error | null = null;

  constructor(options: DialogHubOptions) {
    this.documentId = options.documentId;
    this.transport = options.transport;
    this.logger = options.logger;
    this.clock = options.clock ?? systemClock;
    this.popupAckMs = options.popupAckMs;
  }

  state(): HubState {
    return this.current || this.queue.length > 0 ? "awaiting_resolution" : "idle";
  }

  /** The event currently offered to subscribers, if any. */
  pending(): PendingDialog | PendingPopup | null {
    if (!this.current) return null;
    return this.current.type === "dialog" ? this.current.dialog : this.current.popup;
  }

  queuedCount(): number {
    return this.queue.length;
  }

  on<K extends HubEventType>(type: K, listener: HubListener<K>): () => void {
    return this.subscribe(type, listener, false);
  }

  once<K extends HubEventType>(type: K, listener: HubListener<K>): () => void {
    return this.subscribe(type, listener, true);
  }

  listenerCount(type: HubEventType): number {
    return this.subscriptions[type].length;
  }

  interceptDialog(event: { dialogId: string; kind: DialogKind; message: string; defaultText?: string }): PendingDialog {
    const dialog = new PendingDialog(event, (pending, resolution) => this.applyDialog(pending, resolution));
    this.logger.info("dialog.intercepted", {
      nodeId: this.documentId,
      data: { dialogId: event.dialogId, kind: event.kind, message: event.message }
    });
    this.push({ type: "dialog", dialog });
    return dialog;
  }

  interceptPopup(document: Document): PendingPopup {
    const popup = new PendingPopup(document, (pending) => this.applyPopup(pending));
    this.logger.info("popup.intercepted", { nodeId: this.documentId, data: { popupId: document.id } });
    this.push({ type: "popup", popup });
    return popup;
  }

  /** Human-readable description of what keeps the hub busy, for timeout reasons. */
  blockingReason(): string | null {
    const entry = this.current ?? this.queue[0];
    if (!entry) return null;
    if (entry.type === "dialog") {
      return `dialog "${entry.dialog.kind}" awaiting resolution: ${entry.dialog.message}`;
    }
    return `popup ${entry.popup.document.id} awaiting acknowledgement`;
  }

  /** Suspends until every intercepted event has been resolved. */
  idle(options: IdleOptions = {}): Promise<void> {
    if (this.disposedWith) {
      return Promise.reject(this.disposedWith);
    }
    if (options.signal?.aborted) {
      return Promise.reject(abortReason(options.signal));
    }
    if (this.state() === "idle") {
      return Promise.resolve();
    }
    const signal = options.signal;
    return new Promise<void>((resolve, reject) => {
      let cancelTimer: (() => void) | undefined;
      const cleanup = () => {
        cancelTimer?.();
        signal?.removeEventListener("abort", onAbort);
        this.waiters.delete(waiter);
      };
      const waiter: IdleWaiter = {
        resolve: () => {
          cleanup();
          resolve();
        },
        reject: (error) => {
          cleanup();
          reject(error);
        }
      };
      const onAbort = () => {
        if (signal) waiter.reject(abortReason(signal));
      };
      if (typeof options.deadline === "number" && Number.isFinite(options.deadline)) {
        cancelTimer = schedule(this.clock, options.deadline - this.clock.now(), () => {
          waiter.reject(new TimeoutExceededError({
            operation: options.operation ?? "waiting for dialog resolution",
            timeoutMs: options.timeoutMs ?? 0,
            lastReason: this.blockingReason() ?? "dialog awaiting resolution"
          }));
        });
      }
      signal?.addEventListener("abort", onAbort, { once: true });
      this.waiters.add(waiter);
    });
  }

  /** Drops queued events and fails every waiter; called when the document goes away. */
  dispose(error: Error): void {
    if (this.disposedWith) return;
    this.disposedWith = error;
    for (const entry of [this.current, ...this.queue]) {
      if (entry?.type === "popup") {
        entry.cancelAutoAck?.();
      }
    }
    const dropped = this.queue.length + (this.current ? 1 : 0);
    this.current = null;
    this.queue.length = 0;
    this.subscriptions.dialog.length = 0;
    this.subscriptions.popup.length = 0;
    for (const waiter of Array.from(this.waiters)) {
      waiter.reject(error);
    }
    if (dropped > 0) {
      this.logger.warn("dialog.dropped", { nodeId: this.documentId, data: { dropped, reason: error.message } });
    }
  }

  private subscribe<K extends HubEventType>(type: K, listener: HubListener<K>, once: boolean): () => void {
    const list: Array<Subscription<K>> = this.subscriptions[type];
    const subscription: Subscription<K> = { listener, once };
    list.push(subscription);
    return () => {
      const index = list.indexOf(subscription);
      if (index >= 0) list.splice(index, 1);
    };
  }

  private push(entry: HubEntry): void {
    if (this.disposedWith) {
      this.logger.debug("dialog.ignored_after_dispose", { nodeId: this.documentId });
      return;
    }
    this.queue.push(entry);
    this.advance();
  }

  private advance(): void {
    while (!this.current && this.queue.length > 0) {
      const next = this.queue.shift();
      if (!next) break;
      if (next.type === "dialog" && next.dialog.resolved) {
        continue;
      }
      this.current = next;
      this.deliver(next);
    }
    if (this.state() === "idle") {
      for (const waiter of Array.from(this.waiters)) {
        waiter.resolve();
      }
    }
  }

  private deliver(entry: HubEntry): void {
    if (entry.type === "dialog") {
      this.emit("dialog", entry.dialog);
      return;
    }
    const popup = entry.popup;
    if (!popup.acknowledged) {
      entry.cancelAutoAck = schedule(this.clock, this.popupAckMs, () => {
        if (!popup.acknowledged) {
          this.logger.info("popup.auto_acknowledged", { nodeId: this.documentId, data: { popupId: popup.document.id } });
          popup.acknowledgeAutomatically();
        }
      });
    }
    this.emit("popup", popup);
  }

  private emit<K extends HubEventType>(type: K, event: HubEventMap[K]): void {
    const list: Array<Subscription<K>> = this.subscriptions[type];
    for (const subscription of Array.from(list)) {
      if (subscription.once) {
        const index = list.indexOf(subscription);
        if (index >= 0) list.splice(index, 1);
      }
      try {
        const outcome = subscription.listener(event);
        if (outcome instanceof Promise) {
          outcome.catch((error: unknown) => this.reportListenerFailure(type, error));
        }
      } catch (error) {
        this.reportListenerFailure(type, error);
      }
    }
  }

  private reportListenerFailure(type: HubEventType, error: unknown): void {
    this.logger.error("dialog.listener_failed", { nodeId: this.documentId, data: { type, error: describeError(error) } });
  }

  private applyDialog(dialog: PendingDialog, resolution: DialogResolution): void {
    this.logger.info("dialog.resolved", {
      nodeId: this.documentId,
      data: { dialogId: dialog.id, decision: resolution.decision }
    });
    const matches = (entry: HubEntry) => entry.type === "dialog" && entry.dialog === dialog;
    this.transport
      .resolveDialog(dialog.id, { accept: resolution.accepted, text: resolution.text })
      .then(
        () => this.finish(matches, null),
        (error: unknown) => this.finish(matches, error instanceof Error ? error : new Error(describeError(error)))
      )
      .catch((error: unknown) => this.reportListenerFailure("dialog", error));
  }

  private applyPopup(popup: PendingPopup): void {
    popup.document.markAcknowledged();
    this.finish((entry) => entry.type === "popup" && entry.popup === popup, null);
  }

  private finish(matches: (entry: HubEntry) => boolean, failure: Error | null): void {
    if (this.disposedWith) return;
    if (this.current && matches(this.current)) {
      if (this.current.type === "popup") {
        this.current.cancelAutoAck?.();
      }
      this.current = null;
    } else {
      const index = this.queue.findIndex(matches);
      if (index >= 0) this.queue.splice(index, 1);
    }
    if (failure) {
      this.logger.error("dialog.transport_failed", { nodeId: this.documentId, data: { error: failure.message } });
      for (const waiter of Array.from(this.waiters)) {
        waiter.reject(failure);
      }
    }
    this.advance();
  }
}
