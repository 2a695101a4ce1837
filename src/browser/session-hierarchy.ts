import { randomUUID } from "crypto";
import type { AutowaitConfig } from "../config";
import { resolveConfig } from "../config";
import { systemClock, type Clock } from "../core/clock";
import { SessionDisconnectedError, describeError } from "../core/errors";
import { createLogger, silentSink, type Logger } from "../core/logging";
import type {
  BrowserDriver,
  ContextDriver,
  PageDriver,
  StorageState,
  TransportEvent
} from "./driver-types";
import { Document } from "./document";
import { Browser, IsolatedSession, SubDocument } from "./nodes";
import { EMPTY_STORAGE_STATE, SessionStorage, cloneStorageState } from "./storage";

export type NodeKind = "browser" | "session" | "document" | "frame";
export type NodeState = "open" | "closing" | "closed";

export type HierarchyNode = Browser | IsolatedSession | Document | SubDocument;

export type CloseEvent = {
  id: string;
  kind: NodeKind;
  parentId: string | null;
};

export type NodeSummary = {
  id: string;
  kind: NodeKind;
  parentId: string | null;
  depth: number;
  state: NodeState;
  disconnected: boolean;
  url?: string;
  label?: string;
};

export type SessionOptions = {
  label?: string;
  storageState?: StorageState;
};

export type HierarchyOptions = {
  config?: AutowaitConfig;
  clock?: Clock;
  logger?: Logger;
};

type BaseRecord = {
  id: string;
  parentId: string | null;
  childIds: string[];
  state: NodeState;
  controller: AbortController;
  disconnectReason?: string;
  closePromise?: Promise<void>;
};

type BrowserRecord = BaseRecord & {
  kind: "browser";
  driver: BrowserDriver;
  handle: Browser;
  label?: string;
  detach: () => void;
};

type SessionRecord = BaseRecord & {
  kind: "session";
  driver: ContextDriver;
  handle: IsolatedSession;
  label?: string;
};

type DocumentRecord = BaseRecord & {
  kind: "document";
  driver: PageDriver;
  handle: Document;
  url: string;
  rootFrameId: string;
  /** driver frame id -> node id */
  frameIndex: Map<string, string>;
  unsubscribe: () => void;
};

type FrameRecord = BaseRecord & {
  kind: "frame";
  handle: SubDocument;
  documentId: string;
  frameId: string;
  url: string;
};

type NodeRecord = BrowserRecord | SessionRecord | DocumentRecord | FrameRecord;

/**
 * Arena of every live node (browser, isolated session, document, frame). Ownership
 * is the parent -> child index kept here; handles only hold ids. Structural changes
 * that await the driver run one at a time on `mutations`.
 */
export class SessionHierarchy {
  readonly config: AutowaitConfig;
  readonly clock: Clock;
  readonly logger: Logger;
  private nodes = new Map<string, NodeRecord>();
  private mutations: Promise<void> = Promise.resolve();
  private closeListeners = new Set<(event: CloseEvent) => void>();

  constructor(options: HierarchyOptions = {}) {
    this.config = options.config ?? resolveConfig({});
    this.clock = options.clock ?? systemClock;
    this.logger = options.logger ?? createLogger("hierarchy", { sink: silentSink });
  }

  registerBrowser(driver: BrowserDriver, options: { label?: string } = {}): Browser {
    const id = randomUUID();
    const controller = new AbortController();
    const handle = new Browser(this, id, controller.signal, options.label);
    const detach = driver.onDisconnected((reason) => {
      this.markDisconnected(id, reason);
    });
    this.nodes.set(id, {
      kind: "browser",
      id,
      parentId: null,
      childIds: [],
      state: "open",
      controller,
      driver,
      handle,
      label: options.label,
      detach
    });
    this.logger.info("hierarchy.browser_registered", { nodeId: id, data: { label: options.label } });
    return handle;
  }

  createSession(browser: Browser, options: SessionOptions = {}): Promise<IsolatedSession> {
    return this.enqueue(async () => {
      const parent = this.requireRecord(browser.id, "browser");
      this.assertOpen(parent.id);
      const driver = await parent.driver.newContext({
        storageState: cloneStorageState(options.storageState ?? EMPTY_STORAGE_STATE)
      });
      if (!this.isOpen(parent.id)) {
        await driver.close();
        throw this.disconnectedError(parent.id);
      }
      const id = randomUUID();
      const controller = new AbortController();
      const storage = new SessionStorage(driver, controller.signal);
      const handle = new IsolatedSession(this, id, controller.signal, browser.id, storage, options.label);
      this.link({
        kind: "session",
        id,
        parentId: parent.id,
        childIds: [],
        state: "open",
        controller,
        driver,
        handle,
        label: options.label
      });
      this.logger.info("hierarchy.session_created", { nodeId: id, data: { browserId: parent.id } });
      return handle;
    });
  }

  createDocument(session: IsolatedSession): Promise<Document> {
    return this.enqueue(async () => {
      const parent = this.requireRecord(session.id, "session");
      this.assertOpen(parent.id);
      const driver = await parent.driver.newPage();
      if (!this.isOpen(parent.id)) {
        await driver.close();
        throw this.disconnectedError(parent.id);
      }
      return this.registerDocument(parent.id, driver, true);
    });
  }

  /**
   * Registers a page the browser opened on its own (a popup). It stays unusable
   * until its hub acknowledges it. Returns null when the owning session is gone.
   */
  adoptDocument(sessionId: string, driver: PageDriver): Document | null {
    if (!this.isOpen(sessionId)) {
      this.logger.warn("hierarchy.popup_orphaned", { nodeId: sessionId });
      driver.close().catch((error: unknown) => {
        this.logger.warn("hierarchy.release_failed", { nodeId: sessionId, data: { error: describeError(error) } });
      });
      return null;
    }
    return this.registerDocument(sessionId, driver, false);
  }

  /**
   * Closes the node and everything below it, children first. Concurrent and
   * repeated calls share the same cascade; a node that is already gone is a no-op.
   */
  close(node: HierarchyNode | string): Promise<void> {
    const id = typeof node === "string" ? node : node.id;
    const record = this.nodes.get(id);
    if (!record) {
      return Promise.resolve();
    }
    if (record.closePromise) {
      return record.closePromise;
    }
    this.abortSubtree(id, "closed");
    const closing = this.enqueue(async () => {
      const failures: unknown[] = [];
      await this.cascade(id, failures);
      if (failures.length > 0) {
        throw failures[0];
      }
    });
    record.closePromise = closing;
    return closing;
  }

  /** The underlying process is unreachable: every operation below `browserId` fails from now on. */
  markDisconnected(browserId: string, reason = "browser process unreachable"): void {
    const record = this.nodes.get(browserId);
    if (!record || record.disconnectReason) {
      return;
    }
    this.logger.error("hierarchy.disconnected", { nodeId: browserId, data: { reason } });
    this.walk(browserId, (entry) => {
      entry.disconnectReason = reason;
      if (!entry.controller.signal.aborted) {
        entry.controller.abort(new SessionDisconnectedError(entry.id, reason));
      }
    });
  }

  onClose(listener: (event: CloseEvent) => void): () => void {
    this.closeListeners.add(listener);
    return () => {
      this.closeListeners.delete(listener);
    };
  }

  isOpen(id: string): boolean {
    const record = this.nodes.get(id);
    return Boolean(record && record.state === "open" && !record.disconnectReason);
  }

  isClosed(id: string): boolean {
    const record = this.nodes.get(id);
    return !record || record.state === "closed";
  }

  isDisconnected(id: string): boolean {
    return Boolean(this.nodes.get(id)?.disconnectReason);
  }

  assertOpen(id: string): void {
    if (!this.isOpen(id)) {
      throw this.disconnectedError(id);
    }
  }

  sessionsOf(browserId: string): IsolatedSession[] {
    const sessions: IsolatedSession[] = [];
    for (const child of this.childRecords(browserId)) {
      if (child.kind === "session") sessions.push(child.handle);
    }
    return sessions;
  }

  documentsOf(sessionId: string): Document[] {
    const documents: Document[] = [];
    for (const child of this.childRecords(sessionId)) {
      if (child.kind === "document") documents.push(child.handle);
    }
    return documents;
  }

  childFramesOf(nodeId: string): SubDocument[] {
    const frames: SubDocument[] = [];
    for (const child of this.childRecords(nodeId)) {
      if (child.kind === "frame") frames.push(child.handle);
    }
    return frames;
  }

  browserOf(browserId: string): Browser {
    return this.requireRecord(browserId, "browser").handle;
  }

  sessionOf(sessionId: string): IsolatedSession {
    return this.requireRecord(sessionId, "session").handle;
  }

  documentOf(documentId: string): Document {
    return this.requireRecord(documentId, "document").handle;
  }

  frameOf(frameNodeId: string): SubDocument | null {
    const record = this.nodes.get(frameNodeId);
    return record?.kind === "frame" ? record.handle : null;
  }

  mainFrameOf(documentId: string): SubDocument {
    const record = this.requireRecord(documentId, "document");
    return this.requireRecord(record.rootFrameId, "frame").handle;
  }

  urlOf(nodeId: string): string {
    const record = this.nodes.get(nodeId);
    if (record?.kind === "document" || record?.kind === "frame") {
      return record.url;
    }
    throw this.disconnectedError(nodeId);
  }

  /** Depth-first listing of live nodes, parents before children. */
  tree(): NodeSummary[] {
    const output: NodeSummary[] = [];
    const visit = (record: NodeRecord, depth: number) => {
      output.push({
        id: record.id,
        kind: record.kind,
        parentId: record.parentId,
        depth,
        state: record.state,
        disconnected: Boolean(record.disconnectReason),
        ...(record.kind === "document" || record.kind === "frame" ? { url: record.url } : {}),
        ...((record.kind === "browser" || record.kind === "session") && record.label ? { label: record.label } : {})
      });
      for (const child of this.childRecords(record.id)) {
        visit(child, depth + 1);
      }
    };
    for (const record of this.nodes.values()) {
      if (record.parentId === null) visit(record, 0);
    }
    return output;
  }

  stats(): Record<NodeKind, number> {
    const counts: Record<NodeKind, number> = { browser: 0, session: 0, document: 0, frame: 0 };
    for (const record of this.nodes.values()) {
      counts[record.kind] += 1;
    }
    return counts;
  }

  attachFrame(documentId: string, frameId: string, parentFrameId: string, url: string): SubDocument | null {
    const document = this.nodes.get(documentId);
    if (document?.kind !== "document" || !this.isOpen(documentId)) {
      return null;
    }
    const parentNodeId = document.frameIndex.get(parentFrameId);
    if (!parentNodeId || !this.isOpen(parentNodeId)) {
      this.logger.warn("hierarchy.frame_parent_missing", { nodeId: documentId, data: { frameId, parentFrameId } });
      return null;
    }
    const existing = document.frameIndex.get(frameId);
    if (existing) {
      return this.frameOf(existing);
    }
    return this.registerFrame(document, frameId, parentNodeId, url);
  }

  detachFrame(documentId: string, frameId: string): void {
    const document = this.nodes.get(documentId);
    if (document?.kind !== "document") return;
    const nodeId = document.frameIndex.get(frameId);
    if (!nodeId || nodeId === document.rootFrameId) return;
    this.abortSubtree(nodeId, "frame detached");
    this.removeFrameSubtree(nodeId);
  }

  /**
   * Navigation replaces a frame's content: its url changes and its child frames go
   * away, while the frame node itself (and for the main frame, the Document and its
   * subscriptions) survive.
   */
  navigateFrame(documentId: string, frameId: string, url: string): void {
    const document = this.nodes.get(documentId);
    if (document?.kind !== "document") return;
    const nodeId = document.frameIndex.get(frameId);
    const frame = nodeId ? this.nodes.get(nodeId) : undefined;
    if (frame?.kind !== "frame") return;
    for (const childId of [...frame.childIds]) {
      this.abortSubtree(childId, "parent navigated");
      this.removeFrameSubtree(childId);
    }
    frame.url = url;
    if (frame.id === document.rootFrameId) {
      document.url = url;
      this.logger.debug("hierarchy.navigated", { nodeId: documentId, data: { url } });
    }
  }

  private registerDocument(sessionId: string, driver: PageDriver, acknowledged: boolean): Document {
    const id = randomUUID();
    const controller = new AbortController();
    const handle = new Document({
      hierarchy: this,
      id,
      signal: controller.signal,
      sessionId,
      driver,
      acknowledged
    });
    const record: DocumentRecord = {
      kind: "document",
      id,
      parentId: sessionId,
      childIds: [],
      state: "open",
      controller,
      driver,
      handle,
      url: driver.url(),
      rootFrameId: "",
      frameIndex: new Map(),
      unsubscribe: () => {}
    };
    this.link(record);
    const root = this.registerFrame(record, driver.mainFrameId(), id, driver.url());
    record.rootFrameId = root.id;
    record.unsubscribe = driver.subscribe((event) => this.handleTransportEvent(id, event));
    this.logger.info("hierarchy.document_created", { nodeId: id, data: { sessionId, popup: !acknowledged } });
    return handle;
  }

  private registerFrame(document: DocumentRecord, frameId: string, parentNodeId: string, url: string): SubDocument {
    const id = randomUUID();
    const controller = new AbortController();
    const parentFrameNodeId = parentNodeId === document.id ? null : parentNodeId;
    const handle = new SubDocument(this, id, controller.signal, frameId, document.id, parentFrameNodeId);
    this.link({
      kind: "frame",
      id,
      parentId: parentNodeId,
      childIds: [],
      state: "open",
      controller,
      handle,
      documentId: document.id,
      frameId,
      url
    });
    document.frameIndex.set(frameId, id);
    return handle;
  }

  private handleTransportEvent(documentId: string, event: TransportEvent): void {
    const record = this.nodes.get(documentId);
    if (record?.kind !== "document" || record.state !== "open") {
      return;
    }
    switch (event.type) {
      case "dialog":
        record.handle.hub.interceptDialog(event);
        return;
      case "popup": {
        const popup = this.adoptDocument(record.parentId ?? "", event.page);
        if (popup) {
          record.handle.hub.interceptPopup(popup);
        }
        return;
      }
      case "frameattached":
        this.attachFrame(documentId, event.frameId, event.parentFrameId, event.url);
        return;
      case "framedetached":
        this.detachFrame(documentId, event.frameId);
        return;
      case "navigated":
        this.navigateFrame(documentId, event.frameId, event.url);
        return;
      case "closed":
        this.close(documentId).catch((error: unknown) => {
          this.logger.error("hierarchy.close_failed", { nodeId: documentId, data: { error: describeError(error) } });
        });
        return;
      default: {
        const unreachable: never = event;
        this.logger.warn("hierarchy.unknown_event", { nodeId: documentId, data: unreachable });
      }
    }
  }

  private async cascade(id: string, failures: unknown[]): Promise<void> {
    const record = this.nodes.get(id);
    if (!record || record.state === "closed") {
      return;
    }
    record.state = "closing";
    for (const childId of [...record.childIds]) {
      await this.cascade(childId, failures);
    }
    try {
      await this.release(record);
    } catch (error) {
      if (record.disconnectReason) {
        this.logger.debug("hierarchy.release_skipped", { nodeId: id, data: { error: describeError(error) } });
      } else {
        failures.push(error);
        this.logger.warn("hierarchy.release_failed", { nodeId: id, data: { error: describeError(error) } });
      }
    } finally {
      this.unlink(record);
    }
  }

  private async release(record: NodeRecord): Promise<void> {
    switch (record.kind) {
      case "browser":
        record.detach();
        await record.driver.close();
        return;
      case "session":
        if (record.disconnectReason) return;
        await record.driver.close();
        return;
      case "document":
        record.unsubscribe();
        if (record.disconnectReason) return;
        await record.driver.close();
        return;
      case "frame":
        return;
    }
  }

  private removeFrameSubtree(id: string): void {
    const record = this.nodes.get(id);
    if (record?.kind !== "frame" || record.state === "closed") {
      return;
    }
    record.state = "closing";
    for (const childId of [...record.childIds]) {
      this.removeFrameSubtree(childId);
    }
    const document = this.nodes.get(record.documentId);
    if (document?.kind === "document") {
      document.frameIndex.delete(record.frameId);
    }
    this.unlink(record);
  }

  private link(record: NodeRecord): void {
    this.nodes.set(record.id, record);
    if (record.parentId) {
      this.nodes.get(record.parentId)?.childIds.push(record.id);
    }
  }

  private unlink(record: NodeRecord): void {
    record.state = "closed";
    this.nodes.delete(record.id);
    if (record.parentId) {
      const parent = this.nodes.get(record.parentId);
      if (parent) {
        parent.childIds = parent.childIds.filter((childId) => childId !== record.id);
      }
    }
    const event: CloseEvent = { id: record.id, kind: record.kind, parentId: record.parentId };
    this.logger.debug("hierarchy.close", { nodeId: record.id, data: { kind: record.kind } });
    for (const listener of Array.from(this.closeListeners)) {
      listener(event);
    }
  }

  private abortSubtree(id: string, detail: string): void {
    this.walk(id, (record) => {
      if (record.state === "open") {
        record.state = "closing";
      }
      if (!record.controller.signal.aborted) {
        record.controller.abort(new SessionDisconnectedError(record.id, record.disconnectReason ?? detail));
      }
    });
  }

  private walk(id: string, visit: (record: NodeRecord) => void): void {
    const record = this.nodes.get(id);
    if (!record) return;
    visit(record);
    for (const childId of record.childIds) {
      this.walk(childId, visit);
    }
  }

  private childRecords(id: string): NodeRecord[] {
    const record = this.nodes.get(id);
    if (!record) return [];
    const children: NodeRecord[] = [];
    for (const childId of record.childIds) {
      const child = this.nodes.get(childId);
      if (child) children.push(child);
    }
    return children;
  }

  private requireRecord<K extends NodeKind>(id: string, kind: K): Extract<NodeRecord, { kind: K }> {
    const record = this.nodes.get(id);
    if (!record) {
      throw this.disconnectedError(id);
    }
    if (!isKind(record, kind)) {
      throw new Error(`Node ${id} is a ${record.kind}, expected ${kind}`);
    }
    return record;
  }

  private disconnectedError(id: string): SessionDisconnectedError {
    const record = this.nodes.get(id);
    if (record?.disconnectReason) {
      return new SessionDisconnectedError(id, record.disconnectReason);
    }
    return new SessionDisconnectedError(id, record ? "closing" : "closed");
  }

  private enqueue<T>(task: () => Promise<T>): Promise<T> {
    const run = this.mutations.then(task);
    this.mutations = run.then(() => undefined, () => undefined);
    return run;
  }
}

function isKind<K extends NodeKind>(record: NodeRecord, kind: K): record is Extract<NodeRecord, { kind: K }> {
  return record.kind === kind;
}
