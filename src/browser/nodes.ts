import type { Document } from "./document";
import { Locator } from "./locator";
import type { SessionHierarchy, SessionOptions } from "./session-hierarchy";
import type { SessionStorage } from "./storage";

/** Root handle for one launched browser process. */
export class Browser {
  readonly kind = "browser" as const;

  constructor(
    private readonly hierarchy: SessionHierarchy,
    readonly id: string,
    readonly signal: AbortSignal,
    readonly label?: string
  ) {}

  newSession(options: SessionOptions = {}): Promise<IsolatedSession> {
    return this.hierarchy.createSession(this, options);
  }

  sessions(): IsolatedSession[] {
    return this.hierarchy.sessionsOf(this.id);
  }

  isConnected(): boolean {
    return !this.hierarchy.isClosed(this.id) && !this.hierarchy.isDisconnected(this.id);
  }

  isClosed(): boolean {
    return this.hierarchy.isClosed(this.id);
  }

  /** Releases the process and every session, document and frame under it. */
  close(): Promise<void> {
    return this.hierarchy.close(this);
  }
}

/** Isolation boundary with its own cookies and origin storage. */
export class IsolatedSession {
  readonly kind = "session" as const;

  constructor(
    private readonly hierarchy: SessionHierarchy,
    readonly id: string,
    readonly signal: AbortSignal,
    readonly browserId: string,
    readonly storage: SessionStorage,
    readonly label?: string
  ) {}

  get browser(): Browser {
    return this.hierarchy.browserOf(this.browserId);
  }

  newDocument(): Promise<Document> {
    return this.hierarchy.createDocument(this);
  }

  documents(): Document[] {
    return this.hierarchy.documentsOf(this.id);
  }

  isClosed(): boolean {
    return this.hierarchy.isClosed(this.id);
  }

  close(): Promise<void> {
    return this.hierarchy.close(this);
  }
}

/**
 * A frame. The parent is referenced by id only and looked up through the
 * hierarchy, so a frame never keeps its parent alive.
 */
export class SubDocument {
  readonly kind = "frame" as const;

  constructor(
    private readonly hierarchy: SessionHierarchy,
    readonly id: string,
    readonly signal: AbortSignal,
    readonly frameId: string,
    readonly documentId: string,
    private readonly parentFrameNodeId: string | null
  ) {}

  get document(): Document {
    return this.hierarchy.documentOf(this.documentId);
  }

  isRoot(): boolean {
    return this.parentFrameNodeId === null;
  }

  /** Parent frame, or null for the root frame and for a parent that is already gone. */
  parent(): SubDocument | null {
    return this.parentFrameNodeId ? this.hierarchy.frameOf(this.parentFrameNodeId) : null;
  }

  children(): SubDocument[] {
    return this.hierarchy.childFramesOf(this.id);
  }

  /** Every frame below this one, depth-first. */
  descendants(): SubDocument[] {
    const output: SubDocument[] = [];
    for (const child of this.children()) {
      output.push(child, ...child.descendants());
    }
    return output;
  }

  url(): string {
    return this.hierarchy.urlOf(this.id);
  }

  isDetached(): boolean {
    return this.hierarchy.isClosed(this.id) || this.signal.aborted;
  }

  locator(selector: string): Locator {
    return new Locator(this.document, this, selector);
  }
}
