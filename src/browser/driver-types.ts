/**
 * Boundary between the orchestration core and whatever actually drives a browser.
 * The core never talks to a protocol directly; `playwright-driver.ts` implements
 * these types over playwright-core and the tests implement them in memory.
 */

export type BoundingBox = {
  x: number;
  y: number;
  width: number;
  height: number;
};

export type ElementSnapshot = {
  /** Matched element is attached to the document. */
  exists: boolean;
  visible: boolean;
  enabled: boolean;
  /** Set by probes that can detect animation themselves; the core also compares boxes across polls. */
  stable?: boolean;
  receivesEvents: boolean;
  boundingBox: BoundingBox | null;
  count: number;
  text?: string;
  attributes?: Record<string, string>;
};

export type ElementProbe = {
  probe: (frameId: string, selector: string) => Promise<ElementSnapshot>;
};

export type ElementAction =
  | { type: "click" }
  | { type: "hover" }
  | { type: "check" }
  | { type: "fill"; value: string }
  | { type: "press"; key: string };

export type DialogKind = "informational" | "confirmable" | "textual";

export type DialogDecision = {
  accept: boolean;
  text?: string;
};

export type TransportEvent =
  | { type: "dialog"; dialogId: string; kind: DialogKind; message: string; defaultText?: string }
  | { type: "popup"; page: PageDriver }
  | { type: "frameattached"; frameId: string; parentFrameId: string; url: string }
  | { type: "framedetached"; frameId: string }
  | { type: "navigated"; frameId: string; url: string }
  | { type: "closed" };

export type TransportListener = (event: TransportEvent) => void;

export type DocumentTransport = {
  subscribe: (listener: TransportListener) => () => void;
  resolveDialog: (dialogId: string, decision: DialogDecision) => Promise<void>;
};

export type PageDriver = ElementProbe & DocumentTransport & {
  mainFrameId: () => string;
  url: () => string;
  perform: (frameId: string, selector: string, action: ElementAction) => Promise<void>;
  navigate: (url: string, timeoutMs: number) => Promise<void>;
  close: () => Promise<void>;
};

export type StoredCookie = {
  name: string;
  value: string;
  domain: string;
  path: string;
  expires?: number;
  httpOnly?: boolean;
  secure?: boolean;
};

export type StorageState = {
  cookies: StoredCookie[];
  origins: Array<{ origin: string; items: Array<{ name: string; value: string }> }>;
};

export type ContextDriverOptions = {
  storageState: StorageState;
};

export type ContextDriver = {
  newPage: () => Promise<PageDriver>;
  cookies: () => Promise<StoredCookie[]>;
  addCookies: (cookies: StoredCookie[]) => Promise<void>;
  clearCookies: () => Promise<void>;
  /** Current cookies and origin storage, including what pages wrote themselves. */
  storageState: () => Promise<StorageState>;
  close: () => Promise<void>;
};

export type BrowserDriver = {
  newContext: (options: ContextDriverOptions) => Promise<ContextDriver>;
  /** Registers a callback for loss of the underlying process. Returns an unsubscribe function. */
  onDisconnected: (listener: (reason: string) => void) => () => void;
  close: () => Promise<void>;
};
