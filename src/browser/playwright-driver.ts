import { randomUUID } from "crypto";
import {
  chromium,
  type Browser as PlaywrightBrowser,
  type BrowserContext,
  type Dialog,
  type Frame,
  type Page
} from "playwright-core";
import { z } from "zod";
import type { AutowaitConfig } from "../config";
import type { Logger } from "../core/logging";
import type {
  BrowserDriver,
  ContextDriver,
  DialogKind,
  ElementAction,
  ElementSnapshot,
  PageDriver,
  StorageState,
  StoredCookie,
  TransportEvent,
  TransportListener
} from "./driver-types";
import type { BrowserLauncher } from "../fixtures/browser-fixtures";

type PlaywrightStorageState = {
  cookies: Array<{
    name: string;
    value: string;
    domain: string;
    path: string;
    expires: number;
    httpOnly: boolean;
    secure: boolean;
    sameSite: "Strict" | "Lax" | "None";
  }>;
  origins: Array<{ origin: string; localStorage: Array<{ name: string; value: string }> }>;
};

const elementExtrasSchema = z.object({
  attributes: z.record(z.string()),
  receivesEvents: z.boolean()
});

export type ElementExtras = z.infer<typeof elementExtrasSchema>;

function readElementExtras(element: Element): { attributes: Record<string, string>; receivesEvents: boolean } {
  const attributes: Record<string, string> = {};
  for (const attribute of Array.from(element.attributes)) {
    attributes[attribute.name] = attribute.value;
  }
  const rect = element.getBoundingClientRect();
  let receivesEvents = false;
  if (rect.width > 0 && rect.height > 0) {
    const hit = element.ownerDocument.elementFromPoint(rect.left + rect.width / 2, rect.top + rect.height / 2);
    receivesEvents = hit !== null && (hit === element || element.contains(hit));
  }
  return { attributes, receivesEvents };
}

export function toDialogKind(type: string): DialogKind {
  switch (type) {
    case "prompt":
      return "textual";
    case "confirm":
    case "beforeunload":
      return "confirmable";
    default:
      return "informational";
  }
}

export function toPlaywrightStorageState(state: StorageState): PlaywrightStorageState {
  return {
    cookies: state.cookies.map((cookie) => ({
      name: cookie.name,
      value: cookie.value,
      domain: cookie.domain,
      path: cookie.path,
      expires: cookie.expires ?? -1,
      httpOnly: cookie.httpOnly ?? false,
      secure: cookie.secure ?? false,
      sameSite: "Lax"
    })),
    origins: state.origins.map((entry) => ({
      origin: entry.origin,
      localStorage: entry.items.map((item) => ({ name: item.name, value: item.value }))
    }))
  };
}

type PlaywrightCookieFields = {
  name: string;
  value: string;
  domain: string;
  path: string;
  expires: number;
  httpOnly: boolean;
  secure: boolean;
};

function fromPlaywrightCookie(cookie: PlaywrightCookieFields): StoredCookie {
  return {
    name: cookie.name,
    value: cookie.value,
    domain: cookie.domain,
    path: cookie.path,
    expires: cookie.expires,
    httpOnly: cookie.httpOnly,
    secure: cookie.secure
  };
}

export function fromPlaywrightStorageState(state: {
  cookies: PlaywrightCookieFields[];
  origins: Array<{ origin: string; localStorage: Array<{ name: string; value: string }> }>;
}): StorageState {
  return {
    cookies: state.cookies.map(fromPlaywrightCookie),
    origins: state.origins.map((entry) => ({
      origin: entry.origin,
      items: entry.localStorage.map((item) => ({ name: item.name, value: item.value }))
    }))
  };
}

export function parseElementExtras(raw: unknown): ElementExtras {
  const parsed = elementExtrasSchema.safeParse(raw);
  if (!parsed.success) {
    throw new Error(`Unexpected element state from page: ${parsed.error.issues.map((issue) => issue.message).join("; ")}`);
  }
  return parsed.data;
}

const DETACHED: ElementSnapshot = {
  exists: false,
  visible: false,
  enabled: false,
  receivesEvents: false,
  boundingBox: null,
  count: 0
};

/** Adapts one Playwright page to the document transport the hierarchy consumes. */
export function wrapPage(page: Page, logger?: Logger): PageDriver {
  const listeners = new Set<TransportListener>();
  const frameIds = new WeakMap<Frame, string>();
  const frames = new Map<string, Frame>();
  const dialogs = new Map<string, Dialog>();

  const idOf = (frame: Frame): string => {
    const known = frameIds.get(frame);
    if (known) return known;
    const id = randomUUID();
    frameIds.set(frame, id);
    frames.set(id, frame);
    return id;
  };

  const frameFor = (frameId: string): Frame => {
    const frame = frames.get(frameId);
    if (!frame || frame.isDetached()) {
      throw new Error(`Frame ${frameId} is detached`);
    }
    return frame;
  };

  const emit = (event: TransportEvent) => {
    for (const listener of Array.from(listeners)) {
      listener(event);
    }
  };

  const mainFrameId = idOf(page.mainFrame());

  page.on("dialog", (dialog) => {
    const dialogId = randomUUID();
    dialogs.set(dialogId, dialog);
    const kind = toDialogKind(dialog.type());
    logger?.debug("driver.dialog", { data: { dialogId, type: dialog.type() } });
    emit({
      type: "dialog",
      dialogId,
      kind,
      message: dialog.message(),
      ...(kind === "textual" ? { defaultText: dialog.defaultValue() } : {})
    });
  });
  page.on("popup", (popup) => {
    emit({ type: "popup", page: wrapPage(popup, logger) });
  });
  page.on("frameattached", (frame) => {
    const parent = frame.parentFrame();
    if (!parent) return;
    emit({ type: "frameattached", frameId: idOf(frame), parentFrameId: idOf(parent), url: frame.url() });
  });
  page.on("framedetached", (frame) => {
    const frameId = idOf(frame);
    frames.delete(frameId);
    emit({ type: "framedetached", frameId });
  });
  page.on("framenavigated", (frame) => {
    emit({ type: "navigated", frameId: idOf(frame), url: frame.url() });
  });
  page.on("close", () => {
    emit({ type: "closed" });
  });

  const perform = async (frameId: string, selector: string, action: ElementAction): Promise<void> => {
    // actionability was already established by the caller, so Playwright's own checks are skipped
    const target = frameFor(frameId).locator(selector).first();
    switch (action.type) {
      case "click":
        await target.click({ force: true });
        return;
      case "hover":
        await target.hover({ force: true });
        return;
      case "check":
        await target.check({ force: true });
        return;
      case "fill":
        await target.fill(action.value, { force: true });
        return;
      case "press":
        await target.press(action.key);
        return;
      default: {
        const unreachable: never = action;
        throw new Error(`Unsupported action: ${JSON.stringify(unreachable)}`);
      }
    }
  };

  return {
    mainFrameId: () => mainFrameId,
    url: () => page.url(),
    subscribe: (listener) => {
      listeners.add(listener);
      return () => {
        listeners.delete(listener);
      };
    },
    resolveDialog: async (dialogId, decision) => {
      const dialog = dialogs.get(dialogId);
      if (!dialog) {
        throw new Error(`Unknown dialog ${dialogId}`);
      }
      dialogs.delete(dialogId);
      if (decision.accept) {
        await dialog.accept(decision.text);
      } else {
        await dialog.dismiss();
      }
    },
    probe: async (frameId, selector) => {
      const matches = frameFor(frameId).locator(selector);
      const count = await matches.count();
      if (count === 0) {
        return { ...DETACHED };
      }
      const first = matches.first();
      const [visible, enabled, boundingBox, text, raw] = await Promise.all([
        first.isVisible(),
        first.isEnabled(),
        first.boundingBox(),
        first.textContent(),
        first.evaluate(readElementExtras)
      ]);
      const extras = parseElementExtras(raw);
      return {
        exists: true,
        visible,
        enabled,
        receivesEvents: visible && extras.receivesEvents,
        boundingBox,
        count,
        text: text ?? "",
        attributes: extras.attributes
      };
    },
    perform,
    navigate: async (url, timeoutMs) => {
      await page.goto(url, { timeout: timeoutMs });
    },
    close: async () => {
      if (!page.isClosed()) {
        await page.close();
      }
    }
  };
}

export function wrapContext(context: BrowserContext, logger?: Logger): ContextDriver {
  return {
    newPage: async () => wrapPage(await context.newPage(), logger),
    cookies: async () => (await context.cookies()).map(fromPlaywrightCookie),
    addCookies: (cookies) => context.addCookies(toPlaywrightStorageState({ cookies, origins: [] }).cookies),
    clearCookies: () => context.clearCookies(),
    storageState: async () => fromPlaywrightStorageState(await context.storageState()),
    close: () => context.close()
  };
}

export function wrapBrowser(browser: PlaywrightBrowser, logger?: Logger): BrowserDriver {
  return {
    newContext: async ({ storageState }) => wrapContext(
      await browser.newContext({ storageState: toPlaywrightStorageState(storageState) }),
      logger
    ),
    onDisconnected: (listener) => {
      const handler = () => listener("browser process disconnected");
      browser.on("disconnected", handler);
      return () => {
        browser.off("disconnected", handler);
      };
    },
    close: async () => {
      if (browser.isConnected()) {
        await browser.close();
      }
    }
  };
}

/** Launches Chromium through playwright-core with the configured executable and flags. */
export function createPlaywrightLauncher(logger?: Logger): BrowserLauncher {
  return async (config: AutowaitConfig) => {
    const browser = await chromium.launch({
      headless: config.headless,
      executablePath: config.executablePath,
      args: config.launchArgs
    });
    logger?.info("driver.launched", { data: { headless: config.headless, version: browser.version() } });
    return wrapBrowser(browser, logger);
  };
}
