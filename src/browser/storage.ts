import { abortReason, raceAbort } from "../core/clock";
import type { ContextDriver, StorageState, StoredCookie } from "./driver-types";

export const EMPTY_STORAGE_STATE: StorageState = { cookies: [], origins: [] };

export function cloneStorageState(state: StorageState): StorageState {
  return {
    cookies: state.cookies.map((cookie) => ({ ...cookie })),
    origins: state.origins.map((entry) => ({
      origin: entry.origin,
      items: entry.items.map((item) => ({ ...item }))
    }))
  };
}

/**
 * Cookies and origin storage of one isolated session. Every call goes to the
 * session's browser context, so values the page wrote itself are visible here and
 * values written here are visible to the page. Fails once the session is gone.
 */
export class SessionStorage {
  constructor(
    private readonly context: ContextDriver,
    private readonly signal: AbortSignal
  ) {}

  async cookies(domain?: string): Promise<StoredCookie[]> {
    const all = await this.run(() => this.context.cookies());
    return domain ? all.filter((cookie) => cookie.domain === domain) : all;
  }

  async addCookies(cookies: StoredCookie[]): Promise<void> {
    for (const cookie of cookies) {
      if (!cookie.name.trim()) {
        throw new Error("Cookie name must be non-empty");
      }
    }
    await this.run(() => this.context.addCookies(cookies.map((cookie) => ({ ...cookie }))));
  }

  clearCookies(): Promise<void> {
    return this.run(() => this.context.clearCookies());
  }

  async getItem(origin: string, key: string): Promise<string | null> {
    const state = await this.snapshot();
    const entry = state.origins.find((candidate) => candidate.origin === origin);
    return entry?.items.find((item) => item.name === key)?.value ?? null;
  }

  snapshot(): Promise<StorageState> {
    return this.run(() => this.context.storageState());
  }

  private run<T>(task: () => Promise<T>): Promise<T> {
    if (this.signal.aborted) {
      return Promise.reject(abortReason(this.signal));
    }
    return raceAbort(task(), this.signal);
  }
}
