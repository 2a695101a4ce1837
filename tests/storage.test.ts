import { describe, expect, it } from "vitest";
import { SessionStorage, cloneStorageState } from "../src/browser/storage";
import { SessionDisconnectedError } from "../src/core/errors";
import { FakeContext } from "./fake-driver";

const cookie = (name: string, domain = "example.test") => ({ name, value: `${name}-value`, domain, path: "/" });

const createStorage = (seed = { cookies: [cookie("sid")], origins: [] }) => {
  const context = new FakeContext(seed, []);
  const controller = new AbortController();
  return { context, controller, storage: new SessionStorage(context, controller.signal) };
};

describe("SessionStorage", () => {
  it("replaces cookies with the same name, domain and path", async () => {
    const { storage } = createStorage();
    await storage.addCookies([cookie("sid", "other.test")]);
    await storage.addCookies([{ ...cookie("sid"), value: "rotated" }]);

    expect(await storage.cookies("example.test")).toEqual([{ name: "sid", value: "rotated", domain: "example.test", path: "/" }]);
    expect(await storage.cookies()).toHaveLength(2);
  });

  it("rejects unnamed cookies before touching the context", async () => {
    const { storage, context } = createStorage();
    await expect(storage.addCookies([cookie("  ")])).rejects.toThrow("Cookie name must be non-empty");
    expect(await context.cookies()).toEqual([cookie("sid")]);
  });

  it("reads origin items the page wrote", async () => {
    const { storage, context } = createStorage();
    context.writeOrigin("https://example.test", "cart", "2");

    expect(await storage.getItem("https://example.test", "cart")).toBe("2");
    expect(await storage.getItem("https://other.test", "cart")).toBeNull();
    expect((await storage.snapshot()).origins).toEqual([{ origin: "https://example.test", items: [{ name: "cart", value: "2" }] }]);
  });

  it("fails once the session is gone", async () => {
    const { storage, controller } = createStorage();
    controller.abort(new SessionDisconnectedError("session-1"));

    await expect(storage.cookies()).rejects.toBeInstanceOf(SessionDisconnectedError);
    await expect(storage.clearCookies()).rejects.toThrow("Session disconnected (session-1): closed");
  });
});

describe("cloneStorageState", () => {
  it("copies every level", () => {
    const state = { cookies: [cookie("sid")], origins: [{ origin: "https://example.test", items: [{ name: "a", value: "1" }] }] };
    const copy = cloneStorageState(state);

    expect(copy).toEqual(state);
    expect(copy.cookies[0]).not.toBe(state.cookies[0]);
    expect(copy.origins[0]?.items).not.toBe(state.origins[0]?.items);
  });
});
