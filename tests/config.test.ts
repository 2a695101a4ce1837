import { describe, it, expect, vi, beforeEach, afterEach } from "vitest";
import { CONFIG_FILE_NAME, getGlobalConfigPath, loadGlobalConfig, resolveConfig } from "../src/config";
import { ConfigurationError } from "../src/core/errors";
import * as fs from "fs";
import * as path from "path";
import * as os from "os";

vi.mock("fs");
vi.mock("os");

describe("loadGlobalConfig", () => {
  beforeEach(() => {
    vi.mocked(os.homedir).mockReturnValue("/home/testuser");
    delete process.env.AUTOWAIT_CONFIG_DIR;
  });

  afterEach(() => {
    vi.clearAllMocks();
  });

  it("returns defaults when no config file exists", () => {
    vi.mocked(fs.existsSync).mockReturnValue(false);

    const config = loadGlobalConfig();
    expect(config).toEqual({
      timeouts: { actionMs: 30000, expectMs: 5000, popupAckMs: 5000 },
      polling: { initialMs: 20, factor: 2, maxMs: 100 },
      retries: 0,
      logLevel: "info",
      headless: true,
      launchArgs: []
    });
    expect(fs.existsSync).toHaveBeenCalledWith(
      path.join("/home/testuser", ".config", "autowait", CONFIG_FILE_NAME)
    );
  });

  it("reads config from the global config file", () => {
    vi.mocked(fs.existsSync).mockReturnValue(true);
    vi.mocked(fs.readFileSync).mockReturnValue(JSON.stringify({
      timeouts: { actionMs: 10000 },
      polling: { initialMs: 50, maxMs: 250 },
      retries: 2,
      logLevel: "debug",
      headless: false,
      launchArgs: ["--lang=en-US"]
    }));

    const config = loadGlobalConfig();
    expect(config.timeouts).toEqual({ actionMs: 10000, expectMs: 5000, popupAckMs: 5000 });
    expect(config.polling).toEqual({ initialMs: 50, factor: 2, maxMs: 250 });
    expect(config.retries).toBe(2);
    expect(config.logLevel).toBe("debug");
    expect(config.headless).toBe(false);
    expect(config.launchArgs).toEqual(["--lang=en-US"]);
  });

  it("respects AUTOWAIT_CONFIG_DIR", () => {
    process.env.AUTOWAIT_CONFIG_DIR = "/custom/config";
    vi.mocked(fs.existsSync).mockReturnValue(true);
    vi.mocked(fs.readFileSync).mockReturnValue(JSON.stringify({ retries: 1 }));

    const config = loadGlobalConfig();
    expect(config.retries).toBe(1);
    expect(fs.existsSync).toHaveBeenCalledWith(path.join("/custom/config", "autowait.jsonc"));
  });

  it("strips JSONC comments and trailing commas", () => {
    vi.mocked(fs.existsSync).mockReturnValue(true);
    vi.mocked(fs.readFileSync).mockReturnValue(`{
      // per-project override
      "retries": 3,
      /* block comment */
      "headless": false,
    }`);

    const config = loadGlobalConfig();
    expect(config.retries).toBe(3);
    expect(config.headless).toBe(false);
  });

  it("throws on malformed JSONC", () => {
    vi.mocked(fs.existsSync).mockReturnValue(true);
    vi.mocked(fs.readFileSync).mockReturnValue("{ \"retries\": }");

    expect(() => loadGlobalConfig("/tmp/autowait.jsonc")).toThrow(ConfigurationError);
    expect(() => loadGlobalConfig("/tmp/autowait.jsonc")).toThrow("Invalid JSONC in autowait config at /tmp/autowait.jsonc");
  });

  it("names every invalid field", () => {
    vi.mocked(fs.existsSync).mockReturnValue(true);
    vi.mocked(fs.readFileSync).mockReturnValue(JSON.stringify({ retries: -1, logLevel: "loud" }));

    expect(() => loadGlobalConfig("/tmp/autowait.jsonc")).toThrow(
      /^Invalid autowait config at \/tmp\/autowait\.jsonc: retries: .+; logLevel: .+$/
    );
  });

  it("treats an empty object as defaults", () => {
    vi.mocked(fs.existsSync).mockReturnValue(true);
    vi.mocked(fs.readFileSync).mockReturnValue("{ /* nothing yet */ }");

    expect(loadGlobalConfig().retries).toBe(0);
  });
});

describe("resolveConfig", () => {
  afterEach(() => {
    vi.clearAllMocks();
  });

  it("fills defaults around the given values", () => {
    const config = resolveConfig({ timeouts: { expectMs: 1000 } });
    expect(config.timeouts).toEqual({ actionMs: 30000, expectMs: 1000, popupAckMs: 5000 });
  });

  it("rejects a polling cap below the first interval", () => {
    expect(() => resolveConfig({ polling: { initialMs: 200, maxMs: 100 } })).toThrow(
      "Invalid autowait config at <inline>: polling: polling.maxMs must be greater than or equal to polling.initialMs"
    );
  });

  it("checks that executablePath is executable", () => {
    vi.mocked(fs.accessSync).mockImplementation(() => {
      throw new Error("EACCES");
    });
    expect(() => resolveConfig({ executablePath: "/opt/chrome/chrome" })).toThrow(
      "executablePath: executablePath must point to an executable file"
    );

    vi.mocked(fs.accessSync).mockImplementation(() => undefined);
    expect(resolveConfig({ executablePath: "/opt/chrome/chrome" }).executablePath).toBe("/opt/chrome/chrome");
  });
});

describe("getGlobalConfigPath", () => {
  it("prefers the environment directory", () => {
    expect(getGlobalConfigPath({ AUTOWAIT_CONFIG_DIR: "/etc/autowait" })).toBe(path.join("/etc/autowait", "autowait.jsonc"));
  });
});
