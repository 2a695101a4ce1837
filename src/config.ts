import { z } from "zod";
import * as fs from "fs";
import * as path from "path";
import * as os from "os";
import { parse as parseJsonc } from "jsonc-parser";
import { ConfigurationError } from "./core/errors";

function isExecutable(filePath: string): boolean {
  try {
    fs.accessSync(filePath, fs.constants.X_OK);
    return true;
  } catch {
    return false;
  }
}

export type TimeoutsConfig = {
  /** Deadline for actions (click, fill, ...), including any dialog they trigger. */
  actionMs: number;
  /** Deadline for web-first assertions. */
  expectMs: number;
  /** How long a popup waits for an explicit acknowledgement before it is acknowledged automatically. */
  popupAckMs: number;
};

export type PollingConfig = {
  initialMs: number;
  factor: number;
  maxMs: number;
};

export type AutowaitConfig = {
  timeouts: TimeoutsConfig;
  polling: PollingConfig;
  retries: number;
  logLevel: "debug" | "info" | "warn" | "error";
  headless: boolean;
  executablePath?: string;
  launchArgs: string[];
};

const timeoutsSchema = z.object({
  actionMs: z.number().int().min(0).default(30000),
  expectMs: z.number().int().min(0).default(5000),
  popupAckMs: z.number().int().min(0).default(5000)
});

const pollingSchema = z.object({
  initialMs: z.number().int().min(1).max(10000).default(20),
  factor: z.number().min(1).max(10).default(2),
  maxMs: z.number().int().min(1).max(60000).default(100)
}).refine((value) => value.maxMs >= value.initialMs, {
  message: "polling.maxMs must be greater than or equal to polling.initialMs"
});

const configSchema = z.object({
  timeouts: timeoutsSchema.default({}),
  polling: pollingSchema.default({}),
  retries: z.number().int().min(0).max(20).default(0),
  logLevel: z.enum(["debug", "info", "warn", "error"]).default("info"),
  headless: z.boolean().default(true),
  executablePath: z.string().min(1).optional().refine(
    (val) => val === undefined || isExecutable(val),
    { message: "executablePath must point to an executable file" }
  ),
  launchArgs: z.array(z.string()).default([])
});

export const CONFIG_FILE_NAME = "autowait.jsonc";

export function getGlobalConfigPath(env: NodeJS.ProcessEnv = process.env): string {
  const configDir = env.AUTOWAIT_CONFIG_DIR
    || path.join(os.homedir(), ".config", "autowait");
  return path.join(configDir, CONFIG_FILE_NAME);
}

function loadConfigFile(filePath: string): unknown {
  if (!fs.existsSync(filePath)) {
    return {};
  }
  const content = fs.readFileSync(filePath, "utf-8");
  const errors: Array<{ error: number; offset: number; length: number }> = [];
  const parsed: unknown = parseJsonc(content, errors, { allowTrailingComma: true });
  if (errors.length > 0) {
    const firstError = errors[0];
    throw new ConfigurationError(`Invalid JSONC in autowait config at ${filePath}: parse error at offset ${firstError?.offset ?? 0}`);
  }
  return parsed ?? {};
}

function parseConfig(raw: unknown, source: string): AutowaitConfig {
  const parsed = configSchema.safeParse(raw);
  if (!parsed.success) {
    const issues = parsed.error.issues
      .map((issue) => (issue.path.length > 0 ? `${issue.path.join(".")}: ${issue.message}` : issue.message))
      .join("; ");
    throw new ConfigurationError(`Invalid autowait config at ${source}: ${issues}`);
  }
  return parsed.data;
}

export function loadGlobalConfig(configPath = getGlobalConfigPath()): AutowaitConfig {
  return parseConfig(loadConfigFile(configPath), configPath);
}

export function resolveConfig(raw: unknown = {}): AutowaitConfig {
  return parseConfig(raw, "<inline>");
}
