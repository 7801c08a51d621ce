import { readFileSync } from "node:fs";

import { ConfigError } from "./errors.js";
import { isLogLevel, type LogLevel } from "./logger.js";
import { isModelName, MODEL_NAMES, type ModelName } from "./models.js";

export type BridgeConfig = {
  baseUrl: string;
  model: ModelName;
  timeoutMs: number;
  pollIntervalMs: number;
  /** Ceiling for the session/conversation-info node waits; null waits forever. */
  sessionWaitTimeoutMs: number | null;
  browserBaseUrl: string;
  browserUserId: string;
  browserSessionKey: string;
  browserApiKey: string;
  sessionToken: string;
  logLevel: LogLevel;
  debugLogFile: string | null;
};

export type BridgeConfigInput = Partial<BridgeConfig>;

type Env = Record<string, string | undefined>;

const DEFAULT_BASE_URL = "https://chat.openai.com";
const DEFAULT_MODEL: ModelName = "default";
const DEFAULT_TIMEOUT_MS = 60000;
const DEFAULT_POLL_INTERVAL_MS = 200;
const DEFAULT_BROWSER_BASE_URL = "http://127.0.0.1:9377";
const DEFAULT_BROWSER_USER_ID = "chatgpt-browser-bridge";
const DEFAULT_BROWSER_SESSION_KEY = "chatgpt-browser-bridge";
const DEFAULT_LOG_LEVEL: LogLevel = "warn";

export function normalizeBaseUrl(baseUrl: string): string {
  return baseUrl.trim().replace(/\/+$/, "");
}

export function parsePositiveNumber(raw: string | undefined): number | undefined {
  if (raw === undefined) {
    return undefined;
  }

  const normalized = raw.trim();
  if (!normalized) {
    return undefined;
  }

  const parsed = Number(normalized);
  if (!Number.isFinite(parsed) || parsed <= 0) {
    return undefined;
  }

  return parsed;
}

function readTokenFromFile(filePath: string): string {
  const path = filePath.trim();
  if (!path) {
    return "";
  }

  try {
    return readFileSync(path, "utf8").trim();
  } catch {
    return "";
  }
}

function firstNonEmpty(...values: Array<string | undefined>): string | undefined {
  for (const value of values) {
    const trimmed = value?.trim();
    if (trimmed) {
      return trimmed;
    }
  }

  return undefined;
}

function resolveModel(raw: string | undefined): ModelName {
  const value = raw?.trim() || DEFAULT_MODEL;
  if (!isModelName(value)) {
    throw new ConfigError(`unknown_model: ${value} (expected one of ${MODEL_NAMES.join(", ")})`);
  }

  return value;
}

function resolveLogLevel(raw: string | undefined): LogLevel {
  const value = raw?.trim().toLowerCase() || DEFAULT_LOG_LEVEL;
  if (!isLogLevel(value)) {
    throw new ConfigError(`unknown_log_level: ${value}`);
  }

  return value;
}

/**
 * Explicit options win over the environment, the environment over defaults.
 */
export function resolveConfig(input: BridgeConfigInput = {}, env: Env = process.env): BridgeConfig {
  const sessionToken =
    input.sessionToken?.trim() ||
    firstNonEmpty(env.CHATGPT_SESSION_TOKEN) ||
    readTokenFromFile(env.CHATGPT_SESSION_TOKEN_FILE ?? "");

  const sessionWaitTimeoutMs =
    input.sessionWaitTimeoutMs !== undefined
      ? input.sessionWaitTimeoutMs
      : (parsePositiveNumber(env.CHATGPT_SESSION_WAIT_TIMEOUT_MS) ?? null);

  return {
    baseUrl: normalizeBaseUrl(input.baseUrl ?? firstNonEmpty(env.CHATGPT_BASE_URL) ?? DEFAULT_BASE_URL),
    model: input.model ?? resolveModel(env.CHATGPT_MODEL),
    timeoutMs: input.timeoutMs ?? parsePositiveNumber(env.CHATGPT_TIMEOUT_MS) ?? DEFAULT_TIMEOUT_MS,
    pollIntervalMs:
      input.pollIntervalMs ?? parsePositiveNumber(env.CHATGPT_POLL_INTERVAL_MS) ?? DEFAULT_POLL_INTERVAL_MS,
    sessionWaitTimeoutMs,
    browserBaseUrl: normalizeBaseUrl(
      input.browserBaseUrl ??
        firstNonEmpty(env.CHATGPT_BROWSER_BASE_URL, env.CAMOFOX_BASE_URL) ??
        DEFAULT_BROWSER_BASE_URL,
    ),
    browserUserId: input.browserUserId ?? firstNonEmpty(env.CHATGPT_USER_ID) ?? DEFAULT_BROWSER_USER_ID,
    browserSessionKey:
      input.browserSessionKey ?? firstNonEmpty(env.CHATGPT_SESSION_KEY) ?? DEFAULT_BROWSER_SESSION_KEY,
    browserApiKey: input.browserApiKey ?? firstNonEmpty(env.CHATGPT_CAMOFOX_API_KEY, env.CAMOFOX_API_KEY) ?? "",
    sessionToken,
    logLevel: input.logLevel ?? resolveLogLevel(env.CHATGPT_LOG_LEVEL),
    debugLogFile: input.debugLogFile ?? firstNonEmpty(env.CHATGPT_DEBUG_LOG) ?? null,
  };
}
