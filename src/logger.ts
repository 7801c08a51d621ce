import { appendFileSync } from "node:fs";

export type LogLevel = "debug" | "info" | "warn" | "error";

const LEVEL_RANK: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
};

export function isLogLevel(value: string): value is LogLevel {
  return Object.prototype.hasOwnProperty.call(LEVEL_RANK, value);
}

export type Logger = {
  debug: (category: string, message: string, data?: unknown) => void;
  info: (category: string, message: string, data?: unknown) => void;
  warn: (category: string, message: string, data?: unknown) => void;
  error: (category: string, message: string, data?: unknown) => void;
};

export type LoggerOptions = {
  level?: LogLevel;
  /** Every record, regardless of `level`, is appended here as a timestamped line. */
  debugLogFile?: string;
};

function formatData(data: unknown): string {
  if (data === undefined) {
    return "";
  }

  if (typeof data === "string") {
    return ` ${data}`;
  }

  try {
    return ` ${JSON.stringify(data)}`;
  } catch {
    return ` ${String(data)}`;
  }
}

/**
 * Console output goes to stderr only; stdout belongs to the MCP stdio transport.
 */
export function createLogger(options: LoggerOptions = {}): Logger {
  const threshold = LEVEL_RANK[options.level ?? "warn"];
  const debugLogFile = options.debugLogFile?.trim() || null;
  let fileBroken = false;

  const log = (level: LogLevel, category: string, message: string, data?: unknown): void => {
    const prefix = `[bridge][${level.toUpperCase()}][${category}]`;

    if (LEVEL_RANK[level] >= threshold) {
      const args = data !== undefined ? [prefix, message, data] : [prefix, message];
      if (level === "warn") console.warn(...args);
      else console.error(...args);
    }

    if (debugLogFile && !fileBroken) {
      const line = `${new Date().toISOString()} - ${level.toUpperCase()} - ${category}: ${message}${formatData(data)}\n`;
      try {
        appendFileSync(debugLogFile, line, "utf8");
      } catch (error) {
        fileBroken = true;
        console.error(`${prefix} debug log disabled, cannot write ${debugLogFile}:`, error);
      }
    }
  };

  return {
    debug: (category, message, data) => log("debug", category, message, data),
    info: (category, message, data) => log("info", category, message, data),
    warn: (category, message, data) => log("warn", category, message, data),
    error: (category, message, data) => log("error", category, message, data),
  };
}

export const silentLogger: Logger = {
  debug: () => {},
  info: () => {},
  warn: () => {},
  error: () => {},
};
