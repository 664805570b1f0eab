import type { Logger } from "@ghostwalk/schemas";

export type LogLevel = "debug" | "info" | "warn" | "error";

const LEVEL_ORDER: Record<LogLevel, number> = { debug: 0, info: 1, warn: 2, error: 3 };

/** console-backed logger that tags every line with `[ghostwalk:<scope>]`. */
export class ConsoleLogger implements Logger {
  readonly scope: string;
  readonly level: LogLevel;
  private prefix: string;
  private minLevel: number;

  constructor(scope: string, level: LogLevel = "info") {
    // Scopes can come from config; keep newlines and control chars out of log lines
    // biome-ignore lint/suspicious/noControlCharactersInRegex: intentional sanitization of control chars
    this.scope = scope.replace(/[\x00-\x1f\x7f]/g, "_").slice(0, 128);
    this.level = level;
    this.prefix = `[ghostwalk:${this.scope}]`;
    this.minLevel = LEVEL_ORDER[level];
  }

  child(scope: string): ConsoleLogger {
    return new ConsoleLogger(`${this.scope}:${scope}`, this.level);
  }

  info(message: string, data?: Record<string, unknown>): void {
    if (this.minLevel > LEVEL_ORDER.info) return;
    console.log(`${this.prefix} ${message}`, data !== undefined ? data : "");
  }

  warn(message: string, data?: Record<string, unknown>): void {
    if (this.minLevel > LEVEL_ORDER.warn) return;
    console.warn(`${this.prefix} ${message}`, data !== undefined ? data : "");
  }

  error(message: string, data?: Record<string, unknown>): void {
    console.error(`${this.prefix} ${message}`, data !== undefined ? data : "");
  }

  debug(message: string, data?: Record<string, unknown>): void {
    if (this.minLevel > LEVEL_ORDER.debug) return;
    console.debug(`${this.prefix} ${message}`, data !== undefined ? data : "");
  }
}

export const silentLogger: Logger = {
  info: () => {},
  warn: () => {},
  error: () => {},
  debug: () => {},
};

export function parseLogLevel(value: string | undefined): LogLevel {
  switch (value) {
    case "debug":
    case "info":
    case "warn":
    case "error":
      return value;
    default:
      return "info";
  }
}
