import { resolve } from "node:path";
import type { SessionEvent } from "@ghostwalk/schemas";
import type { LogLevel } from "@ghostwalk/journal";
import { parseLogLevel } from "@ghostwalk/journal";

export function parsePort(value: string, label = "port"): number {
  const port = parseInt(value, 10);
  if (!Number.isInteger(port) || port < 1 || port > 65535) {
    throw new Error(`Invalid ${label}: "${value}" (must be 1–65535)`);
  }
  return port;
}

export interface CliConfig {
  host: string;
  port: number;
  statusPort: number;
  journalPath: string;
  savePath: string;
  logLevel: LogLevel;
}

export const DEFAULT_PORT = 8080;
export const DEFAULT_STATUS_PORT = 8081;

/** Defaults for every command, overridable from the environment (and .env via dotenv). */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): CliConfig {
  return {
    host: env.GHOSTWALK_HOST ?? "127.0.0.1",
    port: env.GHOSTWALK_PORT ? parsePort(env.GHOSTWALK_PORT, "GHOSTWALK_PORT") : DEFAULT_PORT,
    statusPort: env.GHOSTWALK_STATUS_PORT
      ? parsePort(env.GHOSTWALK_STATUS_PORT, "GHOSTWALK_STATUS_PORT")
      : DEFAULT_STATUS_PORT,
    journalPath: env.GHOSTWALK_JOURNAL_PATH ?? resolve("journal/session.jsonl"),
    savePath: env.GHOSTWALK_SAVE_PATH ?? resolve("saves/game.sav"),
    logLevel: parseLogLevel(env.GHOSTWALK_LOG_LEVEL),
  };
}

export interface SessionSummary {
  id: string;
  status: string;
  started: string;
  events: number;
}

/** Groups journal events by session, in first-seen order. */
export function summarizeSessions(events: readonly SessionEvent[]): SessionSummary[] {
  const sessions = new Map<string, SessionSummary>();
  for (const event of events) {
    const existing = sessions.get(event.session_id);
    if (!existing) {
      sessions.set(event.session_id, {
        id: event.session_id,
        status: event.type.startsWith("session.") ? event.type.replace("session.", "") : "open",
        started: event.timestamp,
        events: 1,
      });
    } else {
      existing.events++;
      if (event.type.startsWith("session.")) existing.status = event.type.replace("session.", "");
    }
  }
  return [...sessions.values()];
}

export function formatEventLine(event: SessionEvent): string {
  const ts = event.timestamp.split("T")[1]?.slice(0, 12) ?? "";
  return `[${ts}] ${event.type}`;
}
