/**
 * Event logging.
 * Purpose: structured JSONL run logs plus human-readable console echo.
 * Assumptions: one logger instance per run; writes are synchronous so events survive a crash.
 * Usage: const log = new JsonlLogger(path, { runId }); logOrchestratorEvent(log, "node.built", { node });
 */

import fs from "node:fs";
import path from "node:path";

import { createAnsiFormatter, type AnsiFormatter } from "./error-format.js";

// =============================================================================
// TYPES
// =============================================================================

export type JsonPrimitive = string | number | boolean | null;
export type JsonValue = JsonPrimitive | JsonValue[] | { [key: string]: JsonValue };
export type JsonObject = { [key: string]: JsonValue };

export type LogLevel = "debug" | "info" | "warn" | "error";

export type LogEvent = {
  type: string;
  level?: LogLevel;
  message?: string;
  payload?: JsonObject;
};

export interface EventLogger {
  log(event: LogEvent): void;
}

// =============================================================================
// LOGGERS
// =============================================================================

export class JsonlLogger implements EventLogger {
  readonly filePath: string;
  private readonly defaults: JsonObject;
  private readonly now: () => Date;

  constructor(filePath: string, defaults: JsonObject = {}, opts: { now?: () => Date } = {}) {
    this.filePath = filePath;
    this.defaults = defaults;
    this.now = opts.now ?? (() => new Date());
    fs.mkdirSync(path.dirname(filePath), { recursive: true });
  }

  log(event: LogEvent): void {
    const record: JsonObject = {
      ts: this.now().toISOString(),
      type: event.type,
      level: event.level ?? "info",
      ...this.defaults,
    };
    if (event.message !== undefined) record.message = event.message;
    if (event.payload !== undefined) record.payload = event.payload;

    fs.appendFileSync(this.filePath, `${JSON.stringify(record)}\n`, "utf8");
  }
}

export class ConsoleLogger implements EventLogger {
  private readonly write: (line: string) => void;
  private readonly style: AnsiFormatter;
  private readonly minLevel: LogLevel;

  constructor(
    opts: { write?: (line: string) => void; color?: boolean; minLevel?: LogLevel } = {},
  ) {
    this.write = opts.write ?? ((line) => process.stderr.write(`${line}\n`));
    this.style = createAnsiFormatter(opts.color ?? false);
    this.minLevel = opts.minLevel ?? "info";
  }

  log(event: LogEvent): void {
    if (!event.message) return;
    const level = event.level ?? "info";
    if (LEVEL_ORDER[level] < LEVEL_ORDER[this.minLevel]) return;

    if (level === "error") {
      this.write(this.style(`error: ${event.message}`, ["bold", "red"]));
    } else if (level === "warn") {
      this.write(this.style(`warning: ${event.message}`, ["yellow"]));
    } else if (level === "debug") {
      this.write(this.style(event.message, ["dim"]));
    } else {
      this.write(event.message);
    }
  }
}

export class FanoutLogger implements EventLogger {
  constructor(private readonly loggers: EventLogger[]) {}

  log(event: LogEvent): void {
    for (const logger of this.loggers) {
      logger.log(event);
    }
  }
}

export class MemoryLogger implements EventLogger {
  readonly events: LogEvent[] = [];

  log(event: LogEvent): void {
    this.events.push(event);
  }

  ofType(type: string): LogEvent[] {
    return this.events.filter((event) => event.type === type);
  }
}

// =============================================================================
// HELPERS
// =============================================================================

const LEVEL_ORDER: Record<LogLevel, number> = { debug: 0, info: 1, warn: 2, error: 3 };

export function logOrchestratorEvent(
  logger: EventLogger,
  type: string,
  payload?: JsonObject,
  opts: { level?: LogLevel; message?: string } = {},
): void {
  logger.log({ type, payload, level: opts.level, message: opts.message });
}
