// src/logger.ts
import { inspect } from "node:util";

export type LogLevel = "debug" | "info" | "warn" | "error";
export const LOG_LEVELS: LogLevel[] = ["debug", "info", "warn", "error"];

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
};

export interface LogEntry {
  ts: number;
  level: LogLevel;
  scope?: string;
  message: string;
  meta?: Record<string, unknown>;
}

export interface Logger {
  child(scope: string): Logger;
  log(level: LogLevel, message: string, meta?: Record<string, unknown>): void;
  debug(message: string, meta?: Record<string, unknown>): void;
  info(message: string, meta?: Record<string, unknown>): void;
  warn(message: string, meta?: Record<string, unknown>): void;
  error(message: string, meta?: Record<string, unknown>): void;
  isLevelEnabled(level: LogLevel): boolean;
}

type Sink = (entry: LogEntry) => void;
type EchoWriter = (entry: LogEntry) => void;

export interface LoggerOptions {
  scope?: string;
  sink?: Sink;
  minLevel?: LogLevel;
  echo?: boolean | EchoWriter;
  clock?: () => number;
}

function isEchoSuppressed(): boolean {
  const raw = process.env.DUPINDEX_DISABLE_LOG_ECHO;
  if (!raw) return false;
  const normalized = raw.trim().toLowerCase();
  if (!normalized) return false;
  return normalized !== "0" && normalized !== "false";
}

// stdout belongs to command output; log lines go to stderr
const stderrEcho: EchoWriter = (entry) => {
  if (isEchoSuppressed()) return;
  const { level, scope, message, meta } = entry;
  const prefix =
    level === "error"
      ? "error"
      : level === "warn"
        ? "warn"
        : level === "info"
          ? "info"
          : "debug";
  const scopeText = scope ? `[${scope}] ` : "";
  if (meta) {
    console.error(`${prefix}: ${scopeText}${message}`, serializeMeta(meta));
  } else {
    console.error(`${prefix}: ${scopeText}${message}`);
  }
};

function serializeMeta(meta: Record<string, unknown>): string {
  try {
    return JSON.stringify(meta);
  } catch {
    return inspect(meta, { depth: 4 });
  }
}

export class StructuredLogger implements Logger {
  private readonly sink?: Sink;
  private readonly echo?: EchoWriter;
  private readonly minLevel: LogLevel;
  private readonly clock: () => number;
  private readonly scope?: string;

  constructor({
    scope,
    sink,
    minLevel = "info",
    echo = false,
    clock = Date.now,
  }: LoggerOptions = {}) {
    this.scope = scope;
    this.sink = sink;
    this.minLevel = minLevel;
    this.echo = echo === true ? stderrEcho : echo || undefined;
    this.clock = clock;
  }

  child(scope: string): Logger {
    return new StructuredLogger({
      scope: this.scope ? `${this.scope}.${scope}` : scope,
      sink: this.sink,
      minLevel: this.minLevel,
      echo: this.echo ?? false,
      clock: this.clock,
    });
  }

  log(level: LogLevel, message: string, meta?: Record<string, unknown>): void {
    if (!this.isLevelEnabled(level)) return;
    const entry: LogEntry = {
      ts: this.clock(),
      level,
      scope: this.scope,
      message,
      meta: meta && Object.keys(meta).length ? meta : undefined,
    };
    this.sink?.(entry);
    this.echo?.(entry);
  }

  debug(message: string, meta?: Record<string, unknown>): void {
    this.log("debug", message, meta);
  }

  info(message: string, meta?: Record<string, unknown>): void {
    this.log("info", message, meta);
  }

  warn(message: string, meta?: Record<string, unknown>): void {
    this.log("warn", message, meta);
  }

  error(message: string, meta?: Record<string, unknown>): void {
    this.log("error", message, meta);
  }

  isLevelEnabled(level: LogLevel): boolean {
    return LEVEL_ORDER[level] >= LEVEL_ORDER[this.minLevel];
  }
}

export class NullLogger implements Logger {
  child(): Logger {
    return this;
  }
  log(): void {}
  debug(): void {}
  info(): void {}
  warn(): void {}
  error(): void {}
  isLevelEnabled(_level: LogLevel): boolean {
    return false;
  }
}

export class ConsoleLogger extends StructuredLogger {
  constructor(minLevel: LogLevel = "info") {
    super({ minLevel, echo: true });
  }
}

export function isLogLevel(raw: string): raw is LogLevel {
  return LOG_LEVELS.some((lvl) => lvl === raw);
}

export function parseLogLevel(
  raw: string | undefined,
  fallback: LogLevel = "info",
): LogLevel {
  const normalized = raw?.trim().toLowerCase();
  if (!normalized) return fallback;
  if (isLogLevel(normalized)) return normalized;
  throw new Error(
    `Unknown log level "${raw}". Try one of: ${LOG_LEVELS.join(", ")}`,
  );
}

export function childOrNull(
  logger: Logger | undefined,
  scope: string,
): Logger {
  return logger ? logger.child(scope) : new NullLogger();
}
