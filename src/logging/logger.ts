/**
 * Structured JSON logger.
 *
 * Each entry is one line of JSON carrying the component name and, when an
 * OpenTelemetry span is active, its traceId and spanId.
 */

import { trace } from "@opentelemetry/api";

export type LogLevel = "debug" | "info" | "warn" | "error";

const LOG_LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

export interface Logger {
  debug(message: string, extra?: Record<string, unknown>): void;
  info(message: string, extra?: Record<string, unknown>): void;
  warn(message: string, extra?: Record<string, unknown>): void;
  error(message: string, extra?: Record<string, unknown>): void;
}

export interface StructuredLoggerOptions {
  /** Minimum level to emit. Defaults to MEMKIT_LOG_LEVEL, then "info". */
  level?: LogLevel;
  /** Service name included in every line. */
  serviceName?: string;
  component?: string;
}

export function isLogLevel(value: string): value is LogLevel {
  return value in LOG_LEVEL_ORDER;
}

function levelFromEnv(): LogLevel {
  const raw = process.env.MEMKIT_LOG_LEVEL?.toLowerCase();
  return raw && isLogLevel(raw) ? raw : "info";
}

export class StructuredLogger implements Logger {
  private readonly minLevel: number;
  private readonly level: LogLevel;
  private readonly serviceName: string;
  private readonly component?: string;

  constructor(options?: StructuredLoggerOptions) {
    this.level = options?.level ?? levelFromEnv();
    this.minLevel = LOG_LEVEL_ORDER[this.level];
    this.serviceName = options?.serviceName ?? "memkit";
    this.component = options?.component;
  }

  child(component: string): StructuredLogger {
    return new StructuredLogger({
      level: this.level,
      serviceName: this.serviceName,
      component,
    });
  }

  debug(message: string, extra?: Record<string, unknown>): void {
    this.log("debug", message, extra);
  }

  info(message: string, extra?: Record<string, unknown>): void {
    this.log("info", message, extra);
  }

  warn(message: string, extra?: Record<string, unknown>): void {
    this.log("warn", message, extra);
  }

  error(message: string, extra?: Record<string, unknown>): void {
    this.log("error", message, extra);
  }

  private log(
    level: LogLevel,
    message: string,
    extra?: Record<string, unknown>,
  ): void {
    if (LOG_LEVEL_ORDER[level] < this.minLevel) return;

    const entry: Record<string, unknown> = {
      level,
      time: new Date().toISOString(),
      service: this.serviceName,
    };
    if (this.component) {
      entry.component = this.component;
    }
    entry.msg = message;

    const span = trace.getActiveSpan();
    if (span) {
      const ctx = span.spanContext();
      entry.traceId = ctx.traceId;
      entry.spanId = ctx.spanId;
    }

    if (extra) {
      Object.assign(entry, extra);
    }

    const out =
      level === "error" || level === "warn" ? process.stderr : process.stdout;
    out.write(JSON.stringify(entry) + "\n");
  }
}

export function createLogger(component: string): Logger {
  return new StructuredLogger({ component });
}

export function describeError(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
