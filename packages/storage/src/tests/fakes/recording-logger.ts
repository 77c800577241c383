import type { LogContext, LogContextPatch, Logger, LogMeta } from "@cloudbucket/logger"

export type LogEntry = {
  level: "trace" | "debug" | "info" | "warn" | "error" | "fatal"
  message: string
  context: LogContextPatch
  meta: Record<string, unknown>
}

/**
 * Keeps every entry in memory. Children share the parent's `entries`.
 */
export class RecordingLogger implements Logger {
  constructor(
    readonly entries: LogEntry[] = [],
    private readonly context: LogContextPatch = {},
  ) {}

  trace(message: string, meta?: LogMeta): void {
    this.record("trace", message, meta)
  }

  debug(message: string, meta?: LogMeta): void {
    this.record("debug", message, meta)
  }

  info(message: string, meta?: LogMeta): void {
    this.record("info", message, meta)
  }

  warn(message: string, meta?: LogMeta): void {
    this.record("warn", message, meta)
  }

  error(message: string, meta?: LogMeta): void {
    this.record("error", message, meta)
  }

  fatal(message: string, meta?: LogMeta): void {
    this.record("fatal", message, meta)
  }

  child<U extends LogContextPatch>(context: U): Logger<LogContext & U> {
    return new RecordingLogger(this.entries, { ...this.context, ...context })
  }

  at(level: LogEntry["level"]): LogEntry[] {
    return this.entries.filter((entry) => entry.level === level)
  }

  private record(level: LogEntry["level"], message: string, meta: LogMeta = {}): void {
    this.entries.push({ level, message, context: this.context, meta })
  }
}
