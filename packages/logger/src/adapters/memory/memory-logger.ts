import type { LogContext, LogContextPatch, LogMeta } from "../../ports/log-context"
import { type LogLevelName, logLevelNames } from "../../ports/log-level"
import type { Logger } from "../../ports/logger"

export type MemoryLogEntry = {
  level: LogLevelName
  message: string

  /** Bound context merged with per-call meta. */
  fields: Record<string, unknown>
}

export type MemoryLoggerOptions = {
  /** Default: `trace`. */
  level?: LogLevelName
}

/**
 * Keeps entries in an array shared with every child. Meant for tests and for
 * inspecting what a component logged.
 */
export class MemoryLogger<TContext extends LogContext = LogContext> implements Logger<TContext> {
  private readonly minLevel: number

  constructor(
    options: MemoryLoggerOptions = {},
    readonly entries: MemoryLogEntry[] = [],
    private readonly bound: Readonly<Record<string, unknown>> = {},
  ) {
    this.minLevel = logLevelNames.indexOf(options.level ?? "trace")
  }

  trace(message: string, meta?: LogMeta<TContext>): void {
    this.record("trace", message, meta)
  }

  debug(message: string, meta?: LogMeta<TContext>): void {
    this.record("debug", message, meta)
  }

  info(message: string, meta?: LogMeta<TContext>): void {
    this.record("info", message, meta)
  }

  warn(message: string, meta?: LogMeta<TContext>): void {
    this.record("warn", message, meta)
  }

  error(message: string, meta?: LogMeta<TContext>): void {
    this.record("error", message, meta)
  }

  fatal(message: string, meta?: LogMeta<TContext>): void {
    this.record("fatal", message, meta)
  }

  child<U extends LogContextPatch>(context: U): Logger<TContext & U> {
    return new MemoryLogger<TContext & U>(
      { level: logLevelNames[this.minLevel] ?? "trace" },
      this.entries,
      { ...this.bound, ...context },
    )
  }

  /** Entries logged at `level`, oldest first. */
  at(level: LogLevelName): MemoryLogEntry[] {
    return this.entries.filter((entry) => entry.level === level)
  }

  clear(): void {
    this.entries.length = 0
  }

  private record(level: LogLevelName, message: string, meta?: LogMeta<TContext>): void {
    if (logLevelNames.indexOf(level) < this.minLevel) return

    this.entries.push({ level, message, fields: { ...this.bound, ...meta } })
  }
}

export function createMemoryLogger<TContext extends LogContext = LogContext>(
  options?: MemoryLoggerOptions,
): MemoryLogger<TContext> {
  return new MemoryLogger<TContext>(options)
}
