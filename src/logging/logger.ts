/**
 * @file Core Logger
 * @description Main Logger class implementation
 */

import type { ILogger, LogLevel, LogEntry, LoggerConfig, ErrorInfo, TimerHandle } from "./types.js"
import { LOG_LEVELS } from "./types.js"
import { NamedError } from "../util/error.js"

/** Secrets that must never reach a log line */
export const DEFAULT_REDACT_PATTERNS = [
  /password["']?\s*[:=]\s*["']?[^\s"']+/gi, // password=... / "password": "..."
  /Bearer\s+[a-zA-Z0-9._-]+/gi, // Bearer tokens
]

export class Logger implements ILogger {
  private config: LoggerConfig
  private metadata: Record<string, unknown>

  constructor(config: Partial<LoggerConfig> = {}, metadata: Record<string, unknown> = {}) {
    this.config = {
      level: config.level || "warn",
      component: config.component,
      includeStacks: config.includeStacks ?? true,
      transports: config.transports || [],
      redactPatterns: config.redactPatterns || DEFAULT_REDACT_PATTERNS,
    }
    this.metadata = metadata
  }

  trace(message: string, metadata?: Record<string, unknown>): void {
    this.log("trace", message, undefined, metadata)
  }

  debug(message: string, metadata?: Record<string, unknown>): void {
    this.log("debug", message, undefined, metadata)
  }

  info(message: string, metadata?: Record<string, unknown>): void {
    this.log("info", message, undefined, metadata)
  }

  warn(message: string, metadata?: Record<string, unknown>): void {
    this.log("warn", message, undefined, metadata)
  }

  error(message: string, error?: Error, metadata?: Record<string, unknown>): void {
    this.log("error", message, error, metadata)
  }

  fatal(message: string, error?: Error, metadata?: Record<string, unknown>): void {
    this.log("fatal", message, error, metadata)
  }

  child(context: { component?: string; metadata?: Record<string, unknown> }): ILogger {
    return new Logger(
      {
        ...this.config,
        component: context.component || this.config.component,
      },
      { ...this.metadata, ...context.metadata },
    )
  }

  startTimer(label: string): TimerHandle {
    const start = Date.now()
    return {
      end: (metadata?: Record<string, unknown>) => {
        const durationMs = Date.now() - start
        this.log("debug", `${label} completed`, undefined, metadata, durationMs)
      },
      elapsed: () => Date.now() - start,
    }
  }

  isLevelEnabled(level: LogLevel): boolean {
    return LOG_LEVELS[level] >= LOG_LEVELS[this.config.level]
  }

  private log(
    level: LogLevel,
    message: string,
    error?: Error,
    metadata?: Record<string, unknown>,
    durationMs?: number,
  ): void {
    if (!this.isLevelEnabled(level)) return

    const entry: LogEntry = {
      level,
      timestamp: new Date().toISOString(),
      message: this.redactSensitive(message),
      component: this.config.component,
      metadata: this.redactObject({ ...this.metadata, ...metadata }),
      error: error ? this.formatError(error) : undefined,
      durationMs,
    }

    for (const transport of this.config.transports) {
      try {
        transport.write(entry)
      } catch (e) {
        // logging never throws
        process.stderr.write(`Transport error: ${e instanceof Error ? e.message : String(e)}\n`)
      }
    }
  }

  private formatError(error: Error): ErrorInfo {
    const info: ErrorInfo = {
      name: error.name,
      message: this.redactSensitive(error.message),
    }

    if (this.config.includeStacks && error.stack) {
      info.stack = this.redactSensitive(error.stack)
    }

    if (error instanceof NamedError) {
      info.data = error.toObject().data
    }

    if (error.cause instanceof Error) {
      info.cause = this.formatError(error.cause)
    }

    return info
  }

  private redactSensitive(text: string): string {
    let result = text
    for (const pattern of this.config.redactPatterns) {
      result = result.replace(pattern, "[REDACTED]")
    }
    return result
  }

  private redactObject(obj: Record<string, unknown>): Record<string, unknown> | undefined {
    if (Object.keys(obj).length === 0) return undefined

    const result: Record<string, unknown> = {}
    for (const [key, value] of Object.entries(obj)) {
      if (typeof value === "string") {
        result[key] = this.redactSensitive(value)
      } else if (isRecord(value)) {
        result[key] = this.redactObject(value)
      } else {
        result[key] = value
      }
    }
    return result
  }
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value)
}
