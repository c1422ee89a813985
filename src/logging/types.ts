/**
 * @file Logging Types
 * @description Type definitions for the structured logging system
 */

/** Log severity levels */
export type LogLevel = "trace" | "debug" | "info" | "warn" | "error" | "fatal"

/** Numeric priority for log levels (higher = more severe) */
export const LOG_LEVELS: Record<LogLevel, number> = {
  trace: 10,
  debug: 20,
  info: 30,
  warn: 40,
  error: 50,
  fatal: 60,
}

export function isLogLevel(value: string): value is LogLevel {
  return Object.prototype.hasOwnProperty.call(LOG_LEVELS, value)
}

/**
 * A single log entry
 */
export interface LogEntry {
  level: LogLevel

  /** ISO timestamp */
  timestamp: string

  message: string

  /** Component/module that produced this log */
  component?: string

  /** Additional structured data */
  metadata?: Record<string, unknown>

  /** Error information if this is an error log */
  error?: ErrorInfo

  /** Duration in ms (for timed operations) */
  durationMs?: number
}

/**
 * Structured error information
 */
export interface ErrorInfo {
  name: string
  message: string
  stack?: string
  /** Structured data of a named error */
  data?: unknown
  cause?: ErrorInfo
}

export interface LoggerConfig {
  /** Minimum level to log */
  level: LogLevel

  component?: string

  /** Include stack traces in error logs */
  includeStacks: boolean

  transports: ITransport[]

  /** Patterns to redact from messages and string metadata */
  redactPatterns: RegExp[]
}

export interface ILogger {
  trace(message: string, metadata?: Record<string, unknown>): void
  debug(message: string, metadata?: Record<string, unknown>): void
  info(message: string, metadata?: Record<string, unknown>): void
  warn(message: string, metadata?: Record<string, unknown>): void
  error(message: string, error?: Error, metadata?: Record<string, unknown>): void
  fatal(message: string, error?: Error, metadata?: Record<string, unknown>): void

  /** Create a child logger with additional context */
  child(context: { component?: string; metadata?: Record<string, unknown> }): ILogger

  /** Start a timer that logs duration on end */
  startTimer(label: string): TimerHandle

  isLevelEnabled(level: LogLevel): boolean
}

export interface ITransport {
  write(entry: LogEntry): void
}

export interface IFormatter {
  format(entry: LogEntry): string
}

export interface TimerHandle {
  /** End the timer and log the duration */
  end(metadata?: Record<string, unknown>): void

  /** Elapsed milliseconds, without logging */
  elapsed(): number
}
