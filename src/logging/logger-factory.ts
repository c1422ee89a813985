/**
 * @file Logger Factory
 * @description Factory functions for creating configured loggers
 */

import { Logger } from "./logger.js"
import { ConsoleTransport } from "./transports/console.js"
import { type ILogger, type LogLevel, type ITransport, isLogLevel } from "./types.js"

/** Global logger instance */
let globalLogger: ILogger | null = null

/** Logger registry by component */
const loggerRegistry = new Map<string, ILogger>()

/**
 * Get the default log level from environment
 */
function getDefaultLevel(): LogLevel {
  const envLevel = process.env.GENPASSWORD_LOG_LEVEL?.toLowerCase()
  if (envLevel && isLogLevel(envLevel)) {
    return envLevel
  }
  return "warn"
}

export interface LoggerOptions {
  level?: LogLevel
  component?: string
  format?: "json" | "pretty"
  /** Replace the console transport, e.g. to capture entries in tests */
  transports?: ITransport[]
}

function buildLogger(options: LoggerOptions): ILogger {
  const level = options.level || getDefaultLevel()
  const transports = options.transports ?? [new ConsoleTransport({ level, format: options.format })]
  return new Logger({
    level,
    component: options.component,
    includeStacks: level === "trace" || level === "debug",
    transports,
  })
}

/**
 * Initialize the global logger
 */
export function initLogger(options: LoggerOptions = {}): ILogger {
  loggerRegistry.clear()
  globalLogger = buildLogger({ ...options, component: options.component || "genpassword" })
  return globalLogger
}

/**
 * Get the global logger, or a cached child of it for `component`
 */
export function getLogger(component?: string): ILogger {
  if (!globalLogger) {
    globalLogger = initLogger()
  }

  if (!component) {
    return globalLogger
  }

  let logger = loggerRegistry.get(component)
  if (!logger) {
    logger = globalLogger.child({ component })
    loggerRegistry.set(component, logger)
  }

  return logger
}

/**
 * Create a standalone logger (not connected to global)
 */
export function createLogger(options: LoggerOptions = {}): ILogger {
  return buildLogger(options)
}
