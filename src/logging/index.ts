/**
 * @file Logging Module
 * @description Main exports for the structured logging system
 */

export type { LogLevel, LogEntry, ErrorInfo, LoggerConfig, ILogger, ITransport, IFormatter, TimerHandle } from "./types.js"

export { LOG_LEVELS, isLogLevel } from "./types.js"

export { Logger, DEFAULT_REDACT_PATTERNS } from "./logger.js"

export { initLogger, getLogger, createLogger, type LoggerOptions } from "./logger-factory.js"

export { JsonFormatter, PrettyFormatter } from "./formatters/index.js"

export { ConsoleTransport, type ConsoleTransportOptions } from "./transports/index.js"
