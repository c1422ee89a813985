/**
 * @file Console Transport
 * @description Writes log lines to stderr. Stdout is reserved for program
 * output, so logs never end up in a piped password.
 */

import type { ITransport, IFormatter, LogEntry, LogLevel } from "../types.js"
import { LOG_LEVELS } from "../types.js"
import { PrettyFormatter } from "../formatters/pretty.js"
import { JsonFormatter } from "../formatters/json.js"

export interface ConsoleTransportOptions {
  level?: LogLevel
  format?: "json" | "pretty"
  colors?: boolean
  /** Defaults to process.stderr */
  stream?: NodeJS.WritableStream
}

export class ConsoleTransport implements ITransport {
  private formatter: IFormatter
  private minLevel: number
  private stream: NodeJS.WritableStream

  constructor(options: ConsoleTransportOptions = {}) {
    const format = options.format || (process.stderr.isTTY ? "pretty" : "json")
    this.formatter = format === "json" ? new JsonFormatter() : new PrettyFormatter({ colors: options.colors })
    this.minLevel = LOG_LEVELS[options.level || "trace"]
    this.stream = options.stream ?? process.stderr
  }

  write(entry: LogEntry): void {
    if (LOG_LEVELS[entry.level] < this.minLevel) return
    this.stream.write(this.formatter.format(entry) + "\n")
  }
}
