#!/usr/bin/env node
import yargs from "yargs"
import { hideBin } from "yargs/helpers"
import { EOL } from "os"
import { GenerateCommand } from "./cli/cmd/generate.js"
import { ListCommand } from "./cli/cmd/list.js"
import { EntropyCommand } from "./cli/cmd/entropy.js"
import { FormatError } from "./cli/error.js"
import { UI } from "./cli/ui.js"
import { getLogger, LOG_LEVELS } from "./logging/index.js"
import { NamedError } from "./util/error.js"
import { VERSION } from "./version.js"

process.on("unhandledRejection", (e) => {
  getLogger().error("rejection", e instanceof Error ? e : new Error(String(e)))
})

const cli = yargs(hideBin(process.argv))
  .scriptName("genpassword")
  .wrap(100)
  .help("help", "show help")
  .alias("help", "h")
  .version("version", "show version number", VERSION)
  .alias("version", "v")
  .option("log-level", {
    describe: "log level (logs go to stderr)",
    type: "string",
    choices: Object.keys(LOG_LEVELS),
  })
  .middleware((opts) => {
    if (opts.logLevel) process.env.GENPASSWORD_LOG_LEVEL = opts.logLevel
  })
  .usage("$0 [command] [options]\n\nSecure password generator with double-click-friendly layouts")
  .command(GenerateCommand)
  .command(ListCommand)
  .command(EntropyCommand)
  .epilogue("Config: $GENPASSWORD_CONFIG or ~/.config/genpassword/config.jsonc")
  .fail((msg, err, parser) => {
    if (err) throw err
    UI.error(msg)
    parser.showHelp("log")
    process.exit(2)
  })
  .strict()

try {
  await cli.parse()
} catch (e) {
  const data: Record<string, unknown> = {}
  if (e instanceof NamedError) {
    Object.assign(data, e.toObject().data)
  }
  if (e instanceof Error) {
    Object.assign(data, {
      name: e.name,
      message: e.message,
      cause: e.cause instanceof Error ? e.cause.message : undefined,
      stack: e.stack,
    })
  }
  getLogger().debug("fatal", data)
  const formatted = FormatError(e)
  if (formatted) UI.error(formatted)
  if (formatted === undefined) {
    UI.error("Unexpected error, rerun with --log-level debug for details" + EOL)
    console.error(e instanceof Error ? e.message : String(e))
  }
  process.exitCode = 1
}
