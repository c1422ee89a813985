import { loadConfig, type ResolvedSettings } from "../config/index.js"
import { type ILogger, initLogger } from "../logging/index.js"
import type { ProfileCatalog } from "../profile/index.js"
import { CryptoRandomSource, type RandomSource } from "../synth/index.js"
import { Clipboard } from "./clipboard.js"

/**
 * Everything a command handler needs, resolved once per invocation.
 */
export interface CliContext {
  settings: ResolvedSettings
  catalog: ProfileCatalog
  random: RandomSource
  logger: ILogger
  copy: (text: string) => Promise<void>
}

/**
 * Load configuration and the logger, then run `fn`. `--log-level` reaches
 * this point through GENPASSWORD_LOG_LEVEL, set by the CLI middleware.
 */
export async function bootstrap<T>(fn: (ctx: CliContext) => Promise<T>): Promise<T> {
  const loaded = await loadConfig()
  const logger = initLogger({ level: loaded.settings.logLevel })

  logger.debug("config loaded", {
    file: loaded.file ?? null,
    searched: loaded.searched,
    profiles: loaded.catalog.names(),
  })

  return fn({
    settings: loaded.settings,
    catalog: loaded.catalog,
    random: new CryptoRandomSource(),
    logger,
    copy: Clipboard.copy,
  })
}
