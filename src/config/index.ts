/**
 * Configuration
 *
 * Optional JSONC config file plus GENPASSWORD_* environment flags.
 *
 * @module config
 * @example
 * ```typescript
 * import { loadConfig } from './config/index.js';
 *
 * const { settings, catalog } = await loadConfig();
 * console.log(settings.profile, catalog.names());
 * ```
 */

export {
  type ConfigLoadOptions,
  type LoadedConfig,
  type ResolvedSettings,
  CONFIG_FILE_NAMES,
  DEFAULT_SETTINGS,
  loadConfig,
  loadConfigFile,
  parseConfigText,
  getGlobalConfigDir,
  buildCatalog,
} from './config.js';

export {
  type Config,
  type CustomProfileConfig,
  type CharsetRef,
  type ConfigValidationError,
  ConfigSchema,
  CharsetRefSchema,
  CustomProfileSchema,
  LogLevelSchema,
  validateConfig,
} from './schema.js';

export { type Flags, computeFlags } from './flags.js';
