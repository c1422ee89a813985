/**
 * Configuration Loading
 *
 * Resolves settings from, in increasing precedence:
 * 1. Defaults (built-in)
 * 2. Config file ($GENPASSWORD_CONFIG or ~/.config/genpassword/config.jsonc)
 * 3. Environment (GENPASSWORD_* variables)
 * 4. Command-line options (applied by the CLI)
 *
 * @module config/config
 */

import * as fs from 'fs/promises';
import * as os from 'os';
import * as path from 'path';
import { parse as parseJsonc, type ParseError as JsoncParseError, printParseErrorCode } from 'jsonc-parser';

import { ConfigurationError } from '../error.js';
import { type Charset, CHARSETS, defineCharset, isCharsetName } from '../charset/index.js';
import { BUILTIN_PROFILES, type Profile, ProfileCatalog, defineProfile } from '../profile/index.js';
import { isLogLevel, type LogLevel } from '../logging/index.js';
import { computeFlags, type Flags } from './flags.js';
import { type CharsetRef, type Config, type CustomProfileConfig, validateConfig } from './schema.js';

export const CONFIG_FILE_NAMES = ['config.jsonc', 'config.json'];

export interface ConfigLoadOptions {
  /** Environment to read flags from (defaults to process.env) */
  env?: NodeJS.ProcessEnv;
}

export interface ResolvedSettings {
  profile: string;
  count: number;
  copy: boolean;
  logLevel: LogLevel;
}

export interface LoadedConfig {
  /** The validated file contents, empty when no file was found */
  config: Config;
  /** File that was loaded, if any */
  file?: string;
  /** Files that were looked for */
  searched: string[];
  /** Defaults, file and environment merged */
  settings: ResolvedSettings;
  /** Built-in profiles followed by the file's custom profiles */
  catalog: ProfileCatalog;
}

export const DEFAULT_SETTINGS: ResolvedSettings = {
  profile: 'default',
  count: 1,
  copy: true,
  logLevel: 'warn',
};

// ============================================================================
// Main API
// ============================================================================

export async function loadConfig(options: ConfigLoadOptions = {}): Promise<LoadedConfig> {
  const flags = computeFlags(options.env ?? process.env);
  const explicit = flags.GENPASSWORD_CONFIG;
  const searched = explicit ? [explicit] : getConfigFileCandidates(flags);

  let config: Config = {};
  let file: string | undefined;

  for (const candidate of searched) {
    const loaded = await loadConfigFile(candidate);
    if (loaded) {
      config = loaded;
      file = candidate;
      break;
    }
  }

  if (explicit && !file) {
    throw new ConfigurationError({
      message: `Config file not found: ${explicit} (from GENPASSWORD_CONFIG)`,
      parameters: { file: explicit },
    });
  }

  return {
    config,
    file,
    searched,
    settings: resolveSettings(config, flags),
    catalog: buildCatalog(config),
  };
}

export function getGlobalConfigDir(flags: Flags): string {
  if (flags.XDG_CONFIG_HOME) {
    return path.join(flags.XDG_CONFIG_HOME, 'genpassword');
  }
  return path.join(flags.HOME || os.homedir(), '.config', 'genpassword');
}

function getConfigFileCandidates(flags: Flags): string[] {
  const dir = getGlobalConfigDir(flags);
  return CONFIG_FILE_NAMES.map(name => path.join(dir, name));
}

function resolveSettings(config: Config, flags: Flags): ResolvedSettings {
  const envLevel = flags.GENPASSWORD_LOG_LEVEL;
  return {
    profile: config.profile ?? DEFAULT_SETTINGS.profile,
    count: config.count ?? DEFAULT_SETTINGS.count,
    copy: flags.GENPASSWORD_NO_COPY ? false : (config.copy ?? DEFAULT_SETTINGS.copy),
    logLevel: envLevel && isLogLevel(envLevel) ? envLevel : (config.logLevel ?? DEFAULT_SETTINGS.logLevel),
  };
}

// ============================================================================
// File Loading
// ============================================================================

/**
 * Load and validate a single configuration file. Returns null when the
 * file does not exist.
 */
export async function loadConfigFile(filePath: string): Promise<Config | null> {
  let text: string;

  try {
    text = await fs.readFile(filePath, 'utf-8');
  } catch (error) {
    if (isErrnoException(error) && error.code === 'ENOENT') {
      return null;
    }
    throw new ConfigurationError(
      { message: `Cannot read config file ${filePath}`, parameters: { file: filePath } },
      { cause: error },
    );
  }

  return parseConfigText(text, filePath);
}

export function parseConfigText(text: string, filePath: string): Config {
  const errors: JsoncParseError[] = [];
  const data: unknown = parseJsonc(text, errors, { allowTrailingComma: true, allowEmptyContent: true });

  if (errors.length > 0) {
    throw new ConfigurationError({
      message: `Configuration error in ${filePath}: Invalid JSON:\n${formatJsoncErrors(text, errors)}`,
      parameters: { file: filePath },
    });
  }

  const validation = validateConfig(data ?? {});
  if (!validation.success) {
    const details = validation.errors.map(e => `  - ${e.path}: ${e.message}`).join('\n');
    throw new ConfigurationError({
      message: `Configuration error in ${filePath}:\n${details}`,
      parameters: { file: filePath },
    });
  }

  return validation.data;
}

function isErrnoException(error: unknown): error is NodeJS.ErrnoException {
  return error instanceof Error && 'code' in error;
}

function formatJsoncErrors(text: string, errors: JsoncParseError[]): string {
  const lines = text.split('\n');

  return errors.map(error => {
    const beforeOffset = text.substring(0, error.offset).split('\n');
    const line = beforeOffset.length;
    const column = (beforeOffset[beforeOffset.length - 1] ?? '').length + 1;
    const problemLine = lines[line - 1] || '';

    return `${printParseErrorCode(error.error)} at line ${line}, column ${column}\n   Line ${line}: ${problemLine}`;
  }).join('\n\n');
}

// ============================================================================
// Custom Profiles
// ============================================================================

/**
 * Catalog of the built-in profiles plus those declared in the config file.
 * Every custom charset and profile is validated here, once.
 */
export function buildCatalog(config: Config): ProfileCatalog {
  const custom = Object.entries(config.profiles ?? {}).map(([id, entry]) => toProfile(id, entry));
  return ProfileCatalog.create([...BUILTIN_PROFILES, ...custom]);
}

function toProfile(id: string, entry: CustomProfileConfig): Profile {
  return defineProfile({
    id,
    description: entry.description,
    pattern: entry.charsets.map(resolveCharset),
    separators: entry.separators,
    defaultSegments: entry.segments,
    defaultSegmentLength: entry.segmentLength,
    wordSafe: entry.wordSafe,
  });
}

function resolveCharset(ref: CharsetRef): Charset {
  if (typeof ref !== 'string') {
    return defineCharset('custom', ref.chars);
  }
  if (!isCharsetName(ref)) {
    throw new ConfigurationError({
      message: `Unknown charset "${ref}". Known charsets: ${Object.keys(CHARSETS).join(', ')}`,
      parameters: { charset: ref },
    });
  }
  return CHARSETS[ref];
}
