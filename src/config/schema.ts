/**
 * Configuration Schema Definitions
 *
 * Zod schemas for the optional JSONC config file.
 *
 * @module config/schema
 */

import { z } from 'zod';
import { MAX_COUNT } from '../engine/index.js';

export const LogLevelSchema = z.enum(['trace', 'debug', 'info', 'warn', 'error', 'fatal']);

/** A registry name (`"LOWER_UNAMBIGUOUS"`) or literal characters (`{ "chars": "abc123" }`) */
export const CharsetRefSchema = z.union([
  z.string().min(1),
  z.object({ chars: z.string().min(1) }).strict(),
]);
export type CharsetRef = z.infer<typeof CharsetRefSchema>;

export const CustomProfileSchema = z.object({
  description: z.string().default('custom profile'),
  /** Charset per position in a segment, cycled */
  charsets: z.array(CharsetRefSchema).min(1),
  /** Empty for none, one fixed, or several to rotate */
  separators: z.array(z.string().length(1)).default([]),
  segments: z.number().int().positive().optional(),
  segmentLength: z.number().int().positive().optional(),
  wordSafe: z.boolean().default(false),
}).strict();
export type CustomProfileConfig = z.infer<typeof CustomProfileSchema>;

export const ConfigSchema = z.object({
  $schema: z.string().optional(),
  /** Profile used when no --profile/--simple/--paranoid is given */
  profile: z.string().min(1).optional(),
  /** Passwords per run */
  count: z.number().int().min(1).max(MAX_COUNT).optional(),
  /** Copy a single generated password to the clipboard */
  copy: z.boolean().optional(),
  logLevel: LogLevelSchema.optional(),
  profiles: z.record(z.string(), CustomProfileSchema).optional(),
}).strict();
export type Config = z.infer<typeof ConfigSchema>;

export interface ConfigValidationError {
  path: string;
  message: string;
}

export function validateConfig(data: unknown): {
  success: true;
  data: Config;
} | {
  success: false;
  errors: ConfigValidationError[];
} {
  const result = ConfigSchema.safeParse(data);

  if (result.success) {
    return { success: true, data: result.data };
  }

  const errors = result.error.issues.map(issue => ({
    path: issue.path.length > 0 ? issue.path.join('.') : '(root)',
    message: issue.message,
  }));

  return { success: false, errors };
}
