/**
 * Charset Registry
 *
 * Role alphabets and the predicates that keep them safe. Every charset is
 * checked once, when it is defined: anything drawn from it later is safe
 * without a per-character check.
 *
 * @module charset/registry
 */

import { ConfigurationError } from "../error.js"

export type CharsetRole = "upper" | "lower" | "digit" | "separator" | "symbol" | "custom"

export interface Charset {
  readonly role: CharsetRole
  /** Ordered, deduplicated characters */
  readonly chars: readonly string[]
  readonly size: number
}

/**
 * Characters with special meaning in shells, URLs, SQL or config syntax.
 */
export const DANGEROUS_CHARS: ReadonlySet<string> = new Set([
  "#", "'", '"', "`", "$", "\\", "!", "&", "%", ";", "<", ">",
  "(", ")", "{", "}", "[", "]", "*", "?", "|",
  " ", "\t", "\r", "\n",
])

/**
 * Characters at which double-click selection stops in common text widgets.
 */
export const WORD_BOUNDARY_CHARS: ReadonlySet<string> = new Set([
  "-", ".", ",", ":", ";", "!", "@", "#", "$", "%", "^", "&", "*", "(", ")", " ",
])

export function isDangerous(char: string): boolean {
  return DANGEROUS_CHARS.has(char)
}

export function isWordBoundary(char: string): boolean {
  return WORD_BOUNDARY_CHARS.has(char)
}

/** Distinct dangerous characters of `text`, in order of first appearance */
export function findDangerous(text: string): string[] {
  return distinct(Array.from(text).filter(isDangerous))
}

export function findWordBoundaries(text: string): string[] {
  return distinct(Array.from(text).filter(isWordBoundary))
}

function isPrintableAscii(char: string): boolean {
  const code = char.codePointAt(0)
  return char.length === 1 && code !== undefined && code >= 0x21 && code <= 0x7e
}

function distinct(chars: string[]): string[] {
  return Array.from(new Set(chars))
}

/**
 * Build a validated, frozen charset.
 *
 * Fails with `ConfigurationError` when the set is empty, holds a character
 * outside printable ASCII, or holds a dangerous character.
 */
export function defineCharset(role: CharsetRole, source: string | readonly string[]): Charset {
  const chars = distinct(typeof source === "string" ? Array.from(source) : [...source])

  if (chars.length === 0) {
    throw new ConfigurationError({
      message: `Charset for role "${role}" is empty`,
      parameters: { role },
    })
  }

  const unprintable = chars.filter((char) => !isPrintableAscii(char))
  if (unprintable.length > 0) {
    throw new ConfigurationError({
      message: `Charset for role "${role}" contains non-printable or non-ASCII characters`,
      parameters: { role, characters: unprintable },
    })
  }

  const dangerous = chars.filter(isDangerous)
  if (dangerous.length > 0) {
    throw new ConfigurationError({
      message: `Charset for role "${role}" contains dangerous characters: ${dangerous.join(" ")}`,
      parameters: { role, characters: dangerous },
    })
  }

  return Object.freeze({
    role,
    chars: Object.freeze(chars),
    size: chars.length,
  })
}

/**
 * Merge charsets in order, dropping repeated characters.
 */
export function unionCharsets(role: CharsetRole, ...charsets: Charset[]): Charset {
  return defineCharset(
    role,
    charsets.flatMap((charset) => charset.chars),
  )
}

/**
 * Fail unless neither the charsets nor the separators hold a character that
 * would stop double-click selection.
 */
export function assertWordSafe(
  profileId: string,
  charsets: readonly Charset[],
  separators: readonly string[],
): void {
  const offending = distinct([
    ...charsets.flatMap((charset) => charset.chars.filter(isWordBoundary)),
    ...separators.filter(isWordBoundary),
  ])
  if (offending.length > 0) {
    throw new ConfigurationError({
      message: `Profile "${profileId}" claims to be word-safe but uses word-boundary characters: ${offending.join(" ")}`,
      parameters: { profile: profileId, characters: offending },
    })
  }
}

// ============================================================================
// Base alphabets
// ============================================================================

export const UPPER = defineCharset("upper", "ABCDEFGHIJKLMNOPQRSTUVWXYZ")
export const LOWER = defineCharset("lower", "abcdefghijklmnopqrstuvwxyz")
export const DIGIT = defineCharset("digit", "0123456789")

// No 0/O, 1/I/l, and no i/o which read as 1/0 in many fonts
export const UPPER_UNAMBIGUOUS = defineCharset("upper", "ABCDEFGHJKLMNPQRSTUVWXYZ")
export const LOWER_UNAMBIGUOUS = defineCharset("lower", "abcdefghjkmnpqrstuvwxyz")
export const DIGIT_UNAMBIGUOUS = defineCharset("digit", "23456789")

export const SAFE_SEPARATORS = defineCharset("separator", "_-.^:,=+")
export const PARANOID_SYMBOLS = defineCharset("symbol", ".-^:")

export const CHARSETS = {
  UPPER,
  LOWER,
  DIGIT,
  UPPER_UNAMBIGUOUS,
  LOWER_UNAMBIGUOUS,
  DIGIT_UNAMBIGUOUS,
  SAFE_SEPARATORS,
  PARANOID_SYMBOLS,
} as const satisfies Record<string, Charset>

export type CharsetName = keyof typeof CHARSETS

export function isCharsetName(name: string): name is CharsetName {
  return Object.prototype.hasOwnProperty.call(CHARSETS, name)
}
