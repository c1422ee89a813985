import { ConfigurationError } from "../error.js"
import { type Charset, SAFE_SEPARATORS, assertWordSafe } from "../charset/index.js"

export interface Profile {
  readonly id: string
  readonly description: string
  /**
   * Charsets by position within a segment: position `i` draws from
   * `pattern[i % pattern.length]`.
   */
  readonly pattern: readonly Charset[]
  /**
   * Separator characters. Empty for none, one for a fixed separator, more
   * to rotate through them segment by segment.
   */
  readonly separators: readonly string[]
  readonly defaultSegments: number
  readonly defaultSegmentLength: number
  /** Double-click selects the whole password */
  readonly wordSafe: boolean
}

export interface ProfileInput {
  id: string
  description: string
  pattern: readonly Charset[]
  separators?: readonly string[]
  defaultSegments?: number
  defaultSegmentLength?: number
  wordSafe: boolean
}

export const DEFAULT_SEGMENTS = 4
export const DEFAULT_SEGMENT_LENGTH = 4

/** Upper bound on a realized password length */
export const MAX_TOTAL_LENGTH = 4096

const PROFILE_ID = /^[a-z][a-z0-9-]*$/

/**
 * Validate and freeze a profile. Runs once per profile, at catalog
 * construction.
 */
export function defineProfile(input: ProfileInput): Profile {
  const separators = [...(input.separators ?? [])]
  const defaultSegments = input.defaultSegments ?? DEFAULT_SEGMENTS
  const defaultSegmentLength = input.defaultSegmentLength ?? DEFAULT_SEGMENT_LENGTH

  if (!PROFILE_ID.test(input.id)) {
    throw new ConfigurationError({
      message: `Invalid profile id "${input.id}": use lowercase letters, digits and dashes`,
      parameters: { profile: input.id },
    })
  }

  if (input.pattern.length === 0) {
    throw new ConfigurationError({
      message: `Profile "${input.id}" has no charsets`,
      parameters: { profile: input.id },
    })
  }

  const badSeparators = separators.filter((sep) => !SAFE_SEPARATORS.chars.includes(sep))
  if (badSeparators.length > 0) {
    throw new ConfigurationError({
      message: `Profile "${input.id}" uses separators outside the safe set (${SAFE_SEPARATORS.chars.join(" ")}): ${badSeparators.join(" ")}`,
      parameters: { profile: input.id, separators: badSeparators },
    })
  }

  for (const [name, value] of [
    ["segments", defaultSegments],
    ["segmentLength", defaultSegmentLength],
  ] as const) {
    if (!Number.isSafeInteger(value) || value < 1) {
      throw new ConfigurationError({
        message: `Profile "${input.id}" has invalid default ${name}: ${value}`,
        parameters: { profile: input.id, [name]: value },
      })
    }
  }

  const width = separators.length > 0 ? 1 : 0
  const defaultLength = defaultSegments * defaultSegmentLength + (defaultSegments - 1) * width
  if (defaultLength > MAX_TOTAL_LENGTH) {
    throw new ConfigurationError({
      message: `Profile "${input.id}" has a default layout of ${defaultSegments} x ${defaultSegmentLength} (${defaultLength} characters), the limit is ${MAX_TOTAL_LENGTH}`,
      parameters: { profile: input.id, segments: defaultSegments, segmentLength: defaultSegmentLength },
    })
  }

  if (input.wordSafe) {
    assertWordSafe(input.id, input.pattern, separators)
  }

  return Object.freeze({
    id: input.id,
    description: input.description,
    pattern: Object.freeze([...input.pattern]),
    separators: Object.freeze(separators),
    defaultSegments,
    defaultSegmentLength,
    wordSafe: input.wordSafe,
  })
}

/** Width of one separator, or 0 when the profile has none */
export function separatorWidth(profile: Profile): number {
  return profile.separators.length > 0 ? 1 : 0
}

/** Separator placed between segment `index` and `index + 1` */
export function separatorAt(profile: Profile, index: number): string | undefined {
  if (profile.separators.length === 0) return undefined
  return profile.separators[index % profile.separators.length]
}

export function charsetAt(profile: Profile, position: number): Charset {
  const charset = profile.pattern[position % profile.pattern.length]
  if (!charset) {
    throw new ConfigurationError({
      message: `Profile "${profile.id}" has no charset for position ${position}`,
      parameters: { profile: profile.id, position },
    })
  }
  return charset
}
