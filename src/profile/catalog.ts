/**
 * Profile Catalog
 *
 * Named, validated profiles. A catalog is built once and handed to the
 * engine by reference; nothing looks profiles up through global state.
 *
 * @module profile/catalog
 */

import { ConfigurationError, UnknownProfileError } from "../error.js"
import {
  DIGIT,
  DIGIT_UNAMBIGUOUS,
  LOWER,
  LOWER_UNAMBIGUOUS,
  PARANOID_SYMBOLS,
  UPPER,
  unionCharsets,
} from "../charset/index.js"
import { type Profile, defineProfile } from "./profile.js"

const MIXED = unionCharsets("custom", UPPER, LOWER, DIGIT)
const DICTATION = unionCharsets("custom", LOWER_UNAMBIGUOUS, DIGIT_UNAMBIGUOUS)

/** Mixed case and digits, `_` separators. Kp4x_Tm9n_Bc2w_Qf7v */
export const DEFAULT_PROFILE = defineProfile({
  id: "default",
  description: "readable + strong: mixed case and digits, underscore separators, double-click friendly",
  pattern: [MIXED],
  separators: ["_"],
  wordSafe: true,
})

/** Unambiguous lowercase and digits, no shift key. hn4k_xp2m_b7qf_9dtc */
export const SIMPLE_PROFILE = defineProfile({
  id: "simple",
  description: "easy to dictate: lowercase and digits without 0, 1, i, l, o",
  pattern: [DICTATION],
  separators: ["_"],
  wordSafe: true,
})

/**
 * Separators rotate through `. - ^ :` for sites that reject `_` as a
 * symbol. Double-click selects a single segment.
 */
export const PARANOID_PROFILE = defineProfile({
  id: "paranoid",
  description: "max symbols: rotating . - ^ : separators (breaks double-click selection)",
  pattern: [MIXED],
  separators: PARANOID_SYMBOLS.chars,
  wordSafe: false,
})

export const BUILTIN_PROFILES: readonly Profile[] = Object.freeze([
  DEFAULT_PROFILE,
  SIMPLE_PROFILE,
  PARANOID_PROFILE,
])

export class ProfileCatalog {
  private readonly profiles: ReadonlyMap<string, Profile>

  private constructor(profiles: readonly Profile[]) {
    const map = new Map<string, Profile>()
    for (const profile of profiles) {
      if (map.has(profile.id)) {
        throw new ConfigurationError({
          message: `Duplicate profile id "${profile.id}"`,
          parameters: { profile: profile.id },
        })
      }
      map.set(profile.id, profile)
    }
    this.profiles = map
    Object.freeze(this)
  }

  /** Catalog of the built-in profiles only */
  static builtin(): ProfileCatalog {
    return new ProfileCatalog(BUILTIN_PROFILES)
  }

  /**
   * Catalog of the given profiles, in order. Pass `BUILTIN_PROFILES` first
   * to extend rather than replace the built-ins.
   */
  static create(profiles: readonly Profile[]): ProfileCatalog {
    return new ProfileCatalog(profiles)
  }

  get(name: string): Profile {
    const profile = this.profiles.get(name)
    if (!profile) {
      const available = this.names()
      throw new UnknownProfileError({
        message: `Unknown profile "${name}". Available profiles: ${available.join(", ")}`,
        profile: name,
        available,
      })
    }
    return profile
  }

  has(name: string): boolean {
    return this.profiles.has(name)
  }

  names(): string[] {
    return Array.from(this.profiles.keys())
  }

  list(): Profile[] {
    return Array.from(this.profiles.values())
  }

  get size(): number {
    return this.profiles.size
  }
}
