/**
 * Entropy breakdown for display: combinations, bits per character and the
 * time an exhaustive search would take at a given guess rate.
 *
 * Magnitudes are carried as base-10 logarithms so layouts far beyond
 * 2^1024 combinations still format.
 */

import type { Profile } from "../profile/index.js"
import { type SegmentPlan, layoutMask, randomPositions } from "../layout/index.js"
import { alphabetSizes, bitsPerCharacter, estimateEntropy } from "./estimator.js"

/** Guesses per second assumed when none is given */
export const DEFAULT_GUESS_RATE = 1e9

const SECONDS_PER_YEAR = 31_557_600

const DURATION_UNITS: ReadonlyArray<readonly [string, number]> = [
  ["years", SECONDS_PER_YEAR],
  ["days", 86_400],
  ["hours", 3_600],
  ["minutes", 60],
  ["seconds", 1],
]

export interface EntropyReport {
  profileId: string
  layout: string
  totalLength: number
  positions: number
  alphabetSizes: number[]
  bits: number
  bitsPerChar: number
  log10Combinations: number
  guessRate: number
  /** log10 of the seconds needed to try every combination */
  log10CrackSeconds: number
}

export function describeEntropy(
  profile: Profile,
  plan: SegmentPlan,
  guessRate: number = DEFAULT_GUESS_RATE,
): EntropyReport {
  const bits = estimateEntropy(profile, plan)
  const log10Combinations = bits * Math.LOG10E * Math.LN2
  return {
    profileId: profile.id,
    layout: layoutMask(plan),
    totalLength: plan.totalLength,
    positions: randomPositions(plan),
    alphabetSizes: alphabetSizes(profile, plan),
    bits,
    bitsPerChar: bitsPerCharacter(bits, plan),
    log10Combinations,
    guessRate,
    log10CrackSeconds: log10Combinations - Math.log10(guessRate),
  }
}

/**
 * Format `10^log10` the way people read large counts: grouped digits below
 * a million, scientific notation above.
 */
export function formatMagnitude(log10: number): string {
  if (log10 < 6) {
    return Math.round(Math.pow(10, log10)).toLocaleString("en-US")
  }
  let exponent = Math.floor(log10)
  let mantissa = Math.pow(10, log10 - exponent)
  if (Number(mantissa.toFixed(2)) >= 10) {
    mantissa /= 10
    exponent += 1
  }
  return `${mantissa.toFixed(2)} × 10^${exponent}`
}

export function formatCrackTime(log10Seconds: number): string {
  for (const [unit, seconds] of DURATION_UNITS) {
    const log10Unit = Math.log10(seconds)
    if (log10Seconds >= log10Unit) {
      return `${formatMagnitude(log10Seconds - log10Unit)} ${unit}`
    }
  }
  return "less than a second"
}
