import { type Profile, charsetAt } from "../profile/index.js"
import type { SegmentPlan } from "../layout/index.js"

/**
 * Bits of entropy of a password laid out by `plan` under `profile`.
 *
 * Sums `log2(alphabet size)` over every randomly drawn position. Separator
 * positions are fixed by the plan and add nothing.
 */
export function estimateEntropy(profile: Profile, plan: SegmentPlan): number {
  let perSegment = 0
  for (let position = 0; position < plan.segmentLength; position++) {
    perSegment += Math.log2(charsetAt(profile, position).size)
  }
  return perSegment * plan.segmentCount
}

/** Alphabet size at each position of one segment */
export function alphabetSizes(profile: Profile, plan: SegmentPlan): number[] {
  return Array.from({ length: plan.segmentLength }, (_, position) => charsetAt(profile, position).size)
}

/** Display rounding only; keep the unrounded value for any further math. */
export function roundBits(bits: number): number {
  return Math.round(bits)
}

export function bitsPerCharacter(bits: number, plan: SegmentPlan): number {
  return plan.totalLength === 0 ? 0 : bits / plan.totalLength
}
