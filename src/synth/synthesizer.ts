/**
 * Password Synthesizer
 *
 * Draws one character per random position and joins the segments with the
 * plan's separators. Given the same sequence of draws it always produces
 * the same password.
 *
 * @module synth/synthesizer
 */

import { RandomSourceError } from "../error.js"
import { type Profile, charsetAt } from "../profile/index.js"
import type { SegmentPlan } from "../layout/index.js"
import { estimateEntropy } from "../entropy/index.js"
import type { RandomSource } from "./random.js"

export interface GeneratedPassword {
  readonly text: string
  readonly entropyBits: number
  readonly profileId: string
}

export function synthesize(profile: Profile, plan: SegmentPlan, random: RandomSource): GeneratedPassword {
  const segments: string[] = []

  for (let s = 0; s < plan.segmentCount; s++) {
    let segment = ""
    for (let position = 0; position < plan.segmentLength; position++) {
      const charset = charsetAt(profile, position)
      segment += charset.chars[draw(random, charset.size)]
    }
    segments.push(segment)
  }

  let text = segments[0] ?? ""
  for (let s = 1; s < segments.length; s++) {
    text += (plan.separators[s - 1] ?? "") + segments[s]
  }

  return Object.freeze({
    text,
    entropyBits: estimateEntropy(profile, plan),
    profileId: profile.id,
  })
}

function draw(random: RandomSource, alphabetSize: number): number {
  let value: number
  try {
    value = random.drawUniform(alphabetSize)
  } catch (cause) {
    throw new RandomSourceError(
      { message: `Random source failed: ${cause instanceof Error ? cause.message : String(cause)}` },
      { cause },
    )
  }
  if (!Number.isInteger(value) || value < 0 || value >= alphabetSize) {
    throw new RandomSourceError({
      message: `Random source returned ${String(value)}, expected an integer in [0, ${alphabetSize})`,
    })
  }
  return value
}
