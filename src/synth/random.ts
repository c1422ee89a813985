import { randomInt } from "node:crypto"

/**
 * Source of independent, uniformly distributed draws.
 *
 * The engine never seeds or owns a source; callers inject one.
 */
export interface RandomSource {
  /** An integer in `[0, alphabetSize)` */
  drawUniform(alphabetSize: number): number
}

/**
 * Production source backed by the platform CSPRNG. `randomInt` rejects
 * biased samples, so every value in range is equally likely.
 */
export class CryptoRandomSource implements RandomSource {
  drawUniform(alphabetSize: number): number {
    return randomInt(0, alphabetSize)
  }
}
