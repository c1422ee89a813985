import type { RandomSource } from "../../src/synth/index.js"

/**
 * Replays a fixed list of draws, then throws. Each value is reduced modulo
 * the requested alphabet size so one sequence works for any profile.
 */
export class SequenceRandomSource implements RandomSource {
  private index = 0
  readonly sizes: number[] = []

  constructor(private readonly values: readonly number[]) {}

  drawUniform(alphabetSize: number): number {
    const value = this.values[this.index]
    if (value === undefined) {
      throw new Error(`sequence exhausted after ${this.index} draws`)
    }
    this.index++
    this.sizes.push(alphabetSize)
    return value % alphabetSize
  }

  get draws(): number {
    return this.index
  }
}

/** Always returns the same value, unreduced */
export class ConstantRandomSource implements RandomSource {
  constructor(private readonly value: number) {}

  drawUniform(): number {
    return this.value
  }
}

/**
 * Deterministic PRNG (mulberry32) with rejection sampling, so draws are
 * uniform over any alphabet size.
 */
export class SeededRandomSource implements RandomSource {
  private state: number

  constructor(seed: number) {
    this.state = seed >>> 0
  }

  private next(): number {
    this.state = (this.state + 0x6d2b79f5) >>> 0
    let t = this.state
    t = Math.imul(t ^ (t >>> 15), t | 1)
    t ^= t + Math.imul(t ^ (t >>> 7), t | 61)
    return (t ^ (t >>> 14)) >>> 0
  }

  drawUniform(alphabetSize: number): number {
    const limit = 2 ** 32 - (2 ** 32 % alphabetSize)
    let value = this.next()
    while (value >= limit) value = this.next()
    return value % alphabetSize
  }
}
