import { describe, it, expect } from "vitest"
import { layoutMask, randomPositions, resolveLayout } from "./resolver.js"
import {
  BUILTIN_PROFILES,
  DEFAULT_PROFILE,
  PARANOID_PROFILE,
  SIMPLE_PROFILE,
  MAX_TOTAL_LENGTH,
  defineProfile,
} from "../profile/index.js"
import { LOWER } from "../charset/index.js"
import { ConfigurationError } from "../error.js"

const SOLID = defineProfile({ id: "solid", description: "", pattern: [LOWER], wordSafe: true })

describe("resolveLayout", () => {
  describe("defaults", () => {
    it("should use the profile's four segments of four", () => {
      const plan = resolveLayout({}, DEFAULT_PROFILE)
      expect(plan).toEqual({
        segmentCount: 4,
        segmentLength: 4,
        separators: ["_", "_", "_"],
        totalLength: 19,
      })
    })

    it("should fill in the segment length for an explicit count", () => {
      const plan = resolveLayout({ segments: 5 }, SIMPLE_PROFILE)
      expect(plan.segmentCount).toBe(5)
      expect(plan.segmentLength).toBe(4)
      expect(plan.totalLength).toBe(24)
    })

    it("should fill in the count for an explicit segment length", () => {
      const plan = resolveLayout({ segmentLength: 6 }, DEFAULT_PROFILE)
      expect(plan.segmentCount).toBe(4)
      expect(plan.totalLength).toBe(27)
    })
  })

  describe("length only", () => {
    it("should resolve 19 to four segments of four", () => {
      const plan = resolveLayout({ length: 19 }, DEFAULT_PROFILE)
      expect(plan.segmentCount).toBe(4)
      expect(plan.segmentLength).toBe(4)
      expect(plan.totalLength).toBe(19)
    })

    it("should round 30 up to whole segments", () => {
      const plan = resolveLayout({ length: 30 }, PARANOID_PROFILE)
      expect(plan.segmentCount).toBe(7)
      expect(plan.totalLength).toBe(34)
      expect(plan.separators).toEqual([".", "-", "^", ":", ".", "-"])
    })

    it("should give a single segment for tiny lengths", () => {
      const plan = resolveLayout({ length: 1 }, DEFAULT_PROFILE)
      expect(plan.segmentCount).toBe(1)
      expect(plan.separators).toEqual([])
      expect(plan.totalLength).toBe(4)
    })

    it("should count no separator width when the profile has none", () => {
      const plan = resolveLayout({ length: 10 }, SOLID)
      expect(plan.segmentCount).toBe(3)
      expect(plan.totalLength).toBe(12)
      expect(plan.separators).toEqual([])
    })

    it("should stay within one segment of the requested length", () => {
      for (const profile of [...BUILTIN_PROFILES, SOLID]) {
        const step = profile.defaultSegmentLength + (profile.separators.length > 0 ? 1 : 0)
        for (let length = 8; length <= 256; length++) {
          const plan = resolveLayout({ length }, profile)
          expect(plan.totalLength).toBeGreaterThanOrEqual(length)
          expect(plan.totalLength).toBeLessThan(length + step)
        }
      }
    })
  })

  describe("combined parameters", () => {
    it("should accept a length that matches segments and segment length", () => {
      const plan = resolveLayout({ length: 19, segments: 4, segmentLength: 4 }, DEFAULT_PROFILE)
      expect(plan.totalLength).toBe(19)
    })

    it("should reject inconsistent segments, segment length and length", () => {
      expect(() => resolveLayout({ length: 50, segments: 3, segmentLength: 4 }, DEFAULT_PROFILE)).toThrow(
        "conflicting layout parameters: length=50, segments=3, segmentLength=4 cannot form equal-width segments",
      )
    })

    it("should derive the segment length from length and segments", () => {
      const plan = resolveLayout({ length: 23, segments: 4 }, DEFAULT_PROFILE)
      expect(plan.segmentLength).toBe(5)
    })

    it("should reject a length that does not split into equal segments", () => {
      expect(() => resolveLayout({ length: 20, segments: 4 }, DEFAULT_PROFILE)).toThrow(ConfigurationError)
    })

    it("should reject a length too short for the segment count", () => {
      expect(() => resolveLayout({ length: 4, segments: 4 }, DEFAULT_PROFILE)).toThrow(
        "conflicting layout parameters",
      )
    })

    it("should derive the count from length and segment length", () => {
      const plan = resolveLayout({ length: 20, segmentLength: 6 }, DEFAULT_PROFILE)
      expect(plan.segmentCount).toBe(3)
    })

    it("should reject a length that is not whole segments of the given length", () => {
      expect(() => resolveLayout({ length: 21, segmentLength: 6 }, DEFAULT_PROFILE)).toThrow(
        "conflicting layout parameters: length=21, segmentLength=6",
      )
    })
  })

  describe("validation", () => {
    it.each([
      [{ length: 0 }, "length must be a positive integer, got 0"],
      [{ segments: -2 }, "segments must be a positive integer, got -2"],
      [{ segmentLength: 2.5 }, "segmentLength must be a positive integer, got 2.5"],
      [{ length: Number.NaN }, "length must be a positive integer, got NaN"],
    ])("should reject %o", (request, message) => {
      expect(() => resolveLayout(request, DEFAULT_PROFILE)).toThrow(`invalid layout parameters: ${message}`)
    })

    it("should reject plans over the length limit", () => {
      expect(() => resolveLayout({ length: MAX_TOTAL_LENGTH + 1 }, DEFAULT_PROFILE)).toThrow(
        `the limit is ${MAX_TOTAL_LENGTH}`,
      )
    })
  })

  it("should return identical plans for identical requests", () => {
    const request = { length: 42 }
    expect(resolveLayout(request, PARANOID_PROFILE)).toEqual(resolveLayout(request, PARANOID_PROFILE))
  })

  it("should freeze the plan", () => {
    const plan = resolveLayout({}, DEFAULT_PROFILE)
    expect(Object.isFrozen(plan)).toBe(true)
    expect(Object.isFrozen(plan.separators)).toBe(true)
  })
})

describe("layoutMask", () => {
  it("should render placeholders and separators", () => {
    expect(layoutMask(resolveLayout({}, DEFAULT_PROFILE))).toBe("xxxx_xxxx_xxxx_xxxx")
    expect(layoutMask(resolveLayout({ segments: 3 }, PARANOID_PROFILE), "?")).toBe("????.????-????")
  })

  it("should count random positions", () => {
    expect(randomPositions(resolveLayout({ segments: 5 }, SIMPLE_PROFILE))).toBe(20)
  })
})
