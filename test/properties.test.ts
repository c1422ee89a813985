import { describe, it, expect } from "vitest"
import {
  BUILTIN_PROFILES,
  ProfileCatalog,
  WORD_BOUNDARY_CHARS,
  charsetAt,
  estimateEntropy,
  findDangerous,
  generateMany,
  randomPositions,
  resolveLayout,
  type Profile,
} from "../src/index.js"
import { SeededRandomSource } from "./fixture/random.js"

const catalog = ProfileCatalog.builtin()

/** Split the way double-click selection would */
function selectableUnits(text: string): string[] {
  const units: string[] = []
  let current = ""
  for (const char of text) {
    if (WORD_BOUNDARY_CHARS.has(char)) {
      if (current) units.push(current)
      current = ""
    } else {
      current += char
    }
  }
  if (current) units.push(current)
  return units
}

function sample(profile: Profile, seed: number, count = 200) {
  return generateMany({ profile: profile.id }, count, { catalog, random: new SeededRandomSource(seed) })
}

describe("generated passwords", () => {
  it.each(BUILTIN_PROFILES.map((p) => [p.id, p] as const))("%s never contains a dangerous character", (_, profile) => {
    for (const password of sample(profile, 11)) {
      expect(findDangerous(password.text)).toEqual([])
    }
  })

  it("word-safe profiles select as a single unit", () => {
    for (const profile of BUILTIN_PROFILES.filter((p) => p.wordSafe)) {
      for (const password of sample(profile, 12)) {
        expect(selectableUnits(password.text)).toEqual([password.text])
      }
    }
  })

  it("paranoid passwords select one segment at a time", () => {
    const paranoid = catalog.get("paranoid")
    for (const password of sample(paranoid, 13, 50)) {
      const units = selectableUnits(password.text)
      expect(units).toHaveLength(4)
      for (const unit of units) expect(unit).toHaveLength(4)
    }
  })
})

describe("entropy", () => {
  const layouts = [{}, { segments: 5 }, { length: 30 }, { segments: 3, segmentLength: 7 }, { length: 64 }]

  it("equals positions times log2 of the alphabet", () => {
    for (const profile of BUILTIN_PROFILES) {
      for (const layout of layouts) {
        const plan = resolveLayout(layout, profile)
        const alphabet = charsetAt(profile, 0).size
        expect(estimateEntropy(profile, plan)).toBeCloseTo(randomPositions(plan) * Math.log2(alphabet), 9)
      }
    }
  })
})

describe("layout resolution", () => {
  it("is idempotent", () => {
    for (const profile of BUILTIN_PROFILES) {
      for (let length = 8; length <= 256; length += 7) {
        expect(resolveLayout({ length }, profile)).toEqual(resolveLayout({ length }, profile))
      }
    }
  })

  it("realizes the planned length", () => {
    for (const profile of BUILTIN_PROFILES) {
      for (const length of [8, 19, 30, 100, 256]) {
        const plan = resolveLayout({ length }, profile)
        const [password] = generateMany({ profile: profile.id, length }, 1, { catalog, random: new SeededRandomSource(length) })
        expect(password?.text).toHaveLength(plan.totalLength)
      }
    }
  })
})
