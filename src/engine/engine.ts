/**
 * Generation Engine
 *
 * Entry points the CLI (or any other caller) uses. The caller owns the
 * catalog and the random source and passes both in; every error except a
 * random source failure is raised before the first draw.
 *
 * @module engine/engine
 */

import { z } from "zod"
import { ConfigurationError } from "../error.js"
import type { ILogger } from "../logging/index.js"
import { type Profile, type ProfileCatalog } from "../profile/index.js"
import { type SegmentPlan, layoutMask, resolveLayout } from "../layout/index.js"
import { estimateEntropy } from "../entropy/index.js"
import { type GeneratedPassword, type RandomSource, synthesize } from "../synth/index.js"

/** Upper bound on passwords generated by one call */
export const MAX_COUNT = 1000

const LayoutValue = z.number().int().positive()

export const GenerationRequestSchema = z
  .object({
    profile: z.string().min(1).default("default"),
    length: LayoutValue.optional(),
    segments: LayoutValue.optional(),
    segmentLength: LayoutValue.optional(),
  })
  .strict()
export type GenerationRequest = z.input<typeof GenerationRequestSchema>

const LAYOUT_KEYS = new Set(["length", "segments", "segmentLength"])

export interface EngineDeps {
  catalog: ProfileCatalog
  random: RandomSource
  logger?: ILogger
}

export interface ResolvedRequest {
  profile: Profile
  plan: SegmentPlan
}

export interface ProfileSummary {
  id: string
  description: string
  exampleLayout: string
  entropyBits: number
  wordSafe: boolean
}

/**
 * Validate a request and resolve its profile and plan without drawing.
 */
export function resolveRequest(request: GenerationRequest, catalog: ProfileCatalog): ResolvedRequest {
  const parsed = GenerationRequestSchema.safeParse(request)
  if (!parsed.success) {
    const issue = parsed.error.issues[0]
    const key = String(issue?.path[0] ?? "request")
    const prefix = LAYOUT_KEYS.has(key) ? "invalid layout parameters" : "invalid generation request"
    throw new ConfigurationError({
      message: `${prefix}: ${key}: ${issue?.message ?? "invalid value"}`,
      parameters: { ...request },
    })
  }

  const { profile: name, ...layout } = parsed.data
  const profile = catalog.get(name)
  const plan = resolveLayout(layout, profile)
  return { profile, plan }
}

export function generate(request: GenerationRequest, deps: EngineDeps): GeneratedPassword {
  return generateMany(request, 1, deps)[0] ?? unreachable()
}

/**
 * Generate `count` independent passwords from one request.
 */
export function generateMany(request: GenerationRequest, count: number, deps: EngineDeps): GeneratedPassword[] {
  if (!Number.isSafeInteger(count) || count < 1 || count > MAX_COUNT) {
    throw new ConfigurationError({
      message: `count must be an integer between 1 and ${MAX_COUNT}, got ${count}`,
      parameters: { count },
    })
  }

  const { profile, plan } = resolveRequest(request, deps.catalog)
  deps.logger?.debug("resolved layout", {
    profile: profile.id,
    segments: plan.segmentCount,
    segmentLength: plan.segmentLength,
    totalLength: plan.totalLength,
  })

  const timer = deps.logger?.startTimer("generation")
  const results: GeneratedPassword[] = []
  for (let i = 0; i < count; i++) {
    results.push(synthesize(profile, plan, deps.random))
  }
  timer?.end({ count, entropyBits: results[0]?.entropyBits })
  return results
}

/**
 * Built-in and custom profiles in catalog order, each with its default
 * layout rendered as `xxxx_xxxx_...`.
 */
export function listProfiles(catalog: ProfileCatalog): ProfileSummary[] {
  return catalog.list().map((profile) => {
    const plan = resolveLayout({}, profile)
    return {
      id: profile.id,
      description: profile.description,
      exampleLayout: layoutMask(plan),
      entropyBits: estimateEntropy(profile, plan),
      wordSafe: profile.wordSafe,
    }
  })
}

function unreachable(): never {
  throw new Error("generateMany returned no passwords")
}
