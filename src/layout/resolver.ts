/**
 * Layout Resolver
 *
 * Turns a requested total length, segment count or segment length into a
 * concrete segment plan. When only a length is given the plan rounds up to
 * whole segments: every segment has the same width and the result is never
 * shorter than requested.
 *
 * @module layout/resolver
 */

import { ConfigurationError } from "../error.js"
import { MAX_TOTAL_LENGTH, type Profile, separatorAt, separatorWidth } from "../profile/index.js"

export interface LayoutRequest {
  length?: number
  segments?: number
  segmentLength?: number
}

export interface SegmentPlan {
  readonly segmentCount: number
  readonly segmentLength: number
  /** Realized separators between consecutive segments */
  readonly separators: readonly string[]
  readonly totalLength: number
}

export function resolveLayout(request: LayoutRequest, profile: Profile): SegmentPlan {
  validate(request)

  const { length, segments, segmentLength } = request
  const width = separatorWidth(profile)

  let count: number
  let size: number

  if (length === undefined) {
    count = segments ?? profile.defaultSegments
    size = segmentLength ?? profile.defaultSegmentLength
  } else if (segments === undefined && segmentLength === undefined) {
    size = profile.defaultSegmentLength
    count = Math.ceil((length + width) / (size + width))
  } else if (segments !== undefined && segmentLength !== undefined) {
    count = segments
    size = segmentLength
    if (count * size + (count - 1) * width !== length) conflict(request)
  } else if (segments !== undefined) {
    count = segments
    const body = length - (count - 1) * width
    if (body < count || body % count !== 0) conflict(request)
    size = body / count
  } else {
    size = segmentLength ?? profile.defaultSegmentLength
    if ((length + width) % (size + width) !== 0) conflict(request)
    count = (length + width) / (size + width)
  }

  const totalLength = count * size + (count - 1) * width
  if (totalLength > MAX_TOTAL_LENGTH) {
    throw new ConfigurationError({
      message: `invalid layout parameters: ${count} x ${size} is ${totalLength} characters, the limit is ${MAX_TOTAL_LENGTH}`,
      parameters: { ...request },
    })
  }

  const separators: string[] = []
  for (let i = 0; i < count - 1; i++) {
    const separator = separatorAt(profile, i)
    if (separator !== undefined) separators.push(separator)
  }

  return Object.freeze({
    segmentCount: count,
    segmentLength: size,
    separators: Object.freeze(separators),
    totalLength,
  })
}

function validate(request: LayoutRequest): void {
  for (const [key, value] of Object.entries(request)) {
    if (value === undefined) continue
    if (typeof value !== "number" || !Number.isSafeInteger(value) || value < 1) {
      throw new ConfigurationError({
        message: `invalid layout parameters: ${key} must be a positive integer, got ${String(value)}`,
        parameters: { ...request },
      })
    }
  }
}

function conflict(request: LayoutRequest): never {
  throw new ConfigurationError({
    message: `conflicting layout parameters: ${describeRequest(request)} cannot form equal-width segments`,
    parameters: { ...request },
  })
}

function describeRequest(request: LayoutRequest): string {
  return Object.entries(request)
    .filter(([, value]) => value !== undefined)
    .map(([key, value]) => `${key}=${String(value)}`)
    .join(", ")
}

/** Number of randomly drawn positions */
export function randomPositions(plan: SegmentPlan): number {
  return plan.segmentCount * plan.segmentLength
}

/**
 * Render a plan with `placeholder` at every random position, e.g.
 * `xxxx_xxxx_xxxx_xxxx`.
 */
export function layoutMask(plan: SegmentPlan, placeholder = "x"): string {
  const segment = placeholder.repeat(plan.segmentLength)
  let mask = segment
  for (let i = 1; i < plan.segmentCount; i++) {
    mask += (plan.separators[i - 1] ?? "") + segment
  }
  return mask
}
