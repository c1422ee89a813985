import { z } from "zod"
import { NamedError } from "./util/error.js"

/**
 * Invalid or conflicting layout, charset, profile or config file parameters.
 * Always a caller bug: surfaced verbatim and never retried.
 */
export const ConfigurationError = NamedError.create(
  "ConfigurationError",
  z.object({
    message: z.string(),
    parameters: z.record(z.string(), z.unknown()).optional(),
  }),
)
export type ConfigurationError = InstanceType<typeof ConfigurationError>

export const UnknownProfileError = NamedError.create(
  "UnknownProfileError",
  z.object({
    message: z.string(),
    profile: z.string(),
    available: z.array(z.string()),
  }),
)
export type UnknownProfileError = InstanceType<typeof UnknownProfileError>

/**
 * The random source threw or produced an out-of-range draw. Fatal for the
 * request in flight; no partial password is returned.
 */
export const RandomSourceError = NamedError.create(
  "RandomSourceError",
  z.object({
    message: z.string(),
  }),
)
export type RandomSourceError = InstanceType<typeof RandomSourceError>
