import type { Argv } from "yargs"
import type { GenerationRequest } from "../../engine/index.js"

/** --simple / --paranoid / --profile, at most one of them */
export function withProfileOptions<T>(yargs: Argv<T>) {
  return yargs
    .option("simple", {
      alias: "s",
      describe: "lowercase + digits, no ambiguous characters (easy to dictate)",
      type: "boolean",
    })
    .option("paranoid", {
      alias: "p",
      describe: "rotating . - ^ : separators (max symbols, breaks double-click)",
      type: "boolean",
    })
    .option("profile", {
      describe: "profile name (default, simple, paranoid or one from the config file)",
      type: "string",
    })
    .conflicts("simple", ["paranoid", "profile"])
    .conflicts("paranoid", "profile")
}

export function withLayoutOptions<T>(yargs: Argv<T>) {
  return yargs
    .option("length", {
      alias: "l",
      describe: "total length; rounds up to whole segments",
      type: "number",
    })
    .option("segments", {
      describe: "number of segments (default: 4)",
      type: "number",
    })
    .option("segment-length", {
      describe: "characters per segment (default: 4)",
      type: "number",
    })
}

export interface RequestArgs {
  simple?: boolean
  paranoid?: boolean
  profile?: string
  length?: number
  segments?: number
  segmentLength?: number
}

/**
 * Map parsed options onto an engine request. Options left unset stay
 * unset so the layout resolver can derive them.
 */
export function toRequest(args: RequestArgs, fallbackProfile: string): GenerationRequest {
  const profile = args.simple ? "simple" : args.paranoid ? "paranoid" : (args.profile ?? fallbackProfile)
  return {
    profile,
    length: args.length,
    segments: args.segments,
    segmentLength: args.segmentLength,
  }
}
