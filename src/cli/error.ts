import { ConfigurationError, RandomSourceError, UnknownProfileError } from "../error.js"
import { NamedError } from "../util/error.js"

/**
 * Turn a known error into the message shown to the user. Returns undefined
 * for errors the CLI does not know how to explain.
 */
export function FormatError(input: unknown): string | undefined {
  if (UnknownProfileError.isInstance(input)) {
    return `Unknown profile "${input.data.profile}". Valid profiles: ${input.data.available.join(", ")}`
  }
  if (ConfigurationError.isInstance(input)) {
    return input.data.message
  }
  if (RandomSourceError.isInstance(input)) {
    return `${input.data.message}. No password was generated.`
  }
  if (NamedError.Unknown.isInstance(input)) {
    return input.data.message
  }
  return undefined
}
