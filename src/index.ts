/**
 * genpassword - secure passwords built from equal-width segments
 *
 * ## Architecture Overview
 *
 * - **Charsets**: immutable character sets, shell-dangerous characters rejected
 * - **Profiles**: segment pattern, separators and default layout
 * - **Layout**: length / segments / segment length resolved into one plan
 * - **Entropy**: bits from alphabet sizes, never from observed output
 * - **Synthesizer**: one uniform draw per random position
 * - **Engine**: request validation and batch generation
 *
 * @example
 * ```typescript
 * import { generate, ProfileCatalog, CryptoRandomSource } from "genpassword";
 *
 * const password = generate(
 *   { profile: "simple", segments: 5 },
 *   { catalog: ProfileCatalog.builtin(), random: new CryptoRandomSource() },
 * );
 * console.log(password.text, password.entropyBits);
 * ```
 *
 * @packageDocumentation
 */

export * from "./charset/index.js";
export * from "./profile/index.js";
export * from "./layout/index.js";
export * from "./entropy/index.js";
export * from "./synth/index.js";
export * from "./engine/index.js";

export { ConfigurationError, UnknownProfileError, RandomSourceError } from "./error.js";
export { NamedError } from "./util/error.js";

// Configuration - optional JSONC file with custom profiles
export * as Config from "./config/index.js";

export { VERSION } from "./version.js";
