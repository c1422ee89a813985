export { type RandomSource, CryptoRandomSource } from "./random.js"
export { type GeneratedPassword, synthesize } from "./synthesizer.js"
