export { estimateEntropy, alphabetSizes, roundBits, bitsPerCharacter } from "./estimator.js"
export {
  type EntropyReport,
  DEFAULT_GUESS_RATE,
  describeEntropy,
  formatMagnitude,
  formatCrackTime,
} from "./analysis.js"
