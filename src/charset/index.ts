export {
  type Charset,
  type CharsetRole,
  type CharsetName,
  DANGEROUS_CHARS,
  WORD_BOUNDARY_CHARS,
  isDangerous,
  isWordBoundary,
  findDangerous,
  findWordBoundaries,
  defineCharset,
  unionCharsets,
  assertWordSafe,
  isCharsetName,
  CHARSETS,
  UPPER,
  LOWER,
  DIGIT,
  UPPER_UNAMBIGUOUS,
  LOWER_UNAMBIGUOUS,
  DIGIT_UNAMBIGUOUS,
  SAFE_SEPARATORS,
  PARANOID_SYMBOLS,
} from "./registry.js"
