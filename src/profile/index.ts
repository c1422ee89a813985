export {
  type Profile,
  type ProfileInput,
  DEFAULT_SEGMENTS,
  DEFAULT_SEGMENT_LENGTH,
  MAX_TOTAL_LENGTH,
  defineProfile,
  separatorWidth,
  separatorAt,
  charsetAt,
} from "./profile.js"

export {
  ProfileCatalog,
  BUILTIN_PROFILES,
  DEFAULT_PROFILE,
  SIMPLE_PROFILE,
  PARANOID_PROFILE,
} from "./catalog.js"
