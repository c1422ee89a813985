export {
  type GenerationRequest,
  type EngineDeps,
  type ResolvedRequest,
  type ProfileSummary,
  GenerationRequestSchema,
  MAX_COUNT,
  resolveRequest,
  generate,
  generateMany,
  listProfiles,
} from "./engine.js"
