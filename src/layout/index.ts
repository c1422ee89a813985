export {
  type LayoutRequest,
  type SegmentPlan,
  resolveLayout,
  randomPositions,
  layoutMask,
} from "./resolver.js"
