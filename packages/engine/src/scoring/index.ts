export {
  baseIndex,
  highwayFactor,
  maxspeedFactor,
  restrictedMotorAccess,
  surfaceFactor,
  widthFactor,
  type Scored,
} from "./factors.js";
export { bufferLevel, computeProtectionFactor, separationLevel } from "./protection-level.js";
export {
  miscFactor,
  scoreSegment,
  trafficFactor,
  widthSurfaceFactor,
  type IndexFactors,
  type Score,
} from "./index-score.js";
