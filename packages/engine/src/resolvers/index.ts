export { SIDEPATH_WAY_TYPES, type ResolverContext } from "./context.js";
export { resolveOneway, isOnewayYes } from "./oneway.js";
export { resolveWidth } from "./width.js";
export { resolveSurface, resolveSmoothness } from "./surface.js";
export { resolveTrafficContext, type TrafficContext } from "./traffic-context.js";
export { resolveMandatoryUse, mandatoryFromSigns, isUsable, type MandatoryUseResult } from "./mandatory-use.js";
