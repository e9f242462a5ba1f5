export { assessSegment, assessSegments, QualityEngine, type AssessOptions, type BatchResult } from "./assess.js";
export * from "./classification/index.js";
export * from "./config/index.js";
export { ConfigError, InputValidationError } from "./errors.js";
export * from "./export/index.js";
export * from "./quality/index.js";
export * from "./resolvers/index.js";
export * from "./scoring/index.js";
export * from "./sidepath/index.js";
export * from "./split/index.js";
export * from "./stress/index.js";
export * from "./tags/index.js";
export { clamp, roundHalfEven, roundTo } from "./math.js";
