export { deriveAttribute, deriveSubSegments, expandSegment, hasSubSegment, offsetDistance } from "./sub-segments.js";
