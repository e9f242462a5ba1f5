export { classifyWayType, checkDeletion, filterCategory, type Classification } from "./way-type.js";
