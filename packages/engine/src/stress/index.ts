export { stressLevel, type StressLevel } from "./stress-level.js";
