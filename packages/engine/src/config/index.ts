export {
  qualityConfigSchema,
  profileConfigSchema,
  type QualityConfig,
  type ProfileConfig,
} from "./schema.js";
export {
  deepMerge,
  deepFreeze,
  findConfigsRoot,
  parseQualityConfig,
  loadBaseConfig,
  loadProfileConfig,
  loadConfig,
  listProfiles,
  type ProfileInfo,
} from "./loader.js";
