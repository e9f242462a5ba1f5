export {
  tag,
  splitDelimited,
  parseNumber,
  parseMaxspeed,
  WALKING_SPEED,
  UNLIMITED_SPEED,
  getAccess,
  splitBoth,
  roadSide,
  oppositeSide,
  deriveSeparation,
  isSeparated,
  weakestValue,
  anyTagIn,
  sideKeys,
  firstTag,
} from "./tag-utils.js";
