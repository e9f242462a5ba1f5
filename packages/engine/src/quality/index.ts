export {
  EMPTY_NOTES,
  TAG_LIST_DELIMITER,
  appendUnique,
  mergeNotes,
  joinTagList,
  parseTagList,
  type Notes,
} from "./notes.js";
export {
  FLAGGED_MARKERS,
  incompleteness,
  summarizeQuality,
  missingFlags,
  type MissingFlags,
} from "./data-quality.js";
