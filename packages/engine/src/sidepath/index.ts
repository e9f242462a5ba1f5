export {
  PATH_HIGHWAYS,
  isSidepathByEvidence,
  parentHighway,
  resolveAnnotations,
  sidepathStatus,
} from "./sidepath.js";
