export {
  assessFeatureCollection,
  parseFeatureCollection,
  sidepathEvidenceSchema,
  toFeatureProperties,
  type AssessedCollection,
  type FeatureProperties,
  type ParsedFeature,
} from "./geojson.js";
