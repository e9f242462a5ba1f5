import type { AssessmentResult } from "@cqi/types";
import { assessGeojsonQuerySchema, assessSegmentRequestSchema } from "../models/requests.js";
import type { AssessGeojsonResponse } from "../models/responses.js";
import type { AssessmentService } from "../services/assessment.service.js";

export class AssessmentController {
  constructor(private readonly service: AssessmentService) {}

  /** Assess one segment from its tags; dropped segments come back with their reason */
  public async assessSegment(body: unknown): Promise<AssessmentResult> {
    return this.service.assessSegment(assessSegmentRequestSchema.parse(body));
  }

  /** Assess every LineString of a GeoJSON FeatureCollection */
  public async assessGeojson(body: unknown, query: unknown): Promise<AssessGeojsonResponse> {
    return this.service.assessCollection(body, assessGeojsonQuerySchema.parse(query));
  }
}
