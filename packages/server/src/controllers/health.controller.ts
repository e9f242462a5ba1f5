import type { HealthResponse } from "../models/responses.js";
import type { AssessmentService } from "../services/assessment.service.js";

export class HealthController {
  constructor(private readonly service: AssessmentService) {}

  /** Health check with the profiles loaded so far */
  public async getHealth(): Promise<HealthResponse> {
    return {
      status: "ok",
      uptime: process.uptime(),
      engines: this.service.loadedProfiles(),
    };
  }
}
