import { listProfiles, type QualityConfig } from "@cqi/engine";
import { configDefaultsQuerySchema } from "../models/requests.js";
import type { ProfileListItem } from "../models/responses.js";
import type { AssessmentService } from "../services/assessment.service.js";

export class ConfigController {
  constructor(private readonly service: AssessmentService) {}

  /** The ConfigTables in effect for the base config, or a named profile */
  public async getDefaults(query: unknown): Promise<QualityConfig> {
    const { profile } = configDefaultsQuerySchema.parse(query);
    return this.service.engineFor(profile).config;
  }

  /** List all available config profiles */
  public async getProfiles(): Promise<ProfileListItem[]> {
    return listProfiles();
  }
}
