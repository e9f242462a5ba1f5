/**
 * Assessment service: one QualityEngine per config profile.
 *
 * Configs are loaded lazily on first use and kept for the lifetime of
 * the process; engines are stateless, so concurrent requests share them.
 */

import {
  QualityEngine,
  assessFeatureCollection,
  loadConfig,
  resolveAnnotations,
  type QualityConfig,
} from "@cqi/engine";
import type { AssessmentResult, SegmentInput } from "@cqi/types";
import type { AssessGeojsonQuery, AssessSegmentRequest } from "../models/requests.js";
import type { AssessGeojsonResponse } from "../models/responses.js";

const DEFAULT_PROFILE = "default";

export class AssessmentService {
  private readonly engines = new Map<string, QualityEngine>();

  constructor(private readonly load: (profile?: string) => QualityConfig = loadConfig) {}

  /** Engine for a profile, loading its config on first use */
  engineFor(profile?: string): QualityEngine {
    const key = profile ?? DEFAULT_PROFILE;
    let engine = this.engines.get(key);
    if (!engine) {
      const config = this.load(profile);
      console.log(`[config] Loaded ${config.name} v${config.version} for profile ${key}`);
      engine = new QualityEngine(config);
      this.engines.set(key, engine);
    }
    return engine;
  }

  loadedProfiles(): string[] {
    return [...this.engines.keys()];
  }

  assessSegment(request: AssessSegmentRequest): AssessmentResult {
    const engine = this.engineFor(request.profile);
    const derived = resolveAnnotations(request.tags, request.sidepathEvidence, engine.config);
    const segment: SegmentInput = {
      id: request.id,
      tags: request.tags,
      annotations: { ...derived, ...request.annotations },
    };
    return engine.assess(segment);
  }

  assessCollection(input: unknown, query: AssessGeojsonQuery): AssessGeojsonResponse {
    const { config } = this.engineFor(query.profile);
    const start = performance.now();
    const { collection, dropped } = assessFeatureCollection(input, config, { split: query.split });
    const elapsed = (performance.now() - start).toFixed(0);
    console.log(
      `[assess] ${collection.features.length} assessed, ${dropped.length} dropped in ${elapsed}ms (${config.name})`,
    );

    return {
      type: "FeatureCollection",
      features: collection.features,
      _meta: { config: config.name, assessed: collection.features.length, dropped },
    };
  }
}
