import type { MandatoryUse, ProcessedOneway } from "@cqi/types";
import { ACCESS_RESTRICTABLE_WAY_TYPES } from "@cqi/types";
import type { QualityConfig } from "../config/index.js";
import { splitDelimited, tag } from "../tags/index.js";
import type { ResolverContext } from "./context.js";
import { isOnewayYes } from "./oneway.js";

export interface MandatoryUseResult {
  mandatory: MandatoryUse | null;
  trafficSign: string | null;
}

const LANE_VALUES = ["lane", "share_busway"];

/** Road with a parallel cycle lane or track: cyclists are expected to use it */
function sidepathObligation(ctx: ResolverContext, oneway: ProcessedOneway): MandatoryUse | null {
  const { tags } = ctx;
  const onRoad = (values: readonly string[]): boolean => {
    const matches = (key: string): boolean => {
      const value = tag(tags, key);
      return value !== undefined && values.includes(value);
    };
    return matches("cycleway") || matches("cycleway:both") || (isOnewayYes(oneway) && matches("cycleway:right"));
  };

  let mandatory: MandatoryUse | null = null;
  if (onRoad(LANE_VALUES)) mandatory = "use_sidepath";
  else if (onRoad(["track"])) mandatory = "optional_sidepath";

  const bicycle = tag(tags, "bicycle");
  if (bicycle === "use_sidepath" || bicycle === "optional_sidepath") mandatory = bicycle;
  return mandatory;
}

/**
 * Scan traffic signs for a mandatory-use sign.
 * Every sign is checked in tag order and the last match wins; within one
 * sign, a mandatory code overrides an exemption.
 */
export function mandatoryFromSigns(trafficSign: string, config: QualityConfig): MandatoryUse | null {
  const { mandatory, notMandatory } = config.trafficSigns;
  let result: MandatoryUse | null = null;
  for (const sign of splitDelimited(trafficSign.replace(/,/g, ";"))) {
    if (notMandatory.some((code) => sign.includes(code))) result = "no";
    if (mandatory.some((code) => sign.includes(code))) result = "yes";
  }
  return result;
}

/** Informational only: whether cycling here is compulsory, optional or forbidden */
export function resolveMandatoryUse(ctx: ResolverContext, oneway: ProcessedOneway): MandatoryUseResult {
  const { tags, wayType, annotations, config } = ctx;
  const trafficSign = tag(tags, "traffic_sign") ?? null;

  let mandatory: MandatoryUse | null = null;
  if (ACCESS_RESTRICTABLE_WAY_TYPES.includes(wayType)) {
    mandatory = sidepathObligation(ctx, oneway);
  } else if (annotations.sidepath === "yes" && trafficSign) {
    mandatory = mandatoryFromSigns(trafficSign, config);
  }

  const highway = tag(tags, "highway");
  if ((highway !== undefined && config.cyclingProhibitedHighways.includes(highway)) || tag(tags, "bicycle") === "no") {
    mandatory = "prohibited";
  }
  return { mandatory, trafficSign };
}

/** Segments cyclists may not (or should not) ride are filtered out of routing */
export function isUsable(mandatory: MandatoryUse | null): 0 | 1 {
  return mandatory === "prohibited" || mandatory === "use_sidepath" ? 0 : 1;
}
