import type { OnewayValue, ProcessedOneway, Resolved, TagRecord } from "@cqi/types";
import { CYCLEWAY_WAY_TYPES, ONEWAY_VALUES, isCycleLane } from "@cqi/types";
import { tag } from "../tags/index.js";
import type { ResolverContext } from "./context.js";

function onewayValue(value: string | undefined): OnewayValue | undefined {
  return ONEWAY_VALUES.find((v) => v === value);
}

/** Any form of `yes`, including `yes_motor_vehicles` */
export function isOnewayYes(oneway: ProcessedOneway): boolean {
  return oneway.includes("yes");
}

function cyclewayDefault({ tags, annotations, wayType, config }: ResolverContext): OnewayValue | undefined {
  if (
    (wayType === "cycle track" || wayType === "shared path" || wayType === "shared footway") &&
    annotations.side
  ) {
    return config.oneway.cycleTrack;
  }
  if (isCycleLane(wayType)) return config.oneway.cycleLane;
  return onewayValue(tag(tags, "oneway:bicycle"));
}

/** Roads shared with motor traffic: contraflow cycling turns `yes` into `yes_motor_vehicles` */
function sharedOneway(tags: TagRecord): ProcessedOneway {
  const oneway = tag(tags, "oneway");
  const onewayBicycle = tag(tags, "oneway:bicycle");
  const valid = onewayValue(oneway);

  if (!onewayBicycle || oneway === onewayBicycle) return valid ?? "no";
  if (onewayBicycle === "no") return valid ? `${valid}_motor_vehicles` : "no";
  return "yes";
}

/** Direction of travel for bicycles on this segment */
export function resolveOneway(ctx: ResolverContext): Resolved<ProcessedOneway> {
  const { tags, wayType } = ctx;

  if (CYCLEWAY_WAY_TYPES.includes(wayType)) {
    const value =
      onewayValue(tag(tags, "oneway")) ?? onewayValue(tag(tags, "cycleway:oneway")) ?? cyclewayDefault(ctx) ?? "no";
    return { value, missing: [] };
  }
  if (wayType === "shared bus lane") return { value: "yes", missing: [] };
  return { value: sharedOneway(tags), missing: [] };
}
