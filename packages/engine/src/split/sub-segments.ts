/**
 * Derive cycleway and sidewalk sub-segments from a road centerline.
 *
 * A road tagged with cycle lanes, tracks or cyclable sidewalks yields one
 * child segment per side and kind. Children inherit the road's tags with
 * the side-specific values promoted to plain keys, so the classifier and
 * resolvers read them like any standalone way. Geometry offsetting is
 * left to the caller; children only carry their offset distance.
 */

import type { Side, SegmentInput, SubSegmentType, TagRecord, TagValue } from "@cqi/types";
import type { QualityConfig } from "../config/index.js";
import { anyTagIn, firstTag, parseMaxspeed, parseNumber, sideKeys, tag } from "../tags/index.js";

const CYCLEWAY_VALUES = ["lane", "track", "share_busway"];
const SIDEWALK_BICYCLE_VALUES = ["yes", "designated", "permissive"];

/** Extra distance of a sidewalk beyond the carriageway edge */
const SIDEWALK_EXTRA_OFFSET = 2;

/** Keys every child gets from `<type>:<side>:<key>` / `<type>:both:<key>` / `<type>:<key>` */
const DERIVED_KEYS = ["width", "oneway", "oneway:bicycle", "traffic_sign"];

/** Separation and traffic context of a cycleway, copied onto cycleway children */
const CYCLEWAY_CONTEXT_KEYS = [
  "separation",
  "separation:both",
  "separation:left",
  "separation:right",
  "buffer",
  "buffer:both",
  "buffer:left",
  "buffer:right",
  "traffic_mode:both",
  "traffic_mode:left",
  "traffic_mode:right",
  "surface:colour",
];

const SIDES: readonly Side[] = ["left", "right"];
const TYPES: readonly SubSegmentType[] = ["cycleway", "sidewalk"];

/** Most specific value of `<type>:<side>:<key>`, `<type>:both:<key>`, `<type>:<key>` */
export function deriveAttribute(tags: TagRecord, key: string, type: SubSegmentType, side: Side): string | null {
  return firstTag(tags, sideKeys(type, side, key)) ?? null;
}

export function hasSubSegment(tags: TagRecord, type: SubSegmentType, side: Side): boolean {
  if (type === "cycleway") return anyTagIn(tags, sideKeys("cycleway", side), CYCLEWAY_VALUES);
  return anyTagIn(tags, sideKeys("sidewalk", side, "bicycle"), SIDEWALK_BICYCLE_VALUES);
}

/** Distance of a child from the centerline */
export function offsetDistance(tags: TagRecord, type: SubSegmentType, config: QualityConfig): number {
  if (config.offsetDistance !== "realistic") return config.offsetDistance;
  const highway = tag(tags, "highway");
  const width =
    parseNumber(tag(tags, "width")) ||
    (highway !== undefined ? config.widths.highway[highway] : undefined) ||
    config.widths.highwayFallback;
  return type === "cycleway" ? width / 2 : width / 2 + SIDEWALK_EXTRA_OFFSET;
}

function childTags(tags: TagRecord, type: SubSegmentType, side: Side): TagRecord {
  const child: Record<string, TagValue> = { ...tags };
  const derive = (key: string): void => {
    child[key] = deriveAttribute(tags, key, type, side);
  };

  for (const key of DERIVED_KEYS) derive(key);

  const ownSurface = ["surface", "smoothness"].some((key) => tag(tags, `${type}:${side}:${key}`) !== undefined);
  if (type !== "cycleway" || anyTagIn(tags, sideKeys("cycleway", side), ["track"]) || ownSurface) {
    derive("surface");
    derive("smoothness");
  }

  if (type === "cycleway") {
    for (const key of CYCLEWAY_CONTEXT_KEYS) derive(key);
  }
  return child;
}

/**
 * Children of a road segment, left before right and cycleway before
 * sidewalk on each side. Segments without side infrastructure yield none.
 */
export function deriveSubSegments(segment: SegmentInput, config: QualityConfig): SegmentInput[] {
  const { tags } = segment;
  const children: SegmentInput[] = [];

  for (const side of SIDES) {
    for (const type of TYPES) {
      if (!hasSubSegment(tags, type, side)) continue;
      children.push({
        id: `${segment.id}:${type}:${side}`,
        tags: childTags(tags, type, side),
        annotations: {
          sidepath: "yes",
          highway: tag(tags, "highway") ?? null,
          maxspeed: parseMaxspeed(tags) ?? null,
          name: tag(tags, "name") ?? null,
          side,
          type,
          offset: offsetDistance(tags, type, config),
        },
      });
    }
  }
  return children;
}

/** The segment itself followed by its children */
export function expandSegment(segment: SegmentInput, config: QualityConfig): SegmentInput[] {
  return [segment, ...deriveSubSegments(segment, config)];
}
