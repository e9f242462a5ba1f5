/**
 * Level of traffic stress (LTS), a 1-4 rating independent of the index.
 *
 * Based on way type, speed limit, width and road class. Shared ways
 * with restricted motor access count as quiet.
 */

import type { Factors, ProcessedAttributes, TagRecord, WayType } from "@cqi/types";
import { tag } from "../tags/index.js";

export type StressLevel = NonNullable<Factors["stress_level"]>;

const QUIET_HIGHWAYS = ["residential", "living_street"];
const LOW_STRESS_HIGHWAYS = ["tertiary", "tertiary_link", "unclassified", "road", "residential", "living_street"];

export function stressLevel(
  wayType: WayType,
  attributes: ProcessedAttributes,
  tags: TagRecord,
  restrictedAccess: string | null,
): StressLevel {
  const speed = attributes.proc_maxspeed ?? 0;
  const width = attributes.proc_width ?? 0;
  const highway = attributes.proc_highway ?? "";
  const atMost = (limit: number): boolean => speed > 0 && speed <= limit;

  switch (wayType) {
    case "cycle path":
    case "cycle track":
    case "segregated path":
    case "cycle lane (protected)":
      return 1;

    case "shared path":
    case "shared footway": {
      const twoWay = attributes.proc_oneway !== "yes" && attributes.proc_oneway !== "-1";
      return twoWay && width > 0 && width < 3 && speed > 30 ? 3 : 1;
    }

    case "cycle lane (advisory)":
    case "cycle lane (central)":
    case "shared bus lane":
    case "link":
    case "crossing":
      if (atMost(10)) return 1;
      if (atMost(30)) return 2;
      return width >= 1.5 ? 3 : 4;

    case "cycle lane (exclusive)":
      if (atMost(10)) return 1;
      return atMost(50) && width >= 1.85 ? 2 : 3;

    case "bicycle road":
    case "shared road":
    case "shared traffic lane": {
      if (wayType === "bicycle road" && restrictedAccess !== null) return 1;
      const priorityRoad = tag(tags, "priority_road");
      if (atMost(10) && QUIET_HIGHWAYS.includes(highway) && (!priorityRoad || priorityRoad === "no")) return 1;
      if (atMost(30) && LOW_STRESS_HIGHWAYS.includes(highway)) return 2;
      return 4;
    }

    case "track or service":
      return atMost(10) ? 1 : 2;
  }
}
