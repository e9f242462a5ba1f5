import { describe, it, expect } from "vitest";
import type { SegmentAnnotations, TagRecord } from "@cqi/types";
import { loadBaseConfig } from "../config/index.js";
import { checkDeletion, classifyWayType, filterCategory } from "./way-type.js";

const config = loadBaseConfig();

// ─── Helpers ────────────────────────────────────────────────────────────────

function makeAnnotations(overrides: Partial<SegmentAnnotations> = {}): SegmentAnnotations {
  return { sidepath: null, highway: null, maxspeed: null, side: null, type: null, ...overrides };
}

function wayTypeOf(tags: TagRecord, overrides: Partial<SegmentAnnotations> = {}): string {
  const result = classifyWayType(tags, makeAnnotations(overrides), config);
  return result.dropped ? `dropped: ${result.reason}` : result.wayType;
}

const rightCycleway = { side: "right", type: "cycleway" } as const;

// ─── Deletion rules ─────────────────────────────────────────────────────────

describe("checkDeletion", () => {
  it("drops segments whose bicycle access is not allowed", () => {
    expect(checkDeletion({ highway: "residential", bicycle: "no" }, config)).toBe("no bicycle access");
    expect(checkDeletion({ highway: "residential", bicycle: "dismount" }, config)).toBe("no bicycle access");
  });

  it("inherits access restrictions through the hierarchy", () => {
    expect(checkDeletion({ highway: "residential", access: "no" }, config)).toBe("no bicycle access");
  });

  it("drops informal paths without a bicycle tag", () => {
    expect(checkDeletion({ highway: "path", informal: "yes" }, config)).toBe("informal path");
    expect(checkDeletion({ highway: "path", informal: "yes", bicycle: "yes" }, config)).toBeNull();
  });

  it("keeps ordinary roads", () => {
    expect(checkDeletion({ highway: "residential" }, config)).toBeNull();
  });
});

// ─── Cascade ────────────────────────────────────────────────────────────────

describe("classifyWayType", () => {
  it("classifies bicycle roads only on centerlines", () => {
    expect(wayTypeOf({ highway: "residential", bicycle_road: "yes" })).toBe("bicycle road");
    expect(wayTypeOf({ highway: "residential", bicycle_road: "yes" }, rightCycleway)).toBe("shared road");
  });

  it("checks links and crossings before the highway class", () => {
    expect(wayTypeOf({ highway: "footway", footway: "crossing", bicycle: "yes" })).toBe("crossing");
    expect(wayTypeOf({ highway: "cycleway", cycleway: "link" })).toBe("link");
  });

  it("requires bicycle access on footways", () => {
    expect(wayTypeOf({ highway: "footway", bicycle: "yes" })).toBe("shared footway");
    expect(wayTypeOf({ highway: "pedestrian", bicycle: "designated" })).toBe("shared footway");
    expect(wayTypeOf({ highway: "footway" })).toBe("dropped: footway without bicycle access");
  });

  it("classifies paths by foot designation and segregation", () => {
    expect(wayTypeOf({ highway: "path", foot: "designated", bicycle: "yes" })).toBe("shared footway");
    expect(wayTypeOf({ highway: "path", foot: "designated", bicycle: "designated", segregated: "yes" })).toBe(
      "segregated path",
    );
    expect(wayTypeOf({ highway: "path", segregated: "no", bicycle: "yes" })).toBe("shared path");
  });

  it("drops informal paths", () => {
    expect(wayTypeOf({ highway: "path", informal: "yes" })).toBe("dropped: informal path");
  });

  describe("cycleways", () => {
    it("with foot access are shared paths", () => {
      expect(wayTypeOf({ highway: "cycleway", foot: "yes" })).toBe("shared path");
    });

    it("without separation from pedestrians are segregated paths", () => {
      expect(wayTypeOf({ highway: "cycleway", "separation:right": "no" })).toBe("segregated path");
    });

    it("routes kerb separation to a cycle track", () => {
      expect(wayTypeOf({ highway: "cycleway", is_sidepath: "yes", "separation:left": "kerb" })).toBe("cycle track");
    });

    it("routes other separation to a protected lane", () => {
      expect(wayTypeOf({ highway: "cycleway", is_sidepath: "yes", "separation:left": "flex_post" })).toBe(
        "cycle lane (protected)",
      );
    });

    it("uses is_sidepath before the sidepath annotation", () => {
      expect(wayTypeOf({ highway: "cycleway", is_sidepath: "yes" })).toBe("cycle track");
      expect(wayTypeOf({ highway: "cycleway", is_sidepath: "no" }, { sidepath: "yes" })).toBe("cycle path");
      expect(wayTypeOf({ highway: "cycleway" }, { sidepath: "yes" })).toBe("cycle track");
      expect(wayTypeOf({ highway: "cycleway" })).toBe("cycle path");
    });
  });

  it("groups service roads and tracks", () => {
    expect(wayTypeOf({ highway: "service" })).toBe("track or service");
    expect(wayTypeOf({ highway: "track", tracktype: "grade2" })).toBe("track or service");
  });

  it("classifies centerlines by lane markings and road class", () => {
    expect(wayTypeOf({ highway: "residential" })).toBe("shared road");
    expect(wayTypeOf({ highway: "residential", lane_markings: "yes" })).toBe("shared traffic lane");
    expect(wayTypeOf({ highway: "primary" })).toBe("shared traffic lane");
  });

  describe("sub-segments", () => {
    it("distinguishes cycle lane variants", () => {
      expect(wayTypeOf({ highway: "tertiary", cycleway: "lane" }, rightCycleway)).toBe("cycle lane (advisory)");
      expect(wayTypeOf({ highway: "tertiary", "cycleway:right": "lane", "cycleway:right:lane": "exclusive" }, rightCycleway)).toBe(
        "cycle lane (exclusive)",
      );
      expect(wayTypeOf({ highway: "tertiary", cycleway: "lane", "cycleway:lanes": "no|lane|no" }, rightCycleway)).toBe(
        "cycle lane (central)",
      );
      expect(wayTypeOf({ highway: "tertiary", cycleway: "lane", "separation:left": "flex_post" }, rightCycleway)).toBe(
        "cycle lane (protected)",
      );
    });

    it("distinguishes track variants", () => {
      expect(wayTypeOf({ highway: "tertiary", "cycleway:both": "track" }, rightCycleway)).toBe("cycle track");
      expect(wayTypeOf({ highway: "tertiary", cycleway: "track", "cycleway:right:segregated": "yes" }, rightCycleway)).toBe(
        "segregated path",
      );
      expect(wayTypeOf({ highway: "tertiary", cycleway: "track", "cycleway:foot": "yes" }, rightCycleway)).toBe(
        "shared path",
      );
    });

    it("classifies bus lanes and sidewalks", () => {
      expect(wayTypeOf({ highway: "secondary", "cycleway:right": "share_busway" }, rightCycleway)).toBe(
        "shared bus lane",
      );
      expect(wayTypeOf({ highway: "residential", "sidewalk:bicycle": "yes" }, { side: "left", type: "sidewalk" })).toBe(
        "shared footway",
      );
    });

    it("only reads the tags of its own side", () => {
      expect(wayTypeOf({ highway: "residential", "cycleway:left": "lane" }, rightCycleway)).toBe("shared road");
      expect(wayTypeOf({ highway: "primary", "cycleway:left": "lane" }, rightCycleway)).toBe("shared traffic lane");
    });
  });
});

describe("filterCategory", () => {
  it("maps way types to filter groups", () => {
    expect(filterCategory("cycle lane (protected)")).toBe("separated");
    expect(filterCategory("crossing")).toBe("cycle lanes");
    expect(filterCategory("bicycle road")).toBe("bicycle road");
    expect(filterCategory("shared bus lane")).toBe("shared traffic");
  });
});
