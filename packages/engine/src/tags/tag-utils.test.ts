import { describe, it, expect } from "vitest";
import { loadBaseConfig, loadProfileConfig } from "../config/index.js";
import {
  anyTagIn,
  deriveSeparation,
  firstTag,
  getAccess,
  isSeparated,
  parseMaxspeed,
  parseNumber,
  roadSide,
  sideKeys,
  splitBoth,
  splitDelimited,
  tag,
  weakestValue,
} from "./tag-utils.js";

const config = loadBaseConfig();
const leftHand = loadProfileConfig("left-hand-traffic");

describe("tag", () => {
  it("stringifies numeric values", () => {
    expect(tag({ width: 2 }, "width")).toBe("2");
  });

  it("treats blank and null values as absent", () => {
    expect(tag({ name: "  " }, "name")).toBeUndefined();
    expect(tag({ name: null }, "name")).toBeUndefined();
    expect(tag({}, "name")).toBeUndefined();
  });

  it("trims surrounding whitespace", () => {
    expect(tag({ surface: " asphalt " }, "surface")).toBe("asphalt");
  });
});

describe("splitDelimited", () => {
  it("splits, trims and drops empty entries", () => {
    expect(splitDelimited("asphalt; gravel;;sett")).toEqual(["asphalt", "gravel", "sett"]);
  });

  it("returns an empty list for missing values", () => {
    expect(splitDelimited(undefined)).toEqual([]);
  });
});

describe("parseNumber", () => {
  it("parses comma decimals and units", () => {
    expect(parseNumber("2,5 m")).toBe(2.5);
  });

  it("uses the first entry of a list", () => {
    expect(parseNumber("2;3")).toBe(2);
  });

  it("passes numbers through", () => {
    expect(parseNumber(3)).toBe(3);
  });

  it("returns undefined for unparsable values", () => {
    expect(parseNumber("narrow")).toBeUndefined();
    expect(parseNumber(null)).toBeUndefined();
    expect(parseNumber(Number.NaN)).toBeUndefined();
  });
});

describe("parseMaxspeed", () => {
  it("maps walk and unlimited speeds", () => {
    expect(parseMaxspeed({ maxspeed: "walk" })).toBe(10);
    expect(parseMaxspeed({ maxspeed: "none" })).toBe(299);
  });

  it("assumes walking speed on living streets without a limit", () => {
    expect(parseMaxspeed({ highway: "living_street" })).toBe(10);
    expect(parseMaxspeed({ highway: "living_street", maxspeed: "20" })).toBe(20);
  });

  it("converts mph to km/h", () => {
    expect(parseMaxspeed({ maxspeed: "30 mph" })).toBe(48);
  });

  it("returns undefined without a usable limit", () => {
    expect(parseMaxspeed({ highway: "residential" })).toBeUndefined();
    expect(parseMaxspeed({ maxspeed: "signals" })).toBeUndefined();
  });
});

describe("getAccess", () => {
  it("prefers the mode's own tag", () => {
    expect(getAccess({ bicycle: "yes", access: "no" }, "bicycle", config)).toBe("yes");
  });

  it("falls back through the access hierarchy", () => {
    expect(getAccess({ vehicle: "no", access: "yes" }, "bicycle", config)).toBe("no");
    expect(getAccess({ access: "private" }, "motor_vehicle", config)).toBe("private");
  });

  it("returns undefined when nothing is tagged", () => {
    expect(getAccess({}, "bicycle", config)).toBeUndefined();
  });
});

describe("splitBoth", () => {
  it("fills only missing sides from the both value", () => {
    expect(splitBoth("lane", undefined, "no")).toEqual(["lane", "no"]);
  });

  it("leaves sides alone without a both value", () => {
    expect(splitBoth(undefined, "lane", undefined)).toEqual(["lane", undefined]);
  });
});

describe("deriveSeparation", () => {
  const tags = { "separation:left": "kerb" };

  it("places motor traffic on the left in right-hand traffic", () => {
    expect(roadSide(config)).toBe("left");
    expect(deriveSeparation(tags, "motor_vehicle", config)).toBe("kerb");
    expect(deriveSeparation(tags, "foot", config)).toBeUndefined();
  });

  it("mirrors the sides in left-hand traffic", () => {
    expect(roadSide(leftHand)).toBe("right");
    expect(deriveSeparation(tags, "motor_vehicle", leftHand)).toBeUndefined();
    expect(deriveSeparation(tags, "foot", leftHand)).toBe("kerb");
  });

  it("follows explicit traffic modes", () => {
    const explicit = { "traffic_mode:right": "motor_vehicle", "separation:right": "bollard" };
    expect(deriveSeparation(explicit, "motor_vehicle", config)).toBe("bollard");
  });
});

describe("isSeparated", () => {
  it("rejects absent and negative values", () => {
    expect(isSeparated(undefined)).toBe(false);
    expect(isSeparated("no")).toBe(false);
    expect(isSeparated("none")).toBe(false);
    expect(isSeparated("flex_post")).toBe(true);
  });
});

describe("weakestValue", () => {
  it("picks the value with the lowest factor", () => {
    expect(weakestValue(["asphalt", "gravel", "sett"], config.surfaceFactors)).toBe("gravel");
  });

  it("ignores unknown values", () => {
    expect(weakestValue(["moon_dust", "asphalt"], config.surfaceFactors)).toBe("asphalt");
    expect(weakestValue(["moon_dust"], config.surfaceFactors)).toBeUndefined();
  });
});

describe("sideKeys / firstTag / anyTagIn", () => {
  it("orders keys from most to least specific", () => {
    expect(sideKeys("cycleway", "right", "width")).toEqual([
      "cycleway:right:width",
      "cycleway:both:width",
      "cycleway:width",
    ]);
    expect(sideKeys("cycleway", null)).toEqual(["cycleway:both", "cycleway"]);
  });

  it("reads the first present key", () => {
    const tags = { "cycleway:both:width": "1.6", "cycleway:width": "2" };
    expect(firstTag(tags, sideKeys("cycleway", "left", "width"))).toBe("1.6");
  });

  it("matches any key against accepted values", () => {
    expect(anyTagIn({ "cycleway:left": "track" }, sideKeys("cycleway", "left"), ["track"])).toBe(true);
    expect(anyTagIn({ "cycleway:left": "track" }, sideKeys("cycleway", "right"), ["track"])).toBe(false);
  });
});
