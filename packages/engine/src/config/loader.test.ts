import { describe, it, expect } from "vitest";
import { ConfigError } from "../errors.js";
import {
  deepFreeze,
  deepMerge,
  listProfiles,
  loadBaseConfig,
  loadConfig,
  loadProfileConfig,
  parseQualityConfig,
} from "./loader.js";

describe("deepMerge", () => {
  it("merges nested objects leaf by leaf", () => {
    const merged = deepMerge({ widths: { cycleLane: 1.5, trafficLane: 3.1 } }, { widths: { cycleLane: 1.8 } });
    expect(merged).toEqual({ widths: { cycleLane: 1.8, trafficLane: 3.1 } });
  });

  it("replaces arrays instead of concatenating", () => {
    const merged = deepMerge({ list: ["a", "b"] }, { list: ["c"] });
    expect(merged).toEqual({ list: ["c"] });
  });

  it("does not modify its inputs", () => {
    const target = { a: { b: 1 } };
    deepMerge(target, { a: { b: 2 } });
    expect(target).toEqual({ a: { b: 1 } });
  });
});

describe("deepFreeze", () => {
  it("freezes nested values", () => {
    const value = deepFreeze({ a: { b: [1, 2] } });
    expect(Object.isFrozen(value.a)).toBe(true);
    expect(Object.isFrozen(value.a.b)).toBe(true);
  });
});

describe("loadBaseConfig", () => {
  it("loads and validates the default tables", () => {
    const config = loadBaseConfig();
    expect(config.name).toBe("default");
    expect(config.rightHandTraffic).toBe(true);
    expect(config.enableProtectionFactor).toBe(false);
    expect(config.widths.trafficLane).toBe(3.1);
  });

  it("returns a frozen config", () => {
    const config = loadBaseConfig();
    expect(Object.isFrozen(config)).toBe(true);
    expect(Object.isFrozen(config.widths.highway)).toBe(true);
  });

  it("keeps maxspeed thresholds in ascending order", () => {
    const speeds = loadBaseConfig().maxspeedFactors.map((s) => s.minSpeed);
    expect(speeds).toEqual([...speeds].sort((a, b) => a - b));
  });

  it("throws ConfigError for an unknown base", () => {
    expect(() => loadBaseConfig("nonexistent")).toThrow(ConfigError);
  });
});

describe("loadProfileConfig", () => {
  it("merges profile overrides onto the base", () => {
    const config = loadProfileConfig("left-hand-traffic");
    expect(config.rightHandTraffic).toBe(false);
    expect(config.widths.trafficLane).toBe(3.1);
  });

  it("switches the protection factor on", () => {
    expect(loadProfileConfig("protection-factor").enableProtectionFactor).toBe(true);
  });

  it("throws ConfigError for an unknown profile", () => {
    expect(() => loadProfileConfig("nonexistent")).toThrow(ConfigError);
  });
});

describe("loadConfig", () => {
  it("uses the default base without a profile", () => {
    expect(loadConfig().name).toBe("default");
    expect(loadConfig("left-hand-traffic").rightHandTraffic).toBe(false);
  });
});

describe("listProfiles", () => {
  it("lists profiles sorted by file name", () => {
    const profiles = listProfiles();
    expect(profiles.map((p) => p.name)).toEqual(["left-hand-traffic", "protection-factor"]);
    expect(profiles[0]?.extends).toBe("default");
  });
});

describe("parseQualityConfig", () => {
  it("rejects documents missing tables", () => {
    expect(() => parseQualityConfig({ name: "broken" })).toThrow(ConfigError);
  });

  it("requires a path entry in the highway surface table", () => {
    const clone = structuredClone(loadBaseConfig());
    delete clone.surfaces.highway["path"];
    expect(() => parseQualityConfig(clone, "test")).toThrow(/'path' entry/);
  });

  it("sorts maxspeed thresholds given out of order", () => {
    const clone = structuredClone(loadBaseConfig());
    clone.maxspeedFactors = [
      { minSpeed: 50, factor: 0.8 },
      { minSpeed: 0, factor: 1 },
    ];
    expect(parseQualityConfig(clone).maxspeedFactors.map((s) => s.minSpeed)).toEqual([0, 50]);
  });
});
