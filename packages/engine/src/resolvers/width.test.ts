import { describe, it, expect } from "vitest";
import { makeContext } from "./test-helpers.js";
import { resolveWidth } from "./width.js";

describe("resolveWidth", () => {
  describe("dedicated ways", () => {
    it("prefers cycleway:width over width", () => {
      expect(resolveWidth(makeContext({ "cycleway:width": "2", width: "4" }, "cycle track"), "yes")).toEqual({
        value: 2,
        missing: [],
      });
      expect(resolveWidth(makeContext({ width: "3" }, "cycle path"), "no").value).toBe(3);
    });

    it("widens the type default for two-way ways", () => {
      const result = resolveWidth(makeContext({}, "shared path"), "no");
      expect(result.value).toBeCloseTo(4);
      expect(result.missing).toEqual(["width"]);
    });

    it("uses the cycleway default for cycle lanes and the footway default for shared footways", () => {
      expect(resolveWidth(makeContext({}, "cycle lane (advisory)"), "yes").value).toBe(1.8);
      expect(resolveWidth(makeContext({}, "shared footway"), "yes").value).toBe(2.5);
    });
  });

  describe("segregated paths", () => {
    it("uses cycleway:width on paths", () => {
      expect(resolveWidth(makeContext({ highway: "path", "cycleway:width": "2" }, "segregated path"), "no")).toEqual({
        value: 2,
        missing: [],
      });
    });

    it("subtracts the footway width from the total", () => {
      const ctx = makeContext({ highway: "path", width: "4", "footway:width": "1.5" }, "segregated path");
      expect(resolveWidth(ctx, "no")).toEqual({ value: 2.5, missing: ["width"] });
    });

    it("halves the total without a footway width", () => {
      expect(resolveWidth(makeContext({ highway: "path", width: "4" }, "segregated path"), "no").value).toBe(2);
    });

    it("falls back to the widened path default", () => {
      const result = resolveWidth(makeContext({ highway: "path" }, "segregated path"), "no");
      expect(result.value).toBeCloseTo(4);
      expect(result.missing).toEqual(["width"]);
    });

    it("uses width directly off paths", () => {
      expect(resolveWidth(makeContext({ highway: "cycleway", width: "3" }, "segregated path"), "no")).toEqual({
        value: 3,
        missing: [],
      });
    });
  });

  describe("shared traffic and bus lanes", () => {
    it("reads the outermost lane from width:lanes", () => {
      expect(resolveWidth(makeContext({ "width:lanes": "3|3.5" }, "shared traffic lane"), "yes").value).toBe(3.5);
    });

    it("defaults traffic lanes with a width:lanes marker", () => {
      expect(resolveWidth(makeContext({}, "shared traffic lane"), "no")).toEqual({
        value: 3.1,
        missing: ["width:lanes"],
      });
    });

    it("reads bus lanes per direction on two-way roads", () => {
      const ctx = makeContext({ "width:lanes:forward": "3|3.4" }, "shared bus lane", { side: "right" });
      expect(resolveWidth(ctx, "no").value).toBe(3.4);
    });

    it("defaults bus lanes without a marker", () => {
      expect(resolveWidth(makeContext({}, "shared bus lane"), "no")).toEqual({ value: 3.25, missing: [] });
    });
  });

  describe("shared roads", () => {
    it("uses width:effective", () => {
      expect(resolveWidth(makeContext({ "width:effective": "4.2", width: "9" }, "shared road"), "no").value).toBe(4.2);
    });

    it("multiplies the lane count without a width", () => {
      expect(resolveWidth(makeContext({ lanes: "2" }, "shared road"), "no").value).toBeCloseTo(6.2);
    });

    it("subtracts parking lanes", () => {
      const result = resolveWidth(makeContext({ width: "8", "parking:both": "lane" }, "shared road"), "no");
      expect(result.value).toBeCloseTo(3.6);
      expect(result.missing).toEqual([]);
    });

    it("uses orientation defaults and halves half-on-kerb parking", () => {
      const perpendicular = { width: "8", "parking:right": "lane", "parking:right:orientation": "perpendicular" };
      expect(resolveWidth(makeContext(perpendicular, "shared road"), "no").value).toBe(3);

      const halfOnKerb = { width: "8", "parking:right": "half_on_kerb", "parking:left": "no" };
      expect(resolveWidth(makeContext(halfOnKerb, "shared road"), "no").value).toBeCloseTo(6.9);
    });

    it("subtracts cycle lanes on both sides of two-way roads", () => {
      const ctx = makeContext({ width: "9", cycleway: "lane", "parking:both": "no" }, "shared road");
      expect(resolveWidth(ctx, "no").value).toBe(6);
    });

    it("subtracts cycle lane buffers on both edges of each lane", () => {
      const ctx = makeContext({ width: "8", "cycleway:both": "lane", "cycleway:both:buffer": "0.5" }, "shared road");
      expect(resolveWidth(ctx, "no")).toEqual({ value: 3, missing: ["parking"] });
    });

    it("caps the width without parking information", () => {
      expect(resolveWidth(makeContext({ width: "12" }, "shared road"), "no")).toEqual({
        value: 5.5,
        missing: ["parking"],
      });
      expect(resolveWidth(makeContext({ width: "12" }, "shared road"), "yes").value).toBe(4);
    });

    it("does not cap traffic lanes", () => {
      const ctx = makeContext({ width: "12", "width:lanes": "x|y" }, "shared traffic lane");
      expect(resolveWidth(ctx, "no").value).toBe(12);
    });

    it("derives the carriageway from the road class", () => {
      expect(resolveWidth(makeContext({ highway: "residential" }, "shared road"), "no")).toEqual({
        value: 5.5,
        missing: ["width", "parking"],
      });
      expect(resolveWidth(makeContext({ highway: "residential" }, "shared road"), "yes").value).toBe(3.4);
    });

    it("floors a defaulted width at the lane width", () => {
      const ctx = makeContext({ highway: "tertiary", "cycleway:both": "lane" }, "shared road");
      expect(resolveWidth(ctx, "no")).toEqual({ value: 3.1, missing: ["width", "parking"] });
    });
  });
});
