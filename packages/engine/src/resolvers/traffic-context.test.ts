import { describe, it, expect } from "vitest";
import { loadProfileConfig } from "../config/index.js";
import { resolveTrafficContext } from "./traffic-context.js";
import { makeContext } from "./test-helpers.js";

const sidepath = { sidepath: "yes" as const, side: "right" as const };

describe("resolveTrafficContext", () => {
  it("has no neighbouring traffic on a cycle path", () => {
    expect(resolveTrafficContext(makeContext({ highway: "cycleway" }, "cycle path"))).toEqual({
      mode: { left: "no", right: "no" },
      separation: { left: "no", right: "no" },
      buffer: { left: null, right: null },
    });
  });

  it("puts motor traffic on the road side of a sidepath", () => {
    const result = resolveTrafficContext(makeContext({ highway: "cycleway" }, "cycle track", sidepath));
    expect(result.mode).toEqual({ left: "motor_vehicle", right: "foot" });
  });

  it("keeps inferred modes under left-hand traffic and moves only the plain separation", () => {
    const config = loadProfileConfig("left-hand-traffic");
    const result = resolveTrafficContext(
      makeContext({ highway: "cycleway", separation: "kerb" }, "cycle track", sidepath, config),
    );
    expect(result.mode).toEqual({ left: "motor_vehicle", right: "foot" });
    expect(result.separation).toEqual({ left: "kerb", right: "no" });
  });

  it("assigns the plain separation to the right-hand road side under left-hand traffic", () => {
    const config = loadProfileConfig("left-hand-traffic");
    const ctx = makeContext({ separation: "solid_line", "traffic_mode:right": "motor_vehicle" }, "cycle lane (advisory)", {}, config);
    expect(resolveTrafficContext(ctx).separation).toEqual({ left: "no", right: "solid_line" });
  });

  it("infers parking between a sidepath and the road", () => {
    const ctx = makeContext({ highway: "cycleway", "parking:right": "lane" }, "cycle track", sidepath);
    expect(resolveTrafficContext(ctx).mode).toEqual({ left: "parking", right: "foot" });
  });

  it("treats a central lane as motor traffic on both sides", () => {
    const ctx = makeContext({ "traffic_mode:both": "foot" }, "cycle lane (central)");
    expect(resolveTrafficContext(ctx).mode).toEqual({ left: "motor_vehicle", right: "motor_vehicle" });
  });

  it("honours tagged modes and ignores unknown ones", () => {
    expect(resolveTrafficContext(makeContext({ "traffic_mode:both": "parking" }, "cycle lane (advisory)")).mode).toEqual({
      left: "parking",
      right: "parking",
    });
    expect(resolveTrafficContext(makeContext({ "traffic_mode:right": "bogus" }, "cycle lane (advisory)")).mode).toEqual({
      left: "motor_vehicle",
      right: "foot",
    });
  });

  it("assigns un-suffixed separation and buffer to the vehicle side", () => {
    const ctx = makeContext({ separation: "solid_line", buffer: "0.5" }, "cycle lane (advisory)");
    const result = resolveTrafficContext(ctx);
    expect(result.separation).toEqual({ left: "solid_line", right: "no" });
    expect(result.buffer).toEqual({ left: 0.5, right: null });
  });

  it("lets side-suffixed separation win over the plain key", () => {
    const ctx = makeContext({ "separation:left": "kerb", "separation:right": "fence", separation: "bollard" }, "cycle lane (protected)");
    expect(resolveTrafficContext(ctx).separation).toEqual({ left: "kerb", right: "fence" });
  });

  it("drops un-suffixed tags when no side has vehicle traffic", () => {
    const ctx = makeContext({ separation: "kerb", buffer: "1" }, "shared footway");
    expect(resolveTrafficContext(ctx)).toEqual({
      mode: { left: null, right: null },
      separation: { left: "no", right: "no" },
      buffer: { left: null, right: null },
    });
  });

  it("treats a zero buffer as absent", () => {
    const ctx = makeContext({ "buffer:left": "0" }, "cycle lane (advisory)");
    expect(resolveTrafficContext(ctx).buffer).toEqual({ left: null, right: null });
  });
});
