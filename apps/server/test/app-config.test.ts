import { describe, expect, it } from "vitest";
import { loadAppConfig } from "../src/app-config";

describe("loadAppConfig", () => {
  it("falls back to defaults", () => {
    expect(loadAppConfig({})).toEqual({ levelId: "corridor", tickRate: 20, debugPaths: false });
  });

  it("reads the level, tick rate and debug flag", () => {
    expect(
      loadAppConfig({ ARENA_LEVEL: " portals ", ARENA_TICK_RATE: "30", ARENA_DEBUG_PATHS: "TRUE" }),
    ).toEqual({ levelId: "portals", tickRate: 30, debugPaths: true });
  });

  it("ignores an unusable tick rate", () => {
    expect(loadAppConfig({ ARENA_TICK_RATE: "fast" }).tickRate).toBe(20);
    expect(loadAppConfig({ ARENA_TICK_RATE: "0" }).tickRate).toBe(20);
    expect(loadAppConfig({ ARENA_TICK_RATE: "-5" }).tickRate).toBe(20);
  });

  it("treats anything but a truthy word as off", () => {
    expect(loadAppConfig({ ARENA_DEBUG_PATHS: "1" }).debugPaths).toBe(true);
    expect(loadAppConfig({ ARENA_DEBUG_PATHS: "no" }).debugPaths).toBe(false);
  });
});
