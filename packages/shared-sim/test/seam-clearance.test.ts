import { describe, expect, it } from "vitest";
import { clampToPortal, findPortalCrossing, shrinkPortal } from "../src/navmesh/seam-clearance";

const point = (x: number, z: number) => ({ x, y: 0, z });

describe("shrinkPortal", () => {
  it("insets both ends by the clearance", () => {
    expect(shrinkPortal({ left: point(0, 0), right: point(4, 0) }, 0.5, 0.45)).toEqual({
      left: point(0.5, 0),
      right: point(3.5, 0),
    });
  });

  it("stops at the ratio cap for wide clearances", () => {
    const shrunk = shrinkPortal({ left: point(0, 0), right: point(0, 2) }, 8.1, 0.45);

    expect(shrunk.left.z).toBeCloseTo(0.9, 9);
    expect(shrunk.right.z).toBeCloseTo(1.1, 9);
  });
});

describe("clampToPortal", () => {
  it("projects onto the segment and clamps to its ends", () => {
    const portal = { left: point(0, 0), right: point(4, 0) };

    expect(clampToPortal(point(1, 3), portal)).toEqual(point(1, 0));
    expect(clampToPortal(point(6, -1), portal)).toEqual(point(4, 0));
  });
});

describe("findPortalCrossing", () => {
  const portal = { left: point(2, -1), right: point(2, 1) };

  it("returns where the polyline crosses the portal", () => {
    expect(findPortalCrossing([point(0, 0), point(4, 0)], portal)).toEqual(point(2, 0));
  });

  it("returns null when the polyline passes beside the portal", () => {
    expect(findPortalCrossing([point(0, 3), point(4, 3)], portal)).toBeNull();
  });
});
