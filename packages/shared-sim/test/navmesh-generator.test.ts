import { describe, expect, it } from "vitest";
import type { ArenaLevel, CellCoord, NavSurface } from "@arena/shared";
import { NavLayerId } from "@arena/shared";
import { buildNavSurface, DegenerateTopologyError, findUnsupportedCorners } from "../src/navmesh/navmesh-generator";
import { levelFromRows } from "./test-levels";

const polygonCountsOf = (surface: NavSurface): number[] =>
  surface.layers.map((layer) => layer.polygons.length);

const polygonCounts = (level: ArenaLevel, excluded: CellCoord[] = []): number[] =>
  polygonCountsOf(buildNavSurface(level, excluded));

describe("buildNavSurface", () => {
  it("pulls corridor corners one unit away from the walls", () => {
    const surface = buildNavSurface(levelFromRows(["S#G"]));
    const floor = surface.layers[NavLayerId.Floor];

    expect(floor.vertices.map((v) => [v.x, v.z])).toEqual([
      [-1, -1],
      [2, -1],
      [6, -1],
      [9, -1],
      [-1, 1],
      [2, 1],
      [6, 1],
      [9, 1],
    ]);
    expect(floor.bounds).toEqual({ minX: -1, maxX: 9, minZ: -1, maxZ: 1 });
  });

  it("winds quads counter-clockwise and links shared edges", () => {
    const floor = buildNavSurface(levelFromRows(["S#G"])).layers[NavLayerId.Floor];

    expect(floor.polygons).toEqual([
      { id: 0, vertexIndices: [1, 5, 4, 0], neighbors: [1, -1, -1, -1], cell: { col: 0, row: 0 } },
      { id: 1, vertexIndices: [2, 6, 5, 1], neighbors: [2, -1, 0, -1], cell: { col: 1, row: 0 } },
      { id: 2, vertexIndices: [3, 7, 6, 2], neighbors: [-1, -1, 1, -1], cell: { col: 2, row: 0 } },
    ]);
  });

  it("replaces layers without cells by a placeholder far outside the arena", () => {
    const surface = buildNavSurface(levelFromRows(["S#G"]));
    const portalIn = surface.layers[NavLayerId.PortalIn];

    expect(portalIn.placeholder).toBe(true);
    expect(portalIn.polygons).toHaveLength(1);
    expect(portalIn.vertices[0]).toEqual({ x: -150, y: 0, z: -150 });
    expect(surface.layers[NavLayerId.PortalOut].placeholder).toBe(true);
    expect(surface.stitches).toEqual([]);
  });

  it("moves portal cells to their own layer and stitches coinciding vertices", () => {
    const surface = buildNavSurface(levelFromRows(["SIG"]));
    const portalIn = surface.layers[NavLayerId.PortalIn];

    expect(polygonCountsOf(surface)).toEqual([2, 1, 1]);
    expect(portalIn.placeholder).toBe(false);
    expect(portalIn.polygons[0].vertexIndices).toEqual([1, 3, 2, 0]);
    expect(surface.stitches).toEqual([
      { layer: NavLayerId.PortalIn, vertex: 0, floorVertex: 1 },
      { layer: NavLayerId.PortalIn, vertex: 1, floorVertex: 2 },
      { layer: NavLayerId.PortalIn, vertex: 2, floorVertex: 5 },
      { layer: NavLayerId.PortalIn, vertex: 3, floorVertex: 6 },
    ]);
  });

  it("strips vertices no polygon touches", () => {
    const floor = buildNavSurface(levelFromRows(["S#", ".G"])).layers[NavLayerId.Floor];

    expect(floor.vertices).toHaveLength(8);
    expect(floor.vertices.map((v) => [v.x, v.z])).not.toContainEqual([-2, 6]);
  });

  it("leaves excluded cells out of the floor layer", () => {
    const level = levelFromRows(["S#G"]);
    const surface = buildNavSurface(level, [{ col: 1, row: 0 }]);
    const floor = surface.layers[NavLayerId.Floor];

    expect(floor.polygons.map((polygon) => polygon.cell)).toEqual([
      { col: 0, row: 0 },
      { col: 2, row: 0 },
    ]);
    expect(floor.polygons.map((polygon) => polygon.neighbors)).toEqual([
      [-1, -1, -1, -1],
      [-1, -1, -1, -1],
    ]);
  });

  it("is idempotent for the same grid and exclusion set", () => {
    const level = levelFromRows(["S##", "#I#", "##G"]);
    const excluded = [{ col: 2, row: 0 }];

    expect(buildNavSurface(level, excluded)).toEqual(buildNavSurface(level, excluded));
  });

  it("returns to the original topology once exclusions are lifted", () => {
    const level = levelFromRows(["S###", "####", "###G"]);
    const original = polygonCounts(level);

    expect(polygonCounts(level, [{ col: 1, row: 1 }, { col: 2, row: 1 }])).toEqual([10, 1, 1]);
    expect(polygonCounts(level, [{ col: 2, row: 1 }])).toEqual([11, 1, 1]);
    expect(polygonCounts(level)).toEqual(original);
    expect(buildNavSurface(level)).toEqual(buildNavSurface(level, []));
  });

  it("fails on diagonal-only contacts every time", () => {
    const level = levelFromRows(["S.", ".G"]);

    for (let attempt = 0; attempt < 2; attempt++) {
      let caught: unknown = null;
      try {
        buildNavSurface(level);
      } catch (error) {
        caught = error;
      }
      expect(caught).toBeInstanceOf(DegenerateTopologyError);
      if (caught instanceof DegenerateTopologyError) {
        expect(caught.corner).toEqual({ x: 1, y: 1 });
        expect(caught.cell).toEqual({ col: 1, row: 1 });
      }
    }
  });
});

describe("findUnsupportedCorners", () => {
  it("reports the anti-diagonal pattern", () => {
    expect(findUnsupportedCorners(levelFromRows([".S", "G."]))).toEqual([
      { corner: { x: 1, y: 1 }, cell: { col: 1, row: 1 } },
    ]);
  });

  it("accepts levels the builder can represent", () => {
    expect(findUnsupportedCorners(levelFromRows(["S#", ".G"]))).toEqual([]);
  });
});
