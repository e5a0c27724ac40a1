import { describe, expect, it } from "vitest";
import {
  cellCenter,
  createArenaLevel,
  InvalidLevelError,
  isInsideCell,
  parseLevelDefinition,
} from "../src/grid/level";
import { OCCUPANCY_FLAGS } from "../src/grid/occupancy";
import type { ArenaLevelDefinition, CellKind } from "../src/grid/types";

const baseDefinition = (layout: CellKind[][]): ArenaLevelDefinition => ({
  id: "bend",
  layout,
  populationCap: 4,
  spawnIntervalS: 2,
  deliveriesRequired: 3,
  obstacles: 1,
});

describe("createArenaLevel", () => {
  it("computes occupancy masks for every cell", () => {
    const level = createArenaLevel(
      baseDefinition([
        ["spawn", "floor"],
        ["empty", "goal"],
      ]),
    );

    const { CENTER, TOP, BOTTOM, LEFT, RIGHT, TOP_LEFT, TOP_RIGHT, BOTTOM_RIGHT } = OCCUPANCY_FLAGS;
    expect(level.neighborMasks).toEqual([
      [CENTER | RIGHT | BOTTOM_RIGHT, CENTER | LEFT | BOTTOM],
      [TOP | TOP_RIGHT | RIGHT, CENTER | TOP | TOP_LEFT],
    ]);
    expect(level.neighborMasks[0][0]).toBe(273);
  });

  it("locates the spawn and goal cells", () => {
    const level = createArenaLevel({
      ...baseDefinition([["floor", "spawn", "floor", "goal"]]),
      goalFacing: "east",
    });

    expect(level.spawnCell).toEqual({ col: 1, row: 0 });
    expect(level.goalCell).toEqual({ col: 3, row: 0 });
    expect(level.cells[0][3]).toEqual({ kind: "goal", facing: "east" });
    expect(level.columns).toBe(4);
    expect(level.rows).toBe(1);
  });

  it("defaults the goal to face south", () => {
    const level = createArenaLevel(baseDefinition([["spawn", "goal"]]));

    expect(level.cells[0][1]).toEqual({ kind: "goal", facing: "south" });
  });

  it("rejects ragged rows", () => {
    expect(() => createArenaLevel(baseDefinition([["spawn", "goal"], ["floor"]]))).toThrow(
      'Level "bend": row 1 has 1 cells, expected 2',
    );
  });

  it("rejects levels without exactly one spawn", () => {
    expect(() => createArenaLevel(baseDefinition([["floor", "goal"]]))).toThrow(InvalidLevelError);
    expect(() => createArenaLevel(baseDefinition([["spawn", "spawn", "goal"]]))).toThrow(
      "expected exactly one spawn cell, found 2",
    );
  });

  it("rejects levels without a goal", () => {
    expect(() => createArenaLevel(baseDefinition([["spawn", "floor"]]))).toThrow(
      "expected exactly one goal cell, found 0",
    );
  });

  it("rejects an empty layout", () => {
    expect(() => createArenaLevel(baseDefinition([]))).toThrow('Level "bend": layout is empty');
  });
});

describe("parseLevelDefinition", () => {
  const valid = {
    id: "parsed",
    layout: [["spawn", "floor", "goal"]],
    goalFacing: "west",
    populationCap: 2,
    spawnIntervalS: 3,
    deliveriesRequired: 1,
    obstacles: 1,
  };

  it("accepts a well-formed definition", () => {
    expect(parseLevelDefinition(valid, "fallback")).toEqual({
      ...valid,
      message: undefined,
      objective: undefined,
      maxLosses: undefined,
    });
  });

  it("rejects a definition without a layout", () => {
    const { layout: _layout, ...missing } = valid;
    expect(() => parseLevelDefinition(missing, "fallback")).toThrow(InvalidLevelError);
    expect(() => parseLevelDefinition(missing, "fallback")).toThrow(
      'Level "parsed": layout must be an array of rows',
    );
  });

  it("rejects unknown cell kinds and non-numeric tuning", () => {
    expect(() => parseLevelDefinition({ ...valid, layout: [["spawn", "lava"]] }, "fallback")).toThrow(
      'Level "parsed": unknown cell kind "lava" at (1, 0)',
    );
    expect(() => parseLevelDefinition({ ...valid, obstacles: "2" }, "fallback")).toThrow(
      'Level "parsed": obstacles must be a number',
    );
  });

  it("names the fallback id when the value is not an object", () => {
    expect(() => parseLevelDefinition([], "fallback")).toThrow('Level "fallback": definition is not an object');
  });
});

describe("cell helpers", () => {
  it("maps cells to world centers", () => {
    expect(cellCenter({ col: 2, row: 3 })).toEqual({ x: 8, y: 0, z: 12 });
  });

  it("tests containment against the cell square", () => {
    expect(isInsideCell(9.5, 12, { col: 2, row: 3 })).toBe(true);
    expect(isInsideCell(10.5, 12, { col: 2, row: 3 })).toBe(false);
  });
});
