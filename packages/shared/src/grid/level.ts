import type { CellCoord } from "@arena/shared-protocol";
import { CELL_SIZE } from "../constants";
import type { NavVertex } from "../navmesh/types";
import { computeOccupancyMasks } from "./occupancy";
import type { ArenaLevel, ArenaLevelDefinition, Cell, CellKind, Facing } from "./types";

const CELL_KINDS: readonly CellKind[] = [
  "empty",
  "floor",
  "spawn",
  "goal",
  "portal-in",
  "portal-out",
];

/**
 * Thrown when a level definition cannot be turned into a playable grid.
 */
export class InvalidLevelError extends Error {
  readonly levelId: string;

  constructor(levelId: string, message: string) {
    super(`Level "${levelId}": ${message}`);
    this.name = "InvalidLevelError";
    this.levelId = levelId;
  }
}

const FACINGS: readonly Facing[] = ["north", "east", "south", "west"];

function isCellKind(value: unknown): value is CellKind {
  return CELL_KINDS.some((kind) => kind === value);
}

function isFacing(value: unknown): value is Facing {
  return FACINGS.some((facing) => facing === value);
}

/**
 * Checks the shape of a level definition read from JSON.
 *
 * @param levelId - id reported in errors when the value carries none.
 */
export function parseLevelDefinition(value: unknown, levelId: string): ArenaLevelDefinition {
  if (typeof value !== "object" || value === null || Array.isArray(value)) {
    throw new InvalidLevelError(levelId, "definition is not an object");
  }
  const record: Record<string, unknown> = { ...value };
  const id = typeof record.id === "string" ? record.id : levelId;

  const requireNumber = (key: string): number => {
    const field = record[key];
    if (typeof field !== "number" || !Number.isFinite(field)) {
      throw new InvalidLevelError(id, `${key} must be a number`);
    }
    return field;
  };
  const optionalNumber = (key: string): number | undefined =>
    record[key] === undefined ? undefined : requireNumber(key);
  const optionalString = (key: string): string | undefined => {
    const field = record[key];
    if (field === undefined) {
      return undefined;
    }
    if (typeof field !== "string") {
      throw new InvalidLevelError(id, `${key} must be a string`);
    }
    return field;
  };

  const rows: unknown = record.layout;
  if (!Array.isArray(rows)) {
    throw new InvalidLevelError(id, "layout must be an array of rows");
  }
  const layout = rows.map((row: unknown, rowIndex) => {
    if (!Array.isArray(row)) {
      throw new InvalidLevelError(id, `row ${rowIndex} is not an array`);
    }
    return row.map((kind: unknown, colIndex) => {
      if (!isCellKind(kind)) {
        throw new InvalidLevelError(id, `unknown cell kind "${String(kind)}" at (${colIndex}, ${rowIndex})`);
      }
      return kind;
    });
  });

  const facing = record.goalFacing;
  let goalFacing: Facing | undefined;
  if (facing !== undefined) {
    if (!isFacing(facing)) {
      throw new InvalidLevelError(id, `unknown goal facing "${String(facing)}"`);
    }
    goalFacing = facing;
  }

  return {
    id,
    layout,
    goalFacing,
    populationCap: requireNumber("populationCap"),
    spawnIntervalS: requireNumber("spawnIntervalS"),
    message: optionalString("message"),
    objective: optionalString("objective"),
    deliveriesRequired: requireNumber("deliveriesRequired"),
    maxLosses: optionalNumber("maxLosses"),
    obstacles: requireNumber("obstacles"),
  };
}

/**
 * Builds the immutable grid model for a level definition.
 * Locates the spawn and goal cells and precomputes occupancy masks.
 */
export function createArenaLevel(definition: ArenaLevelDefinition): ArenaLevel {
  const { id, layout } = definition;
  if (layout.length === 0 || layout[0].length === 0) {
    throw new InvalidLevelError(id, "layout is empty");
  }

  const columns = layout[0].length;
  const goalFacing: Facing = definition.goalFacing ?? "south";
  const spawnCells: CellCoord[] = [];
  const goalCells: CellCoord[] = [];

  const cells: Cell[][] = layout.map((row, rowIndex) => {
    if (row.length !== columns) {
      throw new InvalidLevelError(
        id,
        `row ${rowIndex} has ${row.length} cells, expected ${columns}`,
      );
    }
    return row.map((kind, colIndex) => {
      if (!CELL_KINDS.includes(kind)) {
        throw new InvalidLevelError(id, `unknown cell kind "${kind}" at (${colIndex}, ${rowIndex})`);
      }
      if (kind === "spawn") {
        spawnCells.push({ col: colIndex, row: rowIndex });
      }
      if (kind === "goal") {
        goalCells.push({ col: colIndex, row: rowIndex });
        return { kind, facing: goalFacing };
      }
      return { kind };
    });
  });

  if (spawnCells.length !== 1) {
    throw new InvalidLevelError(id, `expected exactly one spawn cell, found ${spawnCells.length}`);
  }
  if (goalCells.length !== 1) {
    throw new InvalidLevelError(id, `expected exactly one goal cell, found ${goalCells.length}`);
  }
  if (definition.populationCap < 1) {
    throw new InvalidLevelError(id, "populationCap must be at least 1");
  }
  if (definition.deliveriesRequired < 1) {
    throw new InvalidLevelError(id, "deliveriesRequired must be at least 1");
  }

  return {
    id,
    columns,
    rows: cells.length,
    cells,
    neighborMasks: computeOccupancyMasks(cells),
    spawnCell: spawnCells[0],
    goalCell: goalCells[0],
    populationCap: definition.populationCap,
    spawnIntervalS: definition.spawnIntervalS,
    message: definition.message,
    objective: definition.objective,
    deliveriesRequired: definition.deliveriesRequired,
    maxLosses: definition.maxLosses,
    obstacles: definition.obstacles,
  };
}

/**
 * World-space center of a cell on the ground plane.
 */
export function cellCenter(cell: CellCoord): NavVertex {
  return { x: cell.col * CELL_SIZE, y: 0, z: cell.row * CELL_SIZE };
}

export function cellKey(col: number, row: number): string {
  return `${col},${row}`;
}

export function isCellInBounds(level: ArenaLevel, col: number, row: number): boolean {
  return col >= 0 && row >= 0 && col < level.columns && row < level.rows;
}

export function getCell(level: ArenaLevel, col: number, row: number): Cell | null {
  if (!isCellInBounds(level, col, row)) {
    return null;
  }
  return level.cells[row][col];
}

/**
 * True when the world position lies inside the given cell's square.
 */
export function isInsideCell(x: number, z: number, cell: CellCoord): boolean {
  const half = CELL_SIZE / 2;
  return (
    Math.abs(x - cell.col * CELL_SIZE) <= half && Math.abs(z - cell.row * CELL_SIZE) <= half
  );
}
