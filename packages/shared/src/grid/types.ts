import type { CellCoord } from "@arena/shared-protocol";

export type Facing = "north" | "east" | "south" | "west";

/**
 * One tile of a level layout. Immutable once the level is loaded.
 */
export type Cell =
  | { kind: "empty" }
  | { kind: "floor" }
  | { kind: "spawn" }
  | { kind: "goal"; facing: Facing }
  | { kind: "portal-in" }
  | { kind: "portal-out" };

export type CellKind = Cell["kind"];

/**
 * JSON form of a level, as stored under packages/assets/levels.
 */
export interface ArenaLevelDefinition {
  /** Unique level identifier. */
  id: string;
  /** Rows of cell kinds, top row first. */
  layout: CellKind[][];
  /** Direction the goal faces. Defaults to south. */
  goalFacing?: Facing;
  /** Maximum number of live agents. */
  populationCap: number;
  /** Seconds between spawns once the first agent is out. */
  spawnIntervalS: number;
  /** Introductory message shown before the first spawn. */
  message?: string;
  /** Free-text objective label. */
  objective?: string;
  /** Deliveries needed to win. */
  deliveriesRequired: number;
  /** Losses tolerated before the level fails. Unlimited when absent. */
  maxLosses?: number;
  /** Obstacles the player may have on the board at once. */
  obstacles: number;
}

/**
 * Parsed level: the Grid Model plus per-level tuning.
 */
export interface ArenaLevel {
  id: string;
  columns: number;
  rows: number;
  /** cells[row][col] */
  cells: readonly (readonly Cell[])[];
  /** neighborMasks[row][col], see OCCUPANCY_FLAGS. */
  neighborMasks: readonly (readonly number[])[];
  spawnCell: CellCoord;
  goalCell: CellCoord;
  populationCap: number;
  spawnIntervalS: number;
  message?: string;
  objective?: string;
  deliveriesRequired: number;
  maxLosses?: number;
  obstacles: number;
}
