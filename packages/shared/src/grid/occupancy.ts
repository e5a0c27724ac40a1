import type { Cell } from "./types";

/**
 * Occupancy mask bits. A bit is set when that cell (relative to the masked
 * cell) is not empty. Cells outside the grid count as empty.
 */
export const OCCUPANCY_FLAGS = {
  CENTER: 1 << 0,
  TOP: 1 << 1,
  BOTTOM: 1 << 2,
  LEFT: 1 << 3,
  RIGHT: 1 << 4,
  TOP_LEFT: 1 << 5,
  TOP_RIGHT: 1 << 6,
  BOTTOM_LEFT: 1 << 7,
  BOTTOM_RIGHT: 1 << 8,
} as const;

const NEIGHBOR_OFFSETS: readonly { flag: number; dCol: number; dRow: number }[] = [
  { flag: OCCUPANCY_FLAGS.CENTER, dCol: 0, dRow: 0 },
  { flag: OCCUPANCY_FLAGS.TOP, dCol: 0, dRow: -1 },
  { flag: OCCUPANCY_FLAGS.BOTTOM, dCol: 0, dRow: 1 },
  { flag: OCCUPANCY_FLAGS.LEFT, dCol: -1, dRow: 0 },
  { flag: OCCUPANCY_FLAGS.RIGHT, dCol: 1, dRow: 0 },
  { flag: OCCUPANCY_FLAGS.TOP_LEFT, dCol: -1, dRow: -1 },
  { flag: OCCUPANCY_FLAGS.TOP_RIGHT, dCol: 1, dRow: -1 },
  { flag: OCCUPANCY_FLAGS.BOTTOM_LEFT, dCol: -1, dRow: 1 },
  { flag: OCCUPANCY_FLAGS.BOTTOM_RIGHT, dCol: 1, dRow: 1 },
];

const isOccupied = (cells: readonly (readonly Cell[])[], col: number, row: number): boolean => {
  const cell = cells[row]?.[col];
  return cell !== undefined && cell.kind !== "empty";
};

/**
 * Computes the 9-bit occupancy mask of a single cell.
 */
export function computeOccupancyMask(
  cells: readonly (readonly Cell[])[],
  col: number,
  row: number,
): number {
  let mask = 0;
  for (const { flag, dCol, dRow } of NEIGHBOR_OFFSETS) {
    if (isOccupied(cells, col + dCol, row + dRow)) {
      mask |= flag;
    }
  }
  return mask;
}

/**
 * Computes occupancy masks for a whole layout, indexed [row][col].
 */
export function computeOccupancyMasks(cells: readonly (readonly Cell[])[]): number[][] {
  return cells.map((row, rowIndex) =>
    row.map((_cell, colIndex) => computeOccupancyMask(cells, colIndex, rowIndex)),
  );
}

export const hasFlag = (mask: number, flag: number): boolean => (mask & flag) !== 0;
