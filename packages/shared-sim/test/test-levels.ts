import type { ArenaLevel, ArenaLevelDefinition, CellKind } from "@arena/shared";
import { createArenaLevel } from "@arena/shared";

const CELL_CHARS: Record<string, CellKind> = {
  ".": "empty",
  "#": "floor",
  S: "spawn",
  G: "goal",
  I: "portal-in",
  O: "portal-out",
};

/**
 * Builds a level from a character map, one string per row.
 */
export function levelFromRows(
  rows: string[],
  overrides: Partial<Omit<ArenaLevelDefinition, "layout">> = {},
): ArenaLevel {
  return createArenaLevel({
    id: "test-level",
    populationCap: 3,
    spawnIntervalS: 1,
    deliveriesRequired: 2,
    obstacles: 2,
    ...overrides,
    layout: rows.map((row) =>
      [...row].map((char) => {
        const kind = CELL_CHARS[char];
        if (!kind) {
          throw new Error(`Unknown cell char "${char}"`);
        }
        return kind;
      }),
    ),
  });
}
