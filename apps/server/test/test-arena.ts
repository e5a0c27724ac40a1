import type {
  AgentBehavior,
  ArenaEvent,
  ArenaEventType,
  ArenaLevelDefinition,
  CellKind,
} from "@arena/shared";
import { TICK_MS, cellCenter, createArenaLevel } from "@arena/shared";
import { ArenaData, ServerArena } from "../src/world/arena/arena";
import type { ArenaOptions } from "../src/world/arena/types";
import { ServerAgent } from "../src/world/entities/agent";

const CELL_CHARS: Record<string, CellKind> = {
  ".": "empty",
  "#": "floor",
  S: "spawn",
  G: "goal",
  I: "portal-in",
  O: "portal-out",
};

export const OPEN_FIELD = ["S####", "#####", "#####", "#####", "####G"];
export const SHORT_CORRIDOR = ["S#G"];

/**
 * Builds an arena from a character map, one string per row.
 */
export function createTestArena(
  rows: string[],
  overrides: Partial<Omit<ArenaLevelDefinition, "layout">> = {},
  options: ArenaOptions = {},
): ServerArena {
  const level = createArenaLevel({
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
  return new ServerArena(new ArenaData("test-arena", level), options);
}

/**
 * Places an agent at a cell center, bypassing the spawner.
 */
export function addAgent(
  arena: ServerArena,
  col: number,
  row: number,
  behavior: AgentBehavior = "seeking",
): ServerAgent {
  const agent = new ServerAgent(arena.agents.nextId(), cellCenter({ col, row }));
  agent.behavior = behavior;
  arena.agents.add(agent);
  return agent;
}

export function tickTimes(arena: ServerArena, ticks: number, tickMs = TICK_MS): void {
  for (let i = 0; i < ticks; i += 1) {
    arena.fixedTick(tickMs);
  }
}

export function eventsOfType<T extends ArenaEventType>(
  arena: ServerArena,
  eventType: T,
): (ArenaEvent & { eventType: T })[] {
  const events = arena.getEventsSince(0)?.events ?? [];
  return events.filter((event): event is ArenaEvent & { eventType: T } => event.eventType === eventType);
}
