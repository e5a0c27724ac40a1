import { TICK_RATE, toFiniteNumber } from "@arena/shared";

export interface AppConfig {
  /** Level loaded at boot, by file name under packages/assets/levels. */
  levelId: string;
  /** Fixed ticks per second. */
  tickRate: number;
  /** Log every path assignment. */
  debugPaths: boolean;
}

const DEFAULT_LEVEL_ID = "corridor";

function parseFlag(value: string | undefined): boolean {
  const raw = value?.trim().toLowerCase();
  return raw === "1" || raw === "true" || raw === "yes";
}

export function loadAppConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const tickRate = toFiniteNumber(env.ARENA_TICK_RATE, TICK_RATE);
  return {
    levelId: env.ARENA_LEVEL?.trim() || DEFAULT_LEVEL_ID,
    tickRate: tickRate > 0 ? tickRate : TICK_RATE,
    debugPaths: parseFlag(env.ARENA_DEBUG_PATHS),
  };
}
