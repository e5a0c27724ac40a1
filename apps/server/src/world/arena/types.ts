import type { CellCoord } from "@arena/shared";

export type LevelOutcome = "in-progress" | "won" | "failed";

export type ObstacleRejection =
  | "out-of-bounds"
  | "not-floor"
  | "occupied"
  | "no-obstacles-left"
  | "not-placed";

/**
 * Result of an obstacle edit. Rejections never change the surface.
 */
export type ObstacleResult =
  | { success: true; cell: CellCoord; obstaclesLeft: number }
  | { success: false; reason: ObstacleRejection };

export type AgentRemovalCause =
  | { kind: "delivered" }
  | { kind: "hazard"; hazardId?: string }
  | { kind: "collision"; otherAgentId: string };

export interface ArenaOptions {
  /** Log every path assignment. */
  debugPaths?: boolean;
  /** Capacity of the event log ring buffer. */
  eventLogSize?: number;
}
