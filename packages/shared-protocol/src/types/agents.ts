/**
 * Behavioral state of a live agent: outbound to the goal, or inbound to the spawn.
 */
export type AgentBehavior = "seeking" | "returning";

/**
 * Level-wide planning status. While blocked, no new agents are spawned.
 */
export type PathStatus = "open" | "blocked";

/** A grid cell address. */
export interface CellCoord {
  col: number;
  row: number;
}

/**
 * Per-tick view of an agent handed to renderers.
 */
export interface AgentSnapshot {
  id: string;
  position: {
    x: number;
    y: number;
    z: number;
  };
  /** Heading around +Y in radians, 0 facing +Z. */
  orientation: number;
  state: AgentBehavior;
}

export type ContactParty = { kind: "agent"; agentId: string } | { kind: "hazard"; hazardId?: string };

/**
 * One overlap reported by the physics collaborator for the current tick.
 */
export interface ContactReport {
  agentId: string;
  other: ContactParty;
}
