import type { AgentBehavior, CellCoord, PathStatus } from "./agents";
import type { EventCategory, EventLogEntry } from "./event-log";

export enum ArenaEventType {
  AgentSpawned = 1,
  GoalReached = 2,
  Delivered = 3,
  AgentLost = 4,
  AgentDestroyedByHazard = 5,
  AgentParked = 6,
  PathStatusChanged = 7,
  SurfaceRebuilt = 8,
  LevelCompleted = 9,
}

export type AgentSpawnedEvent = EventLogEntry & {
  category: EventCategory.Agent;
  eventType: ArenaEventType.AgentSpawned;
  actorId: string;
};

/** Emitted when a seeking agent reaches the goal and turns back. */
export type GoalReachedEvent = EventLogEntry & {
  category: EventCategory.Agent;
  eventType: ArenaEventType.GoalReached;
  actorId: string;
};

export type DeliveredEvent = EventLogEntry & {
  category: EventCategory.Agent;
  eventType: ArenaEventType.Delivered;
  actorId: string;
};

export type AgentLostEvent = EventLogEntry & {
  category: EventCategory.Agent;
  eventType: ArenaEventType.AgentLost;
  actorId: string;
  /** The returning agent that was collided with. */
  otherAgentId: string;
};

export type AgentDestroyedByHazardEvent = EventLogEntry & {
  category: EventCategory.Agent;
  eventType: ArenaEventType.AgentDestroyedByHazard;
  actorId: string;
  hazardId?: string;
  behavior: AgentBehavior;
};

export type AgentParkedEvent = EventLogEntry & {
  category: EventCategory.Navigation;
  eventType: ArenaEventType.AgentParked;
  actorId: string;
  avoidanceDelta: number;
};

export type PathStatusChangedEvent = EventLogEntry & {
  category: EventCategory.Navigation;
  eventType: ArenaEventType.PathStatusChanged;
  pathStatus: PathStatus;
};

export type SurfaceRebuiltEvent = EventLogEntry & {
  category: EventCategory.Navigation;
  eventType: ArenaEventType.SurfaceRebuilt;
  excludedCells: CellCoord[];
  polygonCounts: number[];
};

export type LevelCompletedEvent = EventLogEntry & {
  category: EventCategory.Level;
  eventType: ArenaEventType.LevelCompleted;
  outcome: "won" | "failed";
  delivered: number;
  lost: number;
};

export type ArenaEvent =
  | AgentSpawnedEvent
  | GoalReachedEvent
  | DeliveredEvent
  | AgentLostEvent
  | AgentDestroyedByHazardEvent
  | AgentParkedEvent
  | PathStatusChangedEvent
  | SurfaceRebuiltEvent
  | LevelCompletedEvent;
