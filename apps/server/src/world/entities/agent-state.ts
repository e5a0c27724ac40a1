import type { AgentBehavior, ArenaLevel, CellCoord, NavVertex } from "@arena/shared";
import {
  GOAL_ARRIVAL_RADIUS,
  HOME_ARRIVAL_RADIUS,
  NavLayerId,
  WAYPOINT_REACHED_DISTANCE,
  cellCenter,
  isInsideCell,
} from "@arena/shared";
import { groundDistance } from "@arena/shared-sim";
import type { ServerAgent } from "./agent";

/**
 * Outcome of checking an agent against its current waypoint.
 */
export type ArrivalTransition =
  | { kind: "none" }
  | { kind: "waypoint-advanced" }
  | { kind: "turned-back" }
  | { kind: "delivered" };

const SEEKING_EXCLUDED_LAYERS: ReadonlySet<NavLayerId> = new Set([NavLayerId.PortalOut]);
const RETURNING_EXCLUDED_LAYERS: ReadonlySet<NavLayerId> = new Set([NavLayerId.PortalIn]);

/**
 * Cell an agent is heading for in its current behavior.
 */
export function destinationCell(level: ArenaLevel, behavior: AgentBehavior): CellCoord {
  switch (behavior) {
    case "seeking":
      return level.goalCell;
    case "returning":
      return level.spawnCell;
  }
}

/**
 * Seeking agents may not leave through the out-portal; returning agents may not use the in-portal.
 */
export function excludedLayersFor(behavior: AgentBehavior): ReadonlySet<NavLayerId> {
  switch (behavior) {
    case "seeking":
      return SEEKING_EXCLUDED_LAYERS;
    case "returning":
      return RETURNING_EXCLUDED_LAYERS;
  }
}

function arrivalRadiusFor(behavior: AgentBehavior): number {
  switch (behavior) {
    case "seeking":
      return GOAL_ARRIVAL_RADIUS;
    case "returning":
      return HOME_ARRIVAL_RADIUS;
  }
}

export function destinationPoint(level: ArenaLevel, behavior: AgentBehavior): NavVertex {
  return cellCenter(destinationCell(level, behavior));
}

/**
 * Applies waypoint advance and behavior transitions for one agent.
 * A turned-back agent loses its path and becomes returning; a delivered agent
 * is left for the caller to remove.
 */
export function evaluateArrival(agent: ServerAgent, level: ArenaLevel): ArrivalTransition {
  const path = agent.path;
  if (!path) {
    return { kind: "none" };
  }

  const distance = groundDistance(agent.position, path.next);
  if (path.stack.length > 0) {
    if (distance < WAYPOINT_REACHED_DISTANCE && agent.advanceWaypoint()) {
      return { kind: "waypoint-advanced" };
    }
    return { kind: "none" };
  }

  if (distance >= arrivalRadiusFor(agent.behavior)) {
    return { kind: "none" };
  }

  const cell = destinationCell(level, agent.behavior);
  if (!isInsideCell(agent.position.x, agent.position.z, cell)) {
    return { kind: "none" };
  }

  switch (agent.behavior) {
    case "seeking":
      agent.behavior = "returning";
      agent.clearPath();
      return { kind: "turned-back" };
    case "returning":
      agent.clearPath();
      return { kind: "delivered" };
  }
}
