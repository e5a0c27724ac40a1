import { ArenaEventType, EventCategory } from "@arena/shared";
import { evaluateArrival } from "../../world/entities/agent-state";
import type { ServerArena } from "../../world/arena/arena";

/**
 * Pops reached waypoints and applies goal and home arrivals.
 */
export class AgentArrivalSystem {
  update(arena: ServerArena): void {
    for (const agent of arena.agents.values()) {
      const transition = evaluateArrival(agent, arena.level);
      switch (transition.kind) {
        case "none":
        case "waypoint-advanced":
          break;
        case "turned-back":
          arena.emit({
            ...arena.eventHeader(),
            category: EventCategory.Agent,
            eventType: ArenaEventType.GoalReached,
            actorId: agent.id,
          });
          break;
        case "delivered":
          arena.removeAgent(agent, { kind: "delivered" });
          break;
      }
    }
  }
}
