import {
  ArenaEventType,
  AVOIDANCE_DELTA_CEILING,
  AVOIDANCE_DELTA_GROWTH,
  BASE_AVOIDANCE_DELTA,
  EventCategory,
} from "@arena/shared";
import { REPLAN_COOLDOWN_MS } from "../../world/constants/ai";
import type { ServerAgent } from "../../world/entities/agent";
import type { ServerArena } from "../../world/arena/arena";

/**
 * Periodically re-plans every agent that has a path. Failures widen the
 * agent's avoidance delta; past the ceiling the agent is parked until the
 * surface is rebuilt.
 */
export class PathRevalidationSystem {
  update(arena: ServerArena, tickMs: number): void {
    for (const agent of arena.agents.values()) {
      if (!agent.path) {
        continue;
      }

      agent.rerouteTimerMs -= tickMs;
      agent.retryCooldownMs = Math.max(0, agent.retryCooldownMs - tickMs);
      if (agent.rerouteTimerMs > 0 || agent.retryCooldownMs > 0) {
        continue;
      }

      const path = arena.planPath(agent, agent.avoidanceDelta);
      if (path) {
        agent.assignPath(path);
        agent.avoidanceDelta = BASE_AVOIDANCE_DELTA;
        continue;
      }

      this.backOff(arena, agent);
    }
  }

  private backOff(arena: ServerArena, agent: ServerAgent): void {
    agent.avoidanceDelta *= AVOIDANCE_DELTA_GROWTH;
    if (agent.avoidanceDelta <= AVOIDANCE_DELTA_CEILING) {
      agent.retryCooldownMs = REPLAN_COOLDOWN_MS;
      arena.logger.debug(
        { agentId: agent.id, avoidanceDelta: agent.avoidanceDelta },
        "Path blocked on re-validation",
      );
      return;
    }

    agent.park();
    arena.logger.info({ agentId: agent.id, avoidanceDelta: agent.avoidanceDelta }, "Agent parked");
    arena.emit({
      ...arena.eventHeader(),
      category: EventCategory.Navigation,
      eventType: ArenaEventType.AgentParked,
      actorId: agent.id,
      avoidanceDelta: agent.avoidanceDelta,
    });
  }
}
