import { BASE_AVOIDANCE_DELTA } from "@arena/shared";
import { PATH_GATE_MS } from "../../world/constants/ai";
import type { ServerArena } from "../../world/arena/arena";

/**
 * Gives a path to agents that have none. A failure blocks the level and
 * closes the gate for every agent for one interval; any later success
 * reopens it.
 */
export class PathAssignmentSystem {
  update(arena: ServerArena, tickMs: number): void {
    if (arena.pathGateMs > 0) {
      arena.pathGateMs = Math.max(0, arena.pathGateMs - tickMs);
      if (arena.pathGateMs > 0) {
        return;
      }
    }

    for (const agent of arena.agents.values()) {
      if (agent.path || agent.parked) {
        continue;
      }

      const path = arena.planPath(agent, BASE_AVOIDANCE_DELTA);
      if (!path) {
        arena.logger.info({ agentId: agent.id, behavior: agent.behavior }, "No path found");
        arena.setPathStatus("blocked");
        arena.pathGateMs = PATH_GATE_MS;
        continue;
      }

      agent.assignPath(path);
      arena.setPathStatus("open");
      if (arena.debugPaths) {
        arena.logger.debug(
          { agentId: agent.id, points: path.points, layers: path.layers },
          "Path assigned",
        );
      }
    }
  }
}
