import { applySteeringStep } from "@arena/shared-sim";
import type { ServerArena } from "../../world/arena/arena";

export class AgentSteeringSystem {
  update(arena: ServerArena, tickMs: number): void {
    const deltaTimeS = tickMs / 1000;
    for (const agent of arena.agents.values()) {
      const path = agent.path;
      applySteeringStep(
        agent,
        path ? { waypoint: path.next, finalLeg: path.stack.length === 0 } : null,
        deltaTimeS,
      );
    }
  }
}
