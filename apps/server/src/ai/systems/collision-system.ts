import type { ContactReport } from "@arena/shared";
import type { ServerAgent } from "../../world/entities/agent";
import type { ServerArena } from "../../world/arena/arena";

/**
 * Interprets the tick's contact reports. Hazards destroy any agent; a seeking
 * agent touching a returning one is lost. Each agent is destroyed at most once.
 */
export class CollisionSystem {
  update(arena: ServerArena, contacts: readonly ContactReport[]): void {
    const destroyed = new Set<string>();

    for (const contact of contacts) {
      if (destroyed.has(contact.agentId)) {
        continue;
      }
      const agent = arena.agents.get(contact.agentId);
      if (!agent) {
        continue;
      }

      const other = contact.other;
      switch (other.kind) {
        case "hazard":
          destroyed.add(agent.id);
          arena.removeAgent(agent, { kind: "hazard", hazardId: other.hazardId });
          break;
        case "agent": {
          const otherAgent = arena.agents.get(other.agentId);
          if (!otherAgent || otherAgent === agent) {
            break;
          }
          const loser = this.pickLoser(agent, otherAgent);
          if (!loser || destroyed.has(loser.id)) {
            break;
          }
          const winner = loser === agent ? otherAgent : agent;
          destroyed.add(loser.id);
          arena.removeAgent(loser, { kind: "collision", otherAgentId: winner.id });
          break;
        }
      }
    }
  }

  private pickLoser(a: ServerAgent, b: ServerAgent): ServerAgent | null {
    if (a.behavior === "seeking" && b.behavior === "returning") {
      return a;
    }
    if (a.behavior === "returning" && b.behavior === "seeking") {
      return b;
    }
    return null;
  }
}
