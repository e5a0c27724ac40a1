import type { ServerAgent } from "../entities/agent";

/**
 * The live agents of one arena, in spawn order.
 */
export class AgentRegistry {
  private readonly agents = new Map<string, ServerAgent>();
  private nextSeq = 1;

  get count(): number {
    return this.agents.size;
  }

  nextId(): string {
    const id = `agent_${this.nextSeq}`;
    this.nextSeq += 1;
    return id;
  }

  add(agent: ServerAgent): void {
    this.agents.set(agent.id, agent);
  }

  get(id: string): ServerAgent | undefined {
    return this.agents.get(id);
  }

  remove(id: string): boolean {
    return this.agents.delete(id);
  }

  /**
   * Snapshot of the live agents, safe to iterate while removing.
   */
  values(): ServerAgent[] {
    return [...this.agents.values()];
  }
}
