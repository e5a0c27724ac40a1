import { cellCenter } from "@arena/shared";
import { SPAWN_INITIAL_DELAY_MS, SPAWN_MESSAGE_DELAY_MS } from "../constants/ai";
import { ServerAgent } from "../entities/agent";
import type { ServerArena } from "./arena";

/**
 * Timer-gated spawner. Spawning is suspended while the arena's path status is
 * blocked and the timer only runs while the population is below the cap.
 */
export class ArenaLifecycle {
  private spawnTimerMs = 0;
  private readonly onAgentSpawnedCallbacks: ((agent: ServerAgent) => void)[] = [];

  constructor(private readonly arena: ServerArena) {
    // The first spawn waits longer when the level opens with a message
    this.spawnTimerMs = arena.level.message ? SPAWN_MESSAGE_DELAY_MS : SPAWN_INITIAL_DELAY_MS;
  }

  get msUntilSpawn(): number {
    return Math.max(0, this.spawnTimerMs);
  }

  /**
   * Updates the spawn timer and spawns when it runs out.
   *
   * @param deltaTimeMs - elapsed time since last update in milliseconds.
   */
  update(deltaTimeMs: number): void {
    if (this.arena.pathStatus === "blocked") {
      return;
    }

    const level = this.arena.level;
    if (this.arena.agents.count >= level.populationCap) {
      return;
    }

    this.spawnTimerMs -= deltaTimeMs;
    if (this.spawnTimerMs > 0) {
      return;
    }

    const agent = new ServerAgent(this.arena.agents.nextId(), cellCenter(level.spawnCell));
    for (const callback of this.onAgentSpawnedCallbacks) {
      callback(agent);
    }
    this.spawnTimerMs = level.spawnIntervalS * 1000;
  }

  /**
   * Registers a callback for agent spawn events.
   *
   * @param callback - invoked when an agent is spawned.
   */
  onAgentSpawned(callback: (agent: ServerAgent) => void): void {
    this.onAgentSpawnedCallbacks.push(callback);
  }
}
