import { describe, expect, it } from "vitest";
import { ArenaEventType } from "@arena/shared";
import { SHORT_CORRIDOR, createTestArena, eventsOfType, tickTimes } from "./test-arena";

const SMALL_FIELD = ["S##", "###", "##G"];

describe("ArenaLifecycle", () => {
  it("spawns the first agent after the initial delay", () => {
    const arena = createTestArena(SMALL_FIELD);

    tickTimes(arena, 29);
    expect(arena.agents.count).toBe(0);
    expect(arena.msUntilSpawn).toBe(50);

    arena.fixedTick(50);
    expect(arena.agents.count).toBe(1);
    const [agent] = arena.agents.values();
    expect(agent.id).toBe("agent_1");
    expect(agent.behavior).toBe("seeking");
    expect(eventsOfType(arena, ArenaEventType.AgentSpawned).map((e) => e.actorId)).toEqual(["agent_1"]);
  });

  it("waits longer when the level opens with a message", () => {
    const arena = createTestArena(SMALL_FIELD, { message: "Welcome" });

    tickTimes(arena, 149);
    expect(arena.agents.count).toBe(0);

    arena.fixedTick(50);
    expect(arena.agents.count).toBe(1);
  });

  it("spawns on the level interval after the first agent", () => {
    const arena = createTestArena(SMALL_FIELD, { spawnIntervalS: 2 });

    tickTimes(arena, 30);
    expect(arena.msUntilSpawn).toBe(2000);

    tickTimes(arena, 39);
    expect(arena.agents.count).toBe(1);

    arena.fixedTick(50);
    expect(arena.agents.count).toBe(2);
  });

  it("holds the timer while the population is at the cap", () => {
    const arena = createTestArena(SMALL_FIELD, { populationCap: 2 });

    tickTimes(arena, 50);
    expect(arena.agents.count).toBe(2);
    expect(arena.msUntilSpawn).toBe(1000);

    tickTimes(arena, 40);
    expect(arena.agents.count).toBe(2);
    expect(arena.msUntilSpawn).toBe(1000);
  });

  it("suspends spawning while the path status is blocked", () => {
    const arena = createTestArena(SHORT_CORRIDOR);
    arena.placeObstacle(1, 0);

    tickTimes(arena, 30);
    expect(arena.pathStatus).toBe("blocked");
    expect(arena.msUntilSpawn).toBe(1000);

    tickTimes(arena, 60);
    expect(arena.agents.count).toBe(1);
    expect(arena.msUntilSpawn).toBe(1000);
  });
});
