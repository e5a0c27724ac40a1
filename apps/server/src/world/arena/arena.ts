import type {
  AgentSnapshot,
  ArenaEvent,
  ArenaLevel,
  CellCoord,
  ContactReport,
  EventLogBatch,
  NavPath,
  PathStatus,
} from "@arena/shared";
import {
  ArenaEventType,
  EventCategory,
  cellKey,
  getCell,
  isCellInBounds,
} from "@arena/shared";
import { PathPlanner, buildNavSurface } from "@arena/shared-sim";
import { createArenaLogger, type Logger } from "@arena/shared-servers";
import { AgentController } from "../../ai/agent-controller";
import { EventLog } from "../../eventLog";
import type { ServerAgent } from "../entities/agent";
import { destinationPoint, excludedLayersFor } from "../entities/agent-state";
import { AgentRegistry } from "./agent-registry";
import { ArenaLifecycle } from "./arena-lifecycle";
import { LevelProgress } from "./level-progress";
import type { AgentRemovalCause, ArenaOptions, ObstacleResult } from "./types";

/**
 * Static data for one arena: its id and the loaded level.
 */
export class ArenaData {
  constructor(
    public readonly arenaId: string,
    public readonly level: ArenaLevel,
  ) {}
}

/** Header fields shared by every event the arena emits. */
type EventHeader = Pick<ArenaEvent, "eventId" | "serverTick" | "serverTimeMs" | "contextId">;

/**
 * One running arena: agents, the active navigation surface, obstacles,
 * progress and the event log. Advanced by {@link fixedTick}.
 */
export class ServerArena {
  public readonly agents = new AgentRegistry();
  public readonly eventLog: EventLog;
  public readonly progress: LevelProgress;
  public readonly logger: Logger;
  public readonly debugPaths: boolean;
  /** Global wait after a failed assignment before any agent is planned for again. */
  public pathGateMs = 0;

  private readonly lifecycle: ArenaLifecycle;
  private readonly controller: AgentController;
  private readonly obstacles = new Map<string, CellCoord>();
  private planner: PathPlanner;
  private currentPathStatus: PathStatus = "open";
  private serverTick = 0;
  private elapsedMs = 0;

  constructor(
    public readonly arenaData: ArenaData,
    options: ArenaOptions = {},
  ) {
    this.logger = createArenaLogger(arenaData.arenaId, arenaData.level.id);
    this.debugPaths = options.debugPaths ?? false;
    this.eventLog = new EventLog(options.eventLogSize);
    this.progress = new LevelProgress(arenaData.level);
    this.planner = new PathPlanner(buildNavSurface(arenaData.level));
    this.controller = new AgentController(this);
    this.lifecycle = new ArenaLifecycle(this);

    this.lifecycle.onAgentSpawned((agent) => {
      this.agents.add(agent);
      this.logger.debug({ agentId: agent.id }, "Agent spawned");
      this.emit({
        ...this.eventHeader(),
        category: EventCategory.Agent,
        eventType: ArenaEventType.AgentSpawned,
        actorId: agent.id,
      });
    });

    this.logger.info({ columns: this.level.columns, rows: this.level.rows }, "Arena created");
  }

  get id(): string {
    return this.arenaData.arenaId;
  }

  get level(): ArenaLevel {
    return this.arenaData.level;
  }

  get pathStatus(): PathStatus {
    return this.currentPathStatus;
  }

  get isComplete(): boolean {
    return this.progress.isComplete;
  }

  get tick(): number {
    return this.serverTick;
  }

  get msUntilSpawn(): number {
    return this.lifecycle.msUntilSpawn;
  }

  get obstaclesLeft(): number {
    return this.level.obstacles - this.obstacles.size;
  }

  getPlanner(): PathPlanner {
    return this.planner;
  }

  setPathStatus(status: PathStatus): void {
    if (status === this.currentPathStatus) {
      return;
    }
    this.currentPathStatus = status;
    this.emit({
      ...this.eventHeader(),
      category: EventCategory.Navigation,
      eventType: ArenaEventType.PathStatusChanged,
      pathStatus: status,
    });
  }

  /**
   * Plans from the agent's position to the destination of its current behavior.
   */
  planPath(agent: ServerAgent, avoidanceDelta: number): NavPath | null {
    return this.planner.plan(
      { x: agent.position.x, y: 0, z: agent.position.z },
      destinationPoint(this.level, agent.behavior),
      excludedLayersFor(agent.behavior),
      avoidanceDelta,
    );
  }

  /**
   * Advances the arena by one fixed step.
   *
   * @param tickMs - step length in milliseconds.
   * @param contacts - overlaps reported for this step.
   */
  fixedTick(tickMs: number, contacts: readonly ContactReport[] = []): void {
    if (this.progress.isComplete) {
      return;
    }

    this.serverTick += 1;
    this.elapsedMs += tickMs;

    this.lifecycle.update(tickMs);
    this.controller.fixedTick(tickMs, contacts);

    const outcome = this.progress.evaluate();
    if (outcome) {
      this.logger.info(
        { outcome, delivered: this.progress.delivered, lost: this.progress.lost },
        "Level completed",
      );
      this.emit({
        ...this.eventHeader(),
        category: EventCategory.Level,
        eventType: ArenaEventType.LevelCompleted,
        outcome,
        delivered: this.progress.delivered,
        lost: this.progress.lost,
      });
    }
  }

  placeObstacle(col: number, row: number): ObstacleResult {
    if (!isCellInBounds(this.level, col, row)) {
      return { success: false, reason: "out-of-bounds" };
    }
    if (getCell(this.level, col, row)?.kind !== "floor") {
      return { success: false, reason: "not-floor" };
    }
    const key = cellKey(col, row);
    if (this.obstacles.has(key)) {
      return { success: false, reason: "occupied" };
    }
    if (this.obstaclesLeft <= 0) {
      return { success: false, reason: "no-obstacles-left" };
    }

    const cell = { col, row };
    this.obstacles.set(key, cell);
    this.rebuildSurface();
    return { success: true, cell, obstaclesLeft: this.obstaclesLeft };
  }

  removeObstacle(col: number, row: number): ObstacleResult {
    const key = cellKey(col, row);
    const cell = this.obstacles.get(key);
    if (!cell) {
      return { success: false, reason: "not-placed" };
    }

    this.obstacles.delete(key);
    this.rebuildSurface();
    return { success: true, cell, obstaclesLeft: this.obstaclesLeft };
  }

  getObstacles(): CellCoord[] {
    return Array.from(this.obstacles.values(), (cell) => ({ ...cell }));
  }

  getSnapshots(): AgentSnapshot[] {
    return this.agents.values().map((agent) => agent.toSnapshot());
  }

  /**
   * Events logged after the given id.
   *
   * @returns undefined when part of the range was already evicted.
   */
  getEventsSince(afterEventId: number): EventLogBatch<ArenaEvent> | undefined {
    const range = this.eventLog.getSince(afterEventId);
    if (!range) {
      return undefined;
    }
    return {
      fromEventId: range.fromSeq,
      toEventId: range.toSeq,
      serverTick: this.serverTick,
      events: range.entries,
    };
  }

  eventHeader(): EventHeader {
    return {
      eventId: 0,
      serverTick: this.serverTick,
      serverTimeMs: this.elapsedMs,
      contextId: this.id,
    };
  }

  emit(event: ArenaEvent): void {
    this.eventLog.append(event);
  }

  /**
   * Removes an agent and records why.
   */
  removeAgent(agent: ServerAgent, cause: AgentRemovalCause): void {
    if (!this.agents.remove(agent.id)) {
      return;
    }

    const header = { ...this.eventHeader(), actorId: agent.id };
    switch (cause.kind) {
      case "delivered":
        this.progress.recordDelivery();
        this.emit({
          ...header,
          category: EventCategory.Agent,
          eventType: ArenaEventType.Delivered,
        });
        break;
      case "hazard":
        this.progress.recordLoss();
        this.emit({
          ...header,
          category: EventCategory.Agent,
          eventType: ArenaEventType.AgentDestroyedByHazard,
          hazardId: cause.hazardId,
          behavior: agent.behavior,
        });
        break;
      case "collision":
        this.progress.recordLoss();
        this.emit({
          ...header,
          category: EventCategory.Agent,
          eventType: ArenaEventType.AgentLost,
          otherAgentId: cause.otherAgentId,
        });
        break;
    }
    this.logger.debug({ agentId: agent.id, cause: cause.kind }, "Agent removed");
  }

  // -- Private Interface

  private rebuildSurface(): void {
    const excluded = this.getObstacles();
    const surface = buildNavSurface(this.level, excluded);
    this.planner = new PathPlanner(surface);
    this.pathGateMs = 0;
    this.setPathStatus("open");

    for (const agent of this.agents.values()) {
      if (agent.parked) {
        agent.unpark();
      }
    }

    const polygonCounts = surface.layers.map((layer) => (layer.placeholder ? 0 : layer.polygons.length));
    this.logger.info({ excluded, polygonCounts }, "Navigation surface rebuilt");
    this.emit({
      ...this.eventHeader(),
      category: EventCategory.Navigation,
      eventType: ArenaEventType.SurfaceRebuilt,
      excludedCells: excluded,
      polygonCounts,
    });
  }
}
