import { Vector3 } from "@babylonjs/core/Maths/math.vector.js";
import type { AgentBehavior, AgentSnapshot, NavPath, NavVertex } from "@arena/shared";
import { BASE_AVOIDANCE_DELTA } from "@arena/shared";
import { REROUTE_INTERVAL_MS } from "../constants/ai";

/**
 * Current route of an agent. The stack is reversed so pop yields the next waypoint.
 */
export interface AgentPathAssignment {
  next: NavVertex;
  stack: NavVertex[];
}

/**
 * Server-side agent state.
 */
export class ServerAgent {
  public behavior: AgentBehavior = "seeking";
  public readonly position: Vector3;
  public readonly velocity = Vector3.Zero();
  /** Heading around +Y in radians, 0 facing +Z. */
  public orientation = 0;
  public path: AgentPathAssignment | null = null;
  /** Time left before the current path is re-validated. */
  public rerouteTimerMs = 0;
  /** Avoidance delta used for re-validation; grows on each failure. */
  public avoidanceDelta = BASE_AVOIDANCE_DELTA;
  /** Wait before the next re-validation after a failure. */
  public retryCooldownMs = 0;
  /** Set once backoff gave up; cleared by the next surface rebuild. */
  public parked = false;

  /**
   * Creates a new agent at a ground position.
   *
   * @param id - unique agent id.
   * @param spawnPosition - initial ground position.
   */
  constructor(
    public readonly id: string,
    spawnPosition: NavVertex,
  ) {
    this.position = new Vector3(spawnPosition.x, 0, spawnPosition.z);
  }

  /**
   * Follows a planned path. The first point is where the agent already stands.
   */
  assignPath(path: NavPath): void {
    const [start, ...rest] = path.points;
    const next = rest.length > 0 ? rest[0] : start;
    this.path = {
      next: { ...next },
      stack: rest.slice(1).reverse(),
    };
    this.rerouteTimerMs = REROUTE_INTERVAL_MS;
  }

  clearPath(): void {
    this.path = null;
  }

  /**
   * Pops the next waypoint off the stack.
   *
   * @returns false when the stack was empty.
   */
  advanceWaypoint(): boolean {
    const next = this.path?.stack.pop();
    if (!this.path || !next) {
      return false;
    }
    this.path.next = next;
    return true;
  }

  park(): void {
    this.path = null;
    this.parked = true;
  }

  /**
   * Returns a parked agent to path assignment with a fresh backoff.
   */
  unpark(): void {
    this.parked = false;
    this.avoidanceDelta = BASE_AVOIDANCE_DELTA;
    this.retryCooldownMs = 0;
  }

  toSnapshot(): AgentSnapshot {
    return {
      id: this.id,
      position: { x: this.position.x, y: this.position.y, z: this.position.z },
      orientation: this.orientation,
      state: this.behavior,
    };
  }
}
