import type { ContactReport } from "@arena/shared";
import type { ServerArena } from "../world/arena/arena";
import { AgentArrivalSystem } from "./systems/agent-arrival-system";
import { AgentSteeringSystem } from "./systems/agent-steering-system";
import { CollisionSystem } from "./systems/collision-system";
import { PathAssignmentSystem } from "./systems/path-assignment-system";
import { PathRevalidationSystem } from "./systems/path-revalidation-system";

/**
 * Runs the per-tick agent systems in order.
 */
export class AgentController {
  private readonly steeringSystem = new AgentSteeringSystem();
  private readonly arrivalSystem = new AgentArrivalSystem();
  private readonly pathAssignmentSystem = new PathAssignmentSystem();
  private readonly pathRevalidationSystem = new PathRevalidationSystem();
  private readonly collisionSystem = new CollisionSystem();

  constructor(private readonly arena: ServerArena) {}

  fixedTick(tickMs: number, contacts: readonly ContactReport[]): void {
    this.steeringSystem.update(this.arena, tickMs);
    this.arrivalSystem.update(this.arena);
    this.pathAssignmentSystem.update(this.arena, tickMs);
    this.pathRevalidationSystem.update(this.arena, tickMs);
    this.collisionSystem.update(this.arena, contacts);
  }
}
