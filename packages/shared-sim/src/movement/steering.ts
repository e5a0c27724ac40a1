import type { Vector3 } from "@babylonjs/core/Maths/math.vector.js";
import type { NavVertex } from "@arena/shared";
import { AGENT_MAX_SPEED, OVERSHOOT_DAMPING, VELOCITY_EPSILON } from "@arena/shared";

/**
 * Kinematic state integrated by the steering step. Mutated in place.
 */
export interface SteeringBody {
  position: Vector3;
  velocity: Vector3;
  /** Heading around +Y in radians, 0 facing +Z. */
  orientation: number;
}

export interface SteeringTarget {
  waypoint: NavVertex;
  /** True when no waypoints remain after this one. */
  finalLeg: boolean;
}

/**
 * Advances a body by one tick toward its waypoint on the ground plane.
 * Velocity follows the desired velocity through a first-order low-pass,
 * clamped to the max speed. Bodies without a target bleed speed.
 *
 * @param body - body to update.
 * @param target - current waypoint, or null when the body has no path.
 * @param deltaTimeS - tick length in seconds.
 */
export function applySteeringStep(
  body: SteeringBody,
  target: SteeringTarget | null,
  deltaTimeS: number,
): void {
  const velocity = body.velocity;
  velocity.y = 0;

  if (!target) {
    velocity.scaleInPlace(OVERSHOOT_DAMPING);
  } else {
    const dx = target.waypoint.x - body.position.x;
    const dz = target.waypoint.z - body.position.z;
    const distance = Math.sqrt(dx * dx + dz * dz);

    let desiredX = 0;
    let desiredZ = 0;
    if (distance > VELOCITY_EPSILON) {
      desiredX = (dx / distance) * AGENT_MAX_SPEED;
      desiredZ = (dz / distance) * AGENT_MAX_SPEED;
    }

    velocity.x += (desiredX - velocity.x) * deltaTimeS;
    velocity.z += (desiredZ - velocity.z) * deltaTimeS;

    const speed = velocity.length();
    if (speed > AGENT_MAX_SPEED) {
      velocity.scaleInPlace(AGENT_MAX_SPEED / speed);
    }

    if (target.finalLeg && velocity.length() > distance) {
      velocity.scaleInPlace(OVERSHOOT_DAMPING);
    }
  }

  if (velocity.length() > VELOCITY_EPSILON) {
    body.orientation = Math.atan2(velocity.x, velocity.z);
  }

  body.position.x += velocity.x * deltaTimeS;
  body.position.z += velocity.z * deltaTimeS;
}

/**
 * Ground-plane distance between a body and a point.
 */
export function groundDistance(position: Vector3, point: NavVertex): number {
  return Math.hypot(point.x - position.x, point.z - position.z);
}
