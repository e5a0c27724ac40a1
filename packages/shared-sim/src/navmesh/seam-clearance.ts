import type { NavVertex } from "@arena/shared";

const CROSSING_EPSILON = 1e-9;

/**
 * A seam edge between a portal layer polygon and a floor polygon.
 */
export interface NavPortal {
  left: NavVertex;
  right: NavVertex;
}

export function distance2d(a: NavVertex, b: NavVertex): number {
  return Math.hypot(b.x - a.x, b.z - a.z);
}

/**
 * Moves both ends of a portal toward each other by `clearance`, at most
 * `maxRatio` of the portal length from each end.
 */
export function shrinkPortal(portal: NavPortal, clearance: number, maxRatio: number): NavPortal {
  const length = distance2d(portal.left, portal.right);
  if (length === 0) {
    return portal;
  }
  const inset = Math.min(clearance, maxRatio * length);
  const dx = ((portal.right.x - portal.left.x) / length) * inset;
  const dz = ((portal.right.z - portal.left.z) / length) * inset;
  return {
    left: { x: portal.left.x + dx, y: 0, z: portal.left.z + dz },
    right: { x: portal.right.x - dx, y: 0, z: portal.right.z - dz },
  };
}

/**
 * Closest point to `point` on the portal segment.
 */
export function clampToPortal(point: NavVertex, portal: NavPortal): NavVertex {
  const ex = portal.right.x - portal.left.x;
  const ez = portal.right.z - portal.left.z;
  const lengthSq = ex * ex + ez * ez;
  if (lengthSq === 0) {
    return { x: portal.left.x, y: 0, z: portal.left.z };
  }
  const t = ((point.x - portal.left.x) * ex + (point.z - portal.left.z) * ez) / lengthSq;
  const clamped = Math.min(1, Math.max(0, t));
  return { x: portal.left.x + ex * clamped, y: 0, z: portal.left.z + ez * clamped };
}

/**
 * Where the polyline first touches the portal segment, or null when it never does.
 */
export function findPortalCrossing(polyline: readonly NavVertex[], portal: NavPortal): NavVertex | null {
  const sx = portal.right.x - portal.left.x;
  const sz = portal.right.z - portal.left.z;

  for (let i = 1; i < polyline.length; i++) {
    const p = polyline[i - 1];
    const rx = polyline[i].x - p.x;
    const rz = polyline[i].z - p.z;
    const denom = rx * sz - rz * sx;
    if (Math.abs(denom) < CROSSING_EPSILON) {
      continue;
    }

    const ax = portal.left.x - p.x;
    const az = portal.left.z - p.z;
    const t = (ax * sz - az * sx) / denom;
    const u = (ax * rz - az * rx) / denom;
    const tolerance = 1e-6;
    if (t < -tolerance || t > 1 + tolerance || u < -tolerance || u > 1 + tolerance) {
      continue;
    }
    return { x: p.x + rx * t, y: 0, z: p.z + rz * t };
  }
  return null;
}
