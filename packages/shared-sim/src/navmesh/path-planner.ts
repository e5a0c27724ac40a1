import type { NavLocation, NavPath, NavSurface, NavVertex } from "@arena/shared";
import { NAV_LAYER_IDS, NavLayerId, SEAM_CLEARANCE_MAX_RATIO } from "@arena/shared";
import {
  createFindNearestPolyResult,
  findNearestPoly,
  findNodePath,
  findStraightPath,
  type NodeRef,
  type Vec3,
} from "navcat";
import type { NavcatSurface } from "./navcat-surface";
import { createLayerFilter, createNavcatSurface, seamKey } from "./navcat-surface";
import { clampToPortal, distance2d, findPortalCrossing, shrinkPortal } from "./seam-clearance";

const CLEARANCE_EPSILON = 1e-6;

const toVec3 = (point: NavVertex): Vec3 => [point.x, 0, point.z];

/**
 * Shortest-path queries over one immutable navigation surface.
 * A new planner is created whenever the surface is rebuilt.
 */
export class PathPlanner {
  private readonly surface: NavSurface;
  private readonly navcat: NavcatSurface | null;
  private readonly halfHeight = 1.0;

  constructor(surface: NavSurface) {
    this.surface = surface;
    this.navcat = createNavcatSurface(surface);
  }

  getSurface(): NavSurface {
    return this.surface;
  }

  /**
   * Plans a path between two ground points.
   * Where the corridor switches layers, the path crosses the seam at least
   * `avoidanceDelta` from either end, capped at a share of the seam length.
   *
   * @param from - start position.
   * @param to - target position, returned exactly as the last point.
   * @param excludedLayers - layers the path may not enter.
   * @param avoidanceDelta - snapping tolerance for off-surface endpoints and clearance kept from seam corners.
   * @returns the path, or null when no path exists under the constraints.
   */
  plan(
    from: NavVertex,
    to: NavVertex,
    excludedLayers: ReadonlySet<NavLayerId>,
    avoidanceDelta: number,
  ): NavPath | null {
    const navcat = this.navcat;
    const allowed = this.getAllowedLayers(excludedLayers);
    if (!navcat || allowed.length === 0) {
      return null;
    }

    const start = this.locate(from, allowed, avoidanceDelta);
    const goal = this.locate(to, allowed, avoidanceDelta);
    if (!start || !goal) {
      return null;
    }

    const startRef = navcat.nodeRefs[start.layer][start.polygonId];
    const goalRef = navcat.nodeRefs[goal.layer][goal.polygonId];
    const nodePath = findNodePath(
      navcat.navMesh,
      startRef,
      goalRef,
      toVec3(start.point),
      toVec3(goal.point),
      createLayerFilter(excludedLayers),
    );
    // A partial path ends short of the goal polygon
    if (!nodePath.success || nodePath.path[nodePath.path.length - 1] !== goalRef) {
      return null;
    }
    const corridor = nodePath.path;

    const points: NavVertex[] = [{ x: start.point.x, y: 0, z: start.point.z }];
    let anchor = start.point;
    let first = 0;
    for (let i = 0; i + 1 < corridor.length; i++) {
      const seam = navcat.seams.get(seamKey(corridor[i], corridor[i + 1]));
      if (!seam) {
        continue;
      }
      const remaining = corridor.slice(first);
      const crossing = findPortalCrossing(
        [anchor, ...this.findCorners(anchor, goal.point, remaining), goal.point],
        seam,
      );
      if (!crossing) {
        continue;
      }
      const clamped = clampToPortal(crossing, shrinkPortal(seam, avoidanceDelta, SEAM_CLEARANCE_MAX_RATIO));
      if (distance2d(crossing, clamped) < CLEARANCE_EPSILON) {
        continue;
      }
      points.push(...this.findCorners(anchor, clamped, corridor.slice(first, i + 1)), clamped);
      anchor = clamped;
      first = i + 1;
    }
    points.push(...this.findCorners(anchor, goal.point, corridor.slice(first)), { x: to.x, y: to.y, z: to.z });

    const layers: NavLayerId[] = [];
    for (const ref of corridor) {
      const layer = navcat.polygons.get(ref)?.layer;
      if (layer !== undefined && layers[layers.length - 1] !== layer) {
        layers.push(layer);
      }
    }

    let length = 0;
    for (let i = 1; i < points.length; i++) {
      length += distance2d(points[i - 1], points[i]);
    }

    return { points, layers, length };
  }

  /**
   * Locates a point on the first allowed layer containing it, or snaps it to
   * the closest polygon boundary within `maxDistance`.
   */
  locate(point: NavVertex, layers: readonly NavLayerId[], maxDistance: number): NavLocation | null {
    const navcat = this.navcat;
    if (!navcat) {
      return null;
    }

    const center = toVec3(point);
    const halfExtents: Vec3 = [maxDistance, this.halfHeight, maxDistance];
    let best: NavLocation | null = null;
    let bestDistance = Infinity;

    for (const layer of layers) {
      const excluded = new Set(NAV_LAYER_IDS.filter((other) => other !== layer));
      const nearest = findNearestPoly(
        createFindNearestPolyResult(),
        navcat.navMesh,
        center,
        halfExtents,
        createLayerFilter(excluded),
      );
      if (!nearest.success) {
        continue;
      }
      const polygon = navcat.polygons.get(nearest.nodeRef);
      if (!polygon) {
        continue;
      }

      const snapped: NavVertex = { x: nearest.position[0], y: 0, z: nearest.position[2] };
      const distance = distance2d(point, snapped);
      if (distance < CLEARANCE_EPSILON) {
        return { layer, polygonId: polygon.polygonId, point: { x: point.x, y: 0, z: point.z } };
      }
      if (distance <= maxDistance && distance < bestDistance) {
        bestDistance = distance;
        best = { layer, polygonId: polygon.polygonId, point: snapped };
      }
    }
    return best;
  }

  // -- Private Interface

  private getAllowedLayers(excludedLayers: ReadonlySet<NavLayerId>): NavLayerId[] {
    return NAV_LAYER_IDS.filter(
      (layer) => !excludedLayers.has(layer) && !this.surface.layers[layer].placeholder,
    );
  }

  /**
   * Turning points strictly between `from` and `to` along a polygon corridor.
   */
  private findCorners(from: NavVertex, to: NavVertex, refs: NodeRef[]): NavVertex[] {
    if (!this.navcat || refs.length === 0) {
      return [];
    }
    const straight = findStraightPath(this.navcat.navMesh, toVec3(from), toVec3(to), refs);
    if (!straight.success) {
      return [];
    }
    return straight.path.slice(1, -1).map((corner) => ({ x: corner.position[0], y: 0, z: corner.position[2] }));
  }
}
