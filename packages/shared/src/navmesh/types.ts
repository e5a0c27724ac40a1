import type { CellCoord } from "@arena/shared-protocol";

/**
 * A vertex on the ground plane. `y` is kept for world-space interop and is always 0.
 */
export interface NavVertex {
  x: number;
  y: number;
  z: number;
}

/**
 * Traversable planes of a surface. Portal layers are only reachable through
 * stitched seams with the floor.
 */
export enum NavLayerId {
  Floor = 0,
  PortalIn = 1,
  PortalOut = 2,
}

export const NAV_LAYER_IDS: readonly NavLayerId[] = [
  NavLayerId.Floor,
  NavLayerId.PortalIn,
  NavLayerId.PortalOut,
];

/**
 * A single convex polygon of a layer.
 * Vertices are ordered counter-clockwise when viewed from above (+Y).
 */
export interface NavPolygon {
  /** Index of the polygon within its layer. */
  id: number;
  /** Indices into the layer vertices array. */
  vertexIndices: number[];
  /** Neighbor polygon IDs for each edge (edge i runs from vertex i to i + 1), or -1 if boundary edge. */
  neighbors: number[];
  /** Grid cell the polygon was emitted for, null for a placeholder. */
  cell: CellCoord | null;
}

/**
 * Axis-aligned bounds of a layer on the ground plane.
 */
export interface NavBounds {
  minX: number;
  maxX: number;
  minZ: number;
  maxZ: number;
}

export interface NavLayer {
  id: NavLayerId;
  vertices: NavVertex[];
  polygons: NavPolygon[];
  bounds: NavBounds;
  /** True when the level has no cells for this layer. */
  placeholder: boolean;
}

/**
 * Pairs a portal-layer vertex with the floor vertex at identical coordinates.
 */
export interface NavStitch {
  layer: NavLayerId;
  vertex: number;
  floorVertex: number;
}

/**
 * Immutable multi-layer navigation surface. Replaced wholesale on rebuild.
 */
export interface NavSurface {
  /** Indexed by NavLayerId. */
  layers: NavLayer[];
  stitches: NavStitch[];
}

/**
 * Result of a successful path query.
 */
export interface NavPath {
  /** Turning points from the located start to the exact target. */
  points: NavVertex[];
  /** Layers the corridor passes through, in traversal order. */
  layers: NavLayerId[];
  /** Total length of the polyline. */
  length: number;
}

/**
 * A point located on a surface polygon.
 */
export interface NavLocation {
  layer: NavLayerId;
  polygonId: number;
  point: NavVertex;
}
