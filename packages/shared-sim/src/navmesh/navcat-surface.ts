import type { NavSurface } from "@arena/shared";
import { NAV_LAYER_IDS, NavLayerId } from "@arena/shared";
import {
  DEFAULT_QUERY_FILTER,
  addTile,
  buildTile,
  createNavMesh,
  getNodeByTileAndPoly,
  getTileAt,
  type NavMesh,
  type NavMeshTileParams,
  type NodeRef,
} from "navcat";
import type { NavPortal } from "./seam-clearance";

// Flag bit for a detail triangle edge on the polygon boundary
const DETAIL_EDGE_BOUNDARY = 0x1;
const TILE_CELL_SIZE = 0.1;
const WALKABLE_HEIGHT = 2;
const WALKABLE_CLIMB = 0.5;

export interface NavPolygonRef {
  layer: NavLayerId;
  polygonId: number;
}

/**
 * A navigation surface loaded into a single navcat tile.
 * Every non-placeholder layer shares the tile; the layer is carried in each
 * polygon's area and as a flag bit, and seams are plain polygon neighbors.
 */
export interface NavcatSurface {
  navMesh: NavMesh;
  /** Node refs indexed by layer, then polygon id. Empty for placeholder layers. */
  nodeRefs: NodeRef[][];
  polygons: Map<NodeRef, NavPolygonRef>;
  /** Seam edges keyed by `seamKey(from, to)`. */
  seams: Map<string, NavPortal>;
}

export const layerFlag = (layer: NavLayerId): number => 1 << layer;

export const seamKey = (from: NodeRef, to: NodeRef): string => `${from}>${to}`;

/**
 * Query filter that rejects polygons on the excluded layers.
 */
export function createLayerFilter(excluded: ReadonlySet<NavLayerId>): typeof DEFAULT_QUERY_FILTER {
  let excludeFlags = 0;
  for (const layer of excluded) {
    excludeFlags |= layerFlag(layer);
  }
  return { ...DEFAULT_QUERY_FILTER, excludeFlags };
}

/**
 * Builds a navcat navmesh from a surface.
 * Surface polygons wind counter-clockwise seen from +Y; navcat expects the
 * opposite order, so vertex and edge order are reversed on the way in.
 *
 * @returns null when the surface has no traversable polygons.
 */
export function createNavcatSurface(surface: NavSurface): NavcatSurface | null {
  const entries: NavPolygonRef[] = [];
  const tileIndex: number[][] = NAV_LAYER_IDS.map(() => []);
  const vertexBase: number[] = [];
  const vertices: number[] = [];

  for (const layer of surface.layers) {
    vertexBase[layer.id] = vertices.length / 3;
    if (layer.placeholder) {
      continue;
    }
    for (const vertex of layer.vertices) {
      vertices.push(vertex.x, 0, vertex.z);
    }
    for (const polygon of layer.polygons) {
      tileIndex[layer.id][polygon.id] = entries.length;
      entries.push({ layer: layer.id, polygonId: polygon.id });
    }
  }

  if (entries.length === 0) {
    return null;
  }

  // Neighbor per surface edge, as navcat encodes it: tile polygon index + 1, 0 for a wall
  const neighbors = entries.map(({ layer, polygonId }) =>
    surface.layers[layer].polygons[polygonId].neighbors.map((neighbor) =>
      neighbor >= 0 ? tileIndex[layer][neighbor] + 1 : 0,
    ),
  );

  const seamEdges = findSeamEdges(surface);
  for (const seam of seamEdges) {
    const portalIndex = tileIndex[seam.layer][seam.polygonId];
    const floorIndex = tileIndex[NavLayerId.Floor][seam.floorPolygonId];
    neighbors[portalIndex][seam.edge] = floorIndex + 1;
    neighbors[floorIndex][seam.floorEdge] = portalIndex + 1;
  }

  const polys: NavMeshTileParams["polys"] = [];
  const detailMeshes: NavMeshTileParams["detailMeshes"] = [];
  const detailTriangles: number[] = [];

  entries.forEach(({ layer, polygonId }, index) => {
    const polygon = surface.layers[layer].polygons[polygonId];
    const n = polygon.vertexIndices.length;
    const base = vertexBase[layer];

    polys.push({
      vertices: polygon.vertexIndices.map((_, k) => base + polygon.vertexIndices[n - 1 - k]),
      neis: polygon.vertexIndices.map((_, k) => neighbors[index][(2 * n - 2 - k) % n]),
      flags: layerFlag(layer),
      area: layer,
    });

    // Fan triangulation over the polygon's own vertices
    detailMeshes.push({
      verticesBase: 0,
      verticesCount: 0,
      trianglesBase: detailTriangles.length / 4,
      trianglesCount: n - 2,
    });
    for (let k = 1; k < n - 1; k++) {
      const edgeFlags =
        (k === 1 ? DETAIL_EDGE_BOUNDARY : 0) |
        (DETAIL_EDGE_BOUNDARY << 2) |
        (k === n - 2 ? DETAIL_EDGE_BOUNDARY << 4 : 0);
      detailTriangles.push(0, k, k + 1, edgeFlags);
    }
  });

  let minX = Infinity;
  let maxX = -Infinity;
  let minZ = Infinity;
  let maxZ = -Infinity;
  for (let i = 0; i < vertices.length; i += 3) {
    minX = Math.min(minX, vertices[i]);
    maxX = Math.max(maxX, vertices[i]);
    minZ = Math.min(minZ, vertices[i + 2]);
    maxZ = Math.max(maxZ, vertices[i + 2]);
  }

  const tileParams: NavMeshTileParams = {
    bounds: [minX, 0, minZ, maxX, 0, maxZ],
    vertices,
    polys,
    detailMeshes,
    detailVertices: [],
    detailTriangles,
    tileX: 0,
    tileY: 0,
    tileLayer: 0,
    cellSize: TILE_CELL_SIZE,
    cellHeight: TILE_CELL_SIZE,
    walkableHeight: WALKABLE_HEIGHT,
    walkableRadius: 0,
    walkableClimb: WALKABLE_CLIMB,
  };

  const navMesh = createNavMesh();
  navMesh.origin[0] = minX;
  navMesh.origin[1] = 0;
  navMesh.origin[2] = minZ;
  navMesh.tileWidth = maxX - minX;
  navMesh.tileHeight = maxZ - minZ;
  addTile(navMesh, buildTile(tileParams));

  const tile = getTileAt(navMesh, 0, 0, 0);
  if (!tile) {
    throw new Error("Navigation tile was not added");
  }

  const nodeRefs: NodeRef[][] = NAV_LAYER_IDS.map(() => []);
  const polygons = new Map<NodeRef, NavPolygonRef>();
  entries.forEach((entry, index) => {
    const ref = getNodeByTileAndPoly(navMesh, tile, index).ref;
    nodeRefs[entry.layer][entry.polygonId] = ref;
    polygons.set(ref, entry);
  });

  const seams = new Map<string, NavPortal>();
  for (const seam of seamEdges) {
    const portalRef = nodeRefs[seam.layer][seam.polygonId];
    const floorRef = nodeRefs[NavLayerId.Floor][seam.floorPolygonId];
    seams.set(seamKey(portalRef, floorRef), seam.portal);
    seams.set(seamKey(floorRef, portalRef), seam.portal);
  }

  return { navMesh, nodeRefs, polygons, seams };
}

// -- Private Interface

interface SeamEdge {
  layer: NavLayerId;
  polygonId: number;
  /** Surface edge index on the portal polygon. */
  edge: number;
  floorPolygonId: number;
  floorEdge: number;
  portal: NavPortal;
}

/**
 * Derives cross-layer edges from stitches: a portal boundary edge whose two
 * ends are stitched to the ends of a floor polygon edge.
 */
function findSeamEdges(surface: NavSurface): SeamEdge[] {
  const floor = surface.layers[NavLayerId.Floor];
  const floorEdges = new Map<string, { polygonId: number; edge: number }>();
  if (!floor.placeholder) {
    for (const polygon of floor.polygons) {
      const n = polygon.vertexIndices.length;
      polygon.vertexIndices.forEach((a, i) => {
        floorEdges.set(`${a}>${polygon.vertexIndices[(i + 1) % n]}`, { polygonId: polygon.id, edge: i });
      });
    }
  }

  const stitched = new Map<string, number>();
  for (const stitch of surface.stitches) {
    stitched.set(`${stitch.layer}:${stitch.vertex}`, stitch.floorVertex);
  }

  const seams: SeamEdge[] = [];
  for (const layerId of [NavLayerId.PortalIn, NavLayerId.PortalOut]) {
    const layer = surface.layers[layerId];
    if (layer.placeholder) {
      continue;
    }

    for (const polygon of layer.polygons) {
      const n = polygon.vertexIndices.length;
      for (let i = 0; i < n; i++) {
        if (polygon.neighbors[i] >= 0) {
          continue;
        }
        const a = polygon.vertexIndices[i];
        const b = polygon.vertexIndices[(i + 1) % n];
        const floorA = stitched.get(`${layerId}:${a}`);
        const floorB = stitched.get(`${layerId}:${b}`);
        if (floorA === undefined || floorB === undefined) {
          continue;
        }
        // A matching floor polygon walks the shared edge the other way
        const floorEdge = floorEdges.get(`${floorB}>${floorA}`);
        if (!floorEdge) {
          continue;
        }

        seams.push({
          layer: layerId,
          polygonId: polygon.id,
          edge: i,
          floorPolygonId: floorEdge.polygonId,
          floorEdge: floorEdge.edge,
          portal: { left: layer.vertices[a], right: layer.vertices[b] },
        });
      }
    }
  }
  return seams;
}
