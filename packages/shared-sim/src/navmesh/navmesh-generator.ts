import type { ArenaLevel, CellCoord, NavLayer, NavPolygon, NavStitch, NavSurface, NavVertex } from "@arena/shared";
import {
  CELL_SIZE,
  CORNER_OFFSET,
  NavLayerId,
  OCCUPANCY_FLAGS,
  PLACEHOLDER_LAYER_ORIGIN,
  cellKey,
  hasFlag,
} from "@arena/shared";

/**
 * A lattice corner between cells. Corner (x, y) is the top-left corner of cell (x, y).
 */
export interface LatticeCorner {
  x: number;
  y: number;
}

/**
 * Thrown when a corner's adjacency pattern has no entry in the corner-offset table.
 * This is a level authoring error and aborts level setup.
 */
export class DegenerateTopologyError extends Error {
  readonly levelId: string;
  readonly corner: LatticeCorner;
  /** Cell whose occupancy mask described the corner. */
  readonly cell: CellCoord;

  constructor(levelId: string, corner: LatticeCorner, cell: CellCoord) {
    super(
      `Level "${levelId}": unsupported adjacency pattern at corner (${corner.x}, ${corner.y}) ` +
        `read from cell (${cell.col}, ${cell.row})`,
    );
    this.name = "DegenerateTopologyError";
    this.levelId = levelId;
    this.corner = corner;
    this.cell = cell;
  }
}

/**
 * Corner displacement keyed by the {top-left, top, left, center} occupancy of the
 * four cells around a corner, packed as TL << 3 | T << 2 | L << 1 | C.
 * Corners move toward occupied cells so quads keep away from walls.
 */
const CORNER_OFFSETS: readonly (readonly [number, number] | null)[] = [
  [0, 0], // ----
  [1, 1], // ---C
  [-1, 1], // --L-
  [0, 1], // --LC
  [1, -1], // -T--
  [1, 0], // -T-C
  null, // -TL-
  [1, 1], // -TLC
  [-1, -1], // X---
  null, // X--C
  [-1, 0], // X-L-
  [-1, 1], // X-LC
  [0, -1], // XT--
  [1, -1], // XT-C
  [-1, -1], // XTL-
  [0, 0], // XTLC
];

const PLACEHOLDER_SIZE = 0.00001;

interface CornerLookup {
  pattern: number;
  cell: CellCoord;
}

/**
 * Lists the lattice corners whose adjacency pattern cannot be represented.
 * An empty list means the level builds.
 */
export function findUnsupportedCorners(level: ArenaLevel): { corner: LatticeCorner; cell: CellCoord }[] {
  const unsupported: { corner: LatticeCorner; cell: CellCoord }[] = [];
  for (let y = 0; y <= level.rows; y++) {
    for (let x = 0; x <= level.columns; x++) {
      const lookup = readCornerPattern(level, x, y);
      if (CORNER_OFFSETS[lookup.pattern] === null) {
        unsupported.push({ corner: { x, y }, cell: lookup.cell });
      }
    }
  }
  return unsupported;
}

/**
 * Builds the multi-layer navigation surface for a level.
 * Floor, spawn and goal cells go to the floor layer unless excluded; portal
 * cells go to their own layers. The result never shares state with a
 * previous build.
 *
 * @param level - parsed level grid.
 * @param excluded - cells currently blocked by obstacles.
 * @returns a new immutable surface.
 * @throws DegenerateTopologyError when a corner pattern is unsupported.
 */
export function buildNavSurface(
  level: ArenaLevel,
  excluded: ReadonlyArray<CellCoord> = [],
): NavSurface {
  const lattice = computeLatticeVertices(level);
  const excludedKeys = new Set(excluded.map((cell) => cellKey(cell.col, cell.row)));

  const quads: CellQuad[][] = [[], [], []];
  const stride = level.columns + 1;

  for (let row = 0; row < level.rows; row++) {
    for (let col = 0; col < level.columns; col++) {
      const layerId = layerForCell(level, col, row, excludedKeys);
      if (layerId === null) {
        continue;
      }
      // Counter-clockwise viewed from above
      quads[layerId].push({
        cell: { col, row },
        corners: [
          col + 1 + stride * row,
          col + 1 + stride * (row + 1),
          col + stride * (row + 1),
          col + stride * row,
        ],
      });
    }
  }

  const layers: NavLayer[] = [NavLayerId.Floor, NavLayerId.PortalIn, NavLayerId.PortalOut].map(
    (layerId) =>
      quads[layerId].length > 0
        ? assembleLayer(layerId, lattice, quads[layerId])
        : createPlaceholderLayer(layerId),
  );

  return {
    layers,
    stitches: stitchPortalLayers(layers),
  };
}

// -- Private Interface

interface CellQuad {
  cell: CellCoord;
  /** Lattice vertex indices. */
  corners: [number, number, number, number];
}

interface LatticeVertex {
  position: NavVertex;
  /** Undisplaced lattice corner position. */
  origin: NavVertex;
}

function layerForCell(
  level: ArenaLevel,
  col: number,
  row: number,
  excludedKeys: Set<string>,
): NavLayerId | null {
  const cell = level.cells[row][col];
  switch (cell.kind) {
    case "empty":
      return null;
    case "portal-in":
      return NavLayerId.PortalIn;
    case "portal-out":
      return NavLayerId.PortalOut;
    case "floor":
    case "spawn":
    case "goal":
      return excludedKeys.has(cellKey(col, row)) ? null : NavLayerId.Floor;
  }
}

/**
 * Reads the four cells around a corner from the mask of an in-bounds neighbor.
 */
function readCornerPattern(level: ArenaLevel, x: number, y: number): CornerLookup {
  const pack = (mask: number, tl: number, t: number, l: number, c: number): number =>
    (hasFlag(mask, tl) ? 8 : 0) |
    (hasFlag(mask, t) ? 4 : 0) |
    (hasFlag(mask, l) ? 2 : 0) |
    (hasFlag(mask, c) ? 1 : 0);

  if (x < level.columns && y < level.rows) {
    const mask = level.neighborMasks[y][x];
    return { pattern: pack(mask, OCCUPANCY_FLAGS.TOP_LEFT, OCCUPANCY_FLAGS.TOP, OCCUPANCY_FLAGS.LEFT, OCCUPANCY_FLAGS.CENTER), cell: { col: x, row: y } };
  }
  if (y < level.rows) {
    const mask = level.neighborMasks[y][x - 1];
    return { pattern: pack(mask, OCCUPANCY_FLAGS.TOP, OCCUPANCY_FLAGS.TOP_RIGHT, OCCUPANCY_FLAGS.CENTER, OCCUPANCY_FLAGS.RIGHT), cell: { col: x - 1, row: y } };
  }
  if (x < level.columns) {
    const mask = level.neighborMasks[y - 1][x];
    return { pattern: pack(mask, OCCUPANCY_FLAGS.LEFT, OCCUPANCY_FLAGS.CENTER, OCCUPANCY_FLAGS.BOTTOM_LEFT, OCCUPANCY_FLAGS.BOTTOM), cell: { col: x, row: y - 1 } };
  }
  const mask = level.neighborMasks[y - 1][x - 1];
  return {
    pattern: pack(mask, OCCUPANCY_FLAGS.CENTER, OCCUPANCY_FLAGS.RIGHT, OCCUPANCY_FLAGS.BOTTOM, OCCUPANCY_FLAGS.BOTTOM_RIGHT),
    cell: { col: x - 1, row: y - 1 },
  };
}

function computeLatticeVertices(level: ArenaLevel): LatticeVertex[] {
  const half = CELL_SIZE / 2;
  const vertices: LatticeVertex[] = [];

  for (let y = 0; y <= level.rows; y++) {
    for (let x = 0; x <= level.columns; x++) {
      const lookup = readCornerPattern(level, x, y);
      const offset = CORNER_OFFSETS[lookup.pattern];
      if (offset === null) {
        throw new DegenerateTopologyError(level.id, { x, y }, lookup.cell);
      }
      const originX = x * CELL_SIZE - half;
      const originZ = y * CELL_SIZE - half;
      vertices.push({
        position: {
          x: originX + offset[0] * CORNER_OFFSET,
          y: 0,
          z: originZ + offset[1] * CORNER_OFFSET,
        },
        origin: { x: originX, y: 0, z: originZ },
      });
    }
  }

  return vertices;
}

/**
 * Quadrant of a polygon around a corner, counter-clockwise from +X/-Z.
 */
function quadrantOf(origin: NavVertex, centroid: NavVertex): number {
  if (centroid.x > origin.x) {
    return centroid.z < origin.z ? 0 : 1;
  }
  return centroid.z >= origin.z ? 2 : 3;
}

/**
 * Orders the polygons around each used vertex counter-clockwise and dedupes
 * gaps, so edge neighbors can be read off adjacent ring entries.
 */
function buildVertexRings(
  lattice: LatticeVertex[],
  quads: CellQuad[],
  centroids: NavVertex[],
): Map<number, number[]> {
  const quadrants = new Map<number, number[]>();

  quads.forEach((quad, polyId) => {
    for (const corner of quad.corners) {
      let slots = quadrants.get(corner);
      if (!slots) {
        slots = [-1, -1, -1, -1];
        quadrants.set(corner, slots);
      }
      slots[quadrantOf(lattice[corner].origin, centroids[polyId])] = polyId;
    }
  });

  const rings = new Map<number, number[]>();
  for (const [corner, slots] of quadrants) {
    const ring = slots.filter((polyId, i) => polyId !== slots[(i + slots.length - 1) % slots.length]);
    rings.set(corner, ring.length > 0 ? ring : [slots[0]]);
  }
  return rings;
}

/**
 * Neighbor across edge a -> b: the ring entry beside `polyId` around `a` that also touches `b`.
 */
function findEdgeNeighbor(
  rings: Map<number, number[]>,
  quads: CellQuad[],
  polyId: number,
  a: number,
  b: number,
): number {
  const ring = rings.get(a) ?? [];
  const index = ring.indexOf(polyId);
  if (index < 0 || ring.length < 2) {
    return -1;
  }

  const candidates = [ring[(index + 1) % ring.length], ring[(index + ring.length - 1) % ring.length]];
  for (const candidate of candidates) {
    if (candidate >= 0 && candidate !== polyId && quads[candidate].corners.includes(b)) {
      return candidate;
    }
  }
  return -1;
}

function assembleLayer(layerId: NavLayerId, lattice: LatticeVertex[], quads: CellQuad[]): NavLayer {
  const centroids = quads.map((quad) => {
    let x = 0;
    let z = 0;
    for (const corner of quad.corners) {
      x += lattice[corner].position.x;
      z += lattice[corner].position.z;
    }
    return { x: x / quad.corners.length, y: 0, z: z / quad.corners.length };
  });

  const rings = buildVertexRings(lattice, quads, centroids);

  // Strip lattice vertices no polygon touches, keeping lattice order
  const remap = new Map<number, number>();
  const vertices: NavVertex[] = [];
  lattice.forEach((vertex, latticeIndex) => {
    if (rings.has(latticeIndex)) {
      remap.set(latticeIndex, vertices.length);
      vertices.push({ ...vertex.position });
    }
  });

  const polygons: NavPolygon[] = quads.map((quad, polyId) => {
    const n = quad.corners.length;
    return {
      id: polyId,
      vertexIndices: quad.corners.map((corner) => remap.get(corner) ?? -1),
      neighbors: quad.corners.map((corner, i) =>
        findEdgeNeighbor(rings, quads, polyId, corner, quad.corners[(i + 1) % n]),
      ),
      cell: { ...quad.cell },
    };
  });

  return {
    id: layerId,
    vertices,
    polygons,
    bounds: computeBounds(vertices),
    placeholder: false,
  };
}

function createPlaceholderLayer(layerId: NavLayerId): NavLayer {
  const origin = PLACEHOLDER_LAYER_ORIGIN;
  const vertices: NavVertex[] = [
    { x: origin, y: 0, z: origin },
    { x: origin + PLACEHOLDER_SIZE, y: 0, z: origin },
    { x: origin + PLACEHOLDER_SIZE, y: 0, z: origin + PLACEHOLDER_SIZE },
  ];
  return {
    id: layerId,
    vertices,
    polygons: [{ id: 0, vertexIndices: [0, 1, 2], neighbors: [-1, -1, -1], cell: null }],
    bounds: computeBounds(vertices),
    placeholder: true,
  };
}

function computeBounds(vertices: NavVertex[]): NavLayer["bounds"] {
  let minX = Infinity;
  let maxX = -Infinity;
  let minZ = Infinity;
  let maxZ = -Infinity;
  for (const vertex of vertices) {
    minX = Math.min(minX, vertex.x);
    maxX = Math.max(maxX, vertex.x);
    minZ = Math.min(minZ, vertex.z);
    maxZ = Math.max(maxZ, vertex.z);
  }
  return { minX, maxX, minZ, maxZ };
}

function vertexKey(vertex: NavVertex): string {
  return `${vertex.x.toFixed(4)},${vertex.z.toFixed(4)}`;
}

function stitchPortalLayers(layers: NavLayer[]): NavStitch[] {
  const floorVertices = new Map<string, number>();
  layers[NavLayerId.Floor].vertices.forEach((vertex, index) => {
    floorVertices.set(vertexKey(vertex), index);
  });

  const stitches: NavStitch[] = [];
  for (const layerId of [NavLayerId.PortalIn, NavLayerId.PortalOut]) {
    const layer = layers[layerId];
    if (layer.placeholder) {
      continue;
    }
    layer.vertices.forEach((vertex, index) => {
      const floorVertex = floorVertices.get(vertexKey(vertex));
      if (floorVertex !== undefined) {
        stitches.push({ layer: layerId, vertex: index, floorVertex });
      }
    });
  }
  return stitches;
}
