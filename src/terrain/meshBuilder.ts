/**
 * Terrain mesh builder — one kernel invocation per lattice vertex.
 *
 * Invocation i owns exactly:
 *   - vertex slot i
 *   - index slots 6i .. 6i+5 (only when i < w·h)
 *
 * and reads nothing another invocation writes: heights depend on world
 * position alone. That ownership map is what lets every invocation run in
 * parallel without synchronisation.
 *
 * ownedSlots() is the single source of those destinations; the kernel writes
 * nowhere else.
 *
 * Index emission uses the invocation id as a cell id. The vertex lattice is
 * (w+1) wide while the cell grid is w wide, so the cell's lower-left vertex
 * is i + ⌊i / w⌋.
 */

import {
  dispatchWorkgroups,
  workgroupsFor,
  type DispatchOrder,
  type DispatchStats,
  type Invocation,
} from '../compute/dispatch';
import {
  INDICES_PER_CELL,
  VERTEX_STRIDE_FLOATS,
  createMeshBuffers,
  indexCount,
  vertexCount,
  writeVertex,
  type ChunkDescriptor,
  type MeshBuffers,
  type Vec2,
} from '../compute/layout';
import { terrainVertex } from './heightSampler';

export const TERRAIN_WORKGROUP_SIZE = 64;

// ── Types ───────────────────────────────────────────────────────────

export interface TerrainKernelBindings extends MeshBuffers {
  chunk: ChunkDescriptor;
}

export interface BuildTerrainOptions {
  workgroupSize?: number;
  order?: DispatchOrder;
}

export interface TerrainMesh extends MeshBuffers {
  descriptor: ChunkDescriptor;
  stats: DispatchStats;
}

// ── Lattice helpers ─────────────────────────────────────────────────

/** Lattice position of vertex `vertIndex`, offset by the chunk corner. */
export function indexToLattice(vertIndex: number, chunkSize: Vec2, chunkCorner: Vec2): [number, number] {
  const rowWidth = chunkSize[0] + 1;
  return [
    (vertIndex % rowWidth) + chunkCorner[0],
    Math.floor(vertIndex / rowWidth) + chunkCorner[1],
  ];
}

/** Corner vertex indices (v00, v10, v01, v11) of cell `cellIndex`. */
export function cellCorners(cellIndex: number, chunkSize: Vec2): [number, number, number, number] {
  const w = chunkSize[0];
  const v00 = cellIndex + Math.floor(cellIndex / w);
  const v10 = v00 + 1;
  const v01 = v00 + w + 1;
  const v11 = v01 + 1;
  return [v00, v10, v01, v11];
}

/** Output slots written by one invocation; the index range is empty past the last cell. */
export interface OwnedSlots {
  vertex: number;
  indexStart: number;
  /** Exclusive */
  indexEnd: number;
}

/**
 * Slots invocation `invocationId` writes, or null when the id lies past the
 * last vertex (dispatches are rounded up to whole workgroups).
 */
export function ownedSlots(invocationId: number, chunkSize: Vec2): OwnedSlots | null {
  if (invocationId >= vertexCount(chunkSize)) return null;

  const indexStart = invocationId * INDICES_PER_CELL;
  if (indexStart >= indexCount(chunkSize)) {
    return { vertex: invocationId, indexStart, indexEnd: indexStart };
  }
  return { vertex: invocationId, indexStart, indexEnd: indexStart + INDICES_PER_CELL };
}

// ── Kernel ──────────────────────────────────────────────────────────

export function genTerrainKernel({ globalId }: Invocation, bindings: TerrainKernelBindings): void {
  const { chunk, vertices, indices } = bindings;
  const slots = ownedSlots(globalId, chunk.chunkSize);
  if (!slots) return;

  const [px, py] = indexToLattice(slots.vertex, chunk.chunkSize, chunk.chunkCorner);
  writeVertex(vertices, slots.vertex, terrainVertex(px, py, chunk.minMaxHeight));

  if (slots.indexEnd === slots.indexStart) return;

  const [v00, v10, v01, v11] = cellCorners(globalId, chunk.chunkSize);
  const start = slots.indexStart;

  indices[start] = v00;
  indices[start + 1] = v01;
  indices[start + 2] = v11;
  indices[start + 3] = v00;
  indices[start + 4] = v11;
  indices[start + 5] = v10;
}

// ── Host entry point ────────────────────────────────────────────────

/**
 * Allocate fresh buffers for `descriptor` and fill them with one dispatch.
 */
export function buildTerrainMesh(descriptor: ChunkDescriptor, options: BuildTerrainOptions = {}): TerrainMesh {
  const buffers = createMeshBuffers(descriptor.chunkSize);
  const stats = dispatchTerrain(descriptor, buffers, options);
  return { ...buffers, descriptor, stats };
}

/**
 * Fill existing buffers for `descriptor`. Buffers are overwritten in place,
 * never resized; they must hold at least one chunk of this size.
 */
export function dispatchTerrain(
  descriptor: ChunkDescriptor,
  buffers: MeshBuffers,
  options: BuildTerrainOptions = {},
): DispatchStats {
  const { workgroupSize = TERRAIN_WORKGROUP_SIZE, order } = options;
  const numVertices = vertexCount(descriptor.chunkSize);
  const numIndices = indexCount(descriptor.chunkSize);

  if (buffers.vertices.length < numVertices * VERTEX_STRIDE_FLOATS) {
    throw new RangeError(`Vertex buffer too small for ${numVertices} vertices`);
  }
  if (buffers.indices.length < numIndices) {
    throw new RangeError(`Index buffer too small for ${numIndices} indices`);
  }

  return dispatchWorkgroups(
    genTerrainKernel,
    { chunk: descriptor, vertices: buffers.vertices, indices: buffers.indices },
    { workgroupSize, workgroupCount: workgroupsFor(numVertices, workgroupSize), order },
  );
}
