/**
 * Closest positive ray hit over a chunk's triangle list.
 *
 * The index buffer is scanned one grid cell (6 indices, 2 triangles) at a
 * time. Each cell's index run is [v00, v01, v11, v00, v11, v10], so the four
 * distinct corners sit at offsets 0, 1, 2 and 5.
 *
 * The scan stops at MESH_PROBE_SCAN_LIMIT indices (1024 cells) unless the
 * caller passes another limit. A chunk larger than that is only partly
 * scanned; hits in the cells past the limit are not reported.
 *
 * Result slot 0 receives the smallest t > 0, or NO_HIT_DISTANCE.
 */

import {
  dispatchSingle,
  dispatchWorkgroups,
  workgroupsFor,
  type Invocation,
} from '../compute/dispatch';
import {
  INDICES_PER_CELL,
  NO_HIT_DISTANCE,
  createResultBuffer,
  readPosition,
  type MeshBuffers,
} from '../compute/layout';
import { intersectRayTriangle, type Ray } from './rayTriangle';

/** Default scan bound: one 32×32 chunk. */
export const MESH_PROBE_SCAN_LIMIT = 6144;

export const PROBE_WORKGROUP_SIZE = 64;

// ── Types ───────────────────────────────────────────────────────────

export interface MeshProbeBindings extends MeshBuffers {
  ray: Ray;
  result: Float32Array;
  scanLimit: number;
}

export interface CellProbeBindings extends MeshBuffers {
  ray: Ray;
  partials: Float32Array;
  scanLimit: number;
}

export interface ReduceBindings {
  partials: Float32Array;
  result: Float32Array;
}

export interface MeshProbeOptions {
  scanLimit?: number;
}

// ── Cell test ───────────────────────────────────────────────────────

/** Number of whole cells the scan visits for a given bound and buffer. */
export function scannedCells(scanLimit: number, indexLength: number): number {
  let cells = 0;
  for (let i = 0; i < scanLimit && i + INDICES_PER_CELL <= indexLength; i += INDICES_PER_CELL) {
    cells++;
  }
  return cells;
}

/**
 * Closest positive hit among the two triangles of the cell whose index run
 * starts at `start`, or NO_HIT_DISTANCE.
 */
export function cellClosestHit(ray: Ray, vertices: Float32Array, indices: Uint32Array, start: number): number {
  const p00 = readPosition(vertices, indices[start]);
  const p01 = readPosition(vertices, indices[start + 1]);
  const p11 = readPosition(vertices, indices[start + 2]);
  const p10 = readPosition(vertices, indices[start + 5]);

  let closest = NO_HIT_DISTANCE;

  const t0 = intersectRayTriangle(ray, p00, p01, p11);
  if (t0 > 0.0 && t0 < closest) closest = t0;

  const t1 = intersectRayTriangle(ray, p00, p11, p10);
  if (t1 > 0.0 && t1 < closest) closest = t1;

  return closest;
}

// ── Serial kernel ───────────────────────────────────────────────────

/** Dispatched as a single invocation. */
export function meshProbeKernel(_invocation: Invocation, bindings: MeshProbeBindings): void {
  const { ray, vertices, indices, result, scanLimit } = bindings;
  let closest = NO_HIT_DISTANCE;

  for (let i = 0; i < scanLimit && i + INDICES_PER_CELL <= indices.length; i += INDICES_PER_CELL) {
    const t = cellClosestHit(ray, vertices, indices, i);
    if (t < closest) closest = t;
  }

  result[0] = closest;
}

// ── Two-pass reduction ──────────────────────────────────────────────

/** Pass 1: invocation i writes cell i's closest hit into partials[i]. */
export function cellProbeKernel({ globalId }: Invocation, bindings: CellProbeBindings): void {
  const { ray, vertices, indices, partials } = bindings;
  if (globalId >= partials.length) return;

  partials[globalId] = cellClosestHit(ray, vertices, indices, globalId * INDICES_PER_CELL);
}

/** Pass 2: single invocation folding the partial minima. */
export function reduceMinKernel(_invocation: Invocation, bindings: ReduceBindings): void {
  const { partials, result } = bindings;
  let closest = NO_HIT_DISTANCE;

  for (let i = 0; i < partials.length; i++) {
    if (partials[i] < closest) closest = partials[i];
  }

  result[0] = closest;
}

// ── Host entry points ───────────────────────────────────────────────

/** Serial probe; returns result slot 0. */
export function probeMesh(ray: Ray, mesh: MeshBuffers, options: MeshProbeOptions = {}): number {
  const result = createResultBuffer();
  dispatchSingle(meshProbeKernel, {
    ray,
    vertices: mesh.vertices,
    indices: mesh.indices,
    result,
    scanLimit: options.scanLimit ?? MESH_PROBE_SCAN_LIMIT,
  });
  return result[0];
}

/**
 * Same query as probeMesh, split into one invocation per cell and a final
 * single-invocation reduction.
 */
export function probeMeshParallel(ray: Ray, mesh: MeshBuffers, options: MeshProbeOptions = {}): number {
  const scanLimit = options.scanLimit ?? MESH_PROBE_SCAN_LIMIT;
  const cells = scannedCells(scanLimit, mesh.indices.length);
  const partials = new Float32Array(cells);
  const result = createResultBuffer();

  dispatchWorkgroups(
    cellProbeKernel,
    { ray, vertices: mesh.vertices, indices: mesh.indices, partials, scanLimit },
    { workgroupSize: PROBE_WORKGROUP_SIZE, workgroupCount: workgroupsFor(cells, PROBE_WORKGROUP_SIZE) },
  );
  dispatchSingle(reduceMinKernel, { partials, result });

  return result[0];
}
