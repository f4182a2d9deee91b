/**
 * Fixed-layout binding points shared by the kernels and the host.
 *
 * Every buffer is a typed-array view over an ArrayBuffer, laid out exactly as a
 * compute device would see it:
 *
 *   vertex   32 bytes / vertex   position f32×3 @0, pad, normal f32×3 @16, pad
 *   index    u32 triangle list   6 entries per grid cell
 *   result   f32 array           closest distance at slot 0
 *   chunk    24-byte uniform     u32×2 size, i32×2 corner, f32×2 min/max height
 *   camera   80-byte uniform     f32×4 view position, f32×16 view-proj (column-major)
 */

import type { ReadonlyMat4, ReadonlyVec3, ReadonlyVec4 } from 'gl-matrix';

// ── Constants ───────────────────────────────────────────────────────

export const VERTEX_STRIDE_BYTES = 32;
export const VERTEX_STRIDE_FLOATS = VERTEX_STRIDE_BYTES / Float32Array.BYTES_PER_ELEMENT;
export const NORMAL_OFFSET_FLOATS = 4;
export const INDICES_PER_CELL = 6;

export const CHUNK_UNIFORM_BYTES = 24;
export const CAMERA_UNIFORM_BYTES = 80;

/** Returned by the intersector when a triangle is not hit. */
export const NO_HIT = -1.0;

/** Left in result slot 0 when a probe found no positive hit. */
export const NO_HIT_DISTANCE = Math.fround(1e38);

export const I32_MIN = -0x80000000;
export const I32_MAX = 0x7fffffff;
const U32_MAX = 0xffffffff;

// ── Types ───────────────────────────────────────────────────────────

export type Vec2 = readonly [number, number];

export interface ChunkDescriptor {
  /** Grid cells along x and y (u32) */
  chunkSize: Vec2;
  /** Lattice offset of the chunk's first vertex (i32) */
  chunkCorner: Vec2;
  /** Height range the noise blend is mapped into (f32) */
  minMaxHeight: Vec2;
}

export interface Vertex {
  position: [number, number, number];
  normal: [number, number, number];
}

export interface CameraState {
  viewPos: ReadonlyVec4;
  viewProj: ReadonlyMat4;
}

export interface MeshBuffers {
  vertices: Float32Array;
  indices: Uint32Array;
}

// ── Sizes ───────────────────────────────────────────────────────────

export function vertexCount(chunkSize: Vec2): number {
  return (chunkSize[0] + 1) * (chunkSize[1] + 1);
}

export function indexCount(chunkSize: Vec2): number {
  return chunkSize[0] * chunkSize[1] * INDICES_PER_CELL;
}

export function vertexBufferBytes(chunkSize: Vec2): number {
  return vertexCount(chunkSize) * VERTEX_STRIDE_BYTES;
}

export function indexBufferBytes(chunkSize: Vec2): number {
  return indexCount(chunkSize) * Uint32Array.BYTES_PER_ELEMENT;
}

// ── Allocation ──────────────────────────────────────────────────────

export function createMeshBuffers(chunkSize: Vec2): MeshBuffers {
  return {
    vertices: new Float32Array(vertexBufferBytes(chunkSize) / Float32Array.BYTES_PER_ELEMENT),
    indices: new Uint32Array(indexCount(chunkSize)),
  };
}

export function createResultBuffer(slots: number = 1): Float32Array {
  return new Float32Array(slots);
}

// ── Vertex records ──────────────────────────────────────────────────

export function writeVertex(vertices: Float32Array, index: number, vertex: Vertex): void {
  const base = index * VERTEX_STRIDE_FLOATS;
  vertices[base] = vertex.position[0];
  vertices[base + 1] = vertex.position[1];
  vertices[base + 2] = vertex.position[2];
  vertices[base + NORMAL_OFFSET_FLOATS] = vertex.normal[0];
  vertices[base + NORMAL_OFFSET_FLOATS + 1] = vertex.normal[1];
  vertices[base + NORMAL_OFFSET_FLOATS + 2] = vertex.normal[2];
}

export function readVertex(vertices: Float32Array, index: number): Vertex {
  const base = index * VERTEX_STRIDE_FLOATS;
  return {
    position: [vertices[base], vertices[base + 1], vertices[base + 2]],
    normal: [
      vertices[base + NORMAL_OFFSET_FLOATS],
      vertices[base + NORMAL_OFFSET_FLOATS + 1],
      vertices[base + NORMAL_OFFSET_FLOATS + 2],
    ],
  };
}

/** Position of vertex `index` as a 3-tuple (no normal). */
export function readPosition(vertices: Float32Array, index: number): ReadonlyVec3 {
  const base = index * VERTEX_STRIDE_FLOATS;
  return [vertices[base], vertices[base + 1], vertices[base + 2]];
}

// ── Uniform codecs ──────────────────────────────────────────────────

function assertInteger(name: string, value: number, min: number, max: number): void {
  if (!Number.isInteger(value) || value < min || value > max) {
    throw new RangeError(`${name} must be an integer in [${min}, ${max}], got ${value}`);
  }
}

export function encodeChunkDescriptor(descriptor: ChunkDescriptor): ArrayBuffer {
  const { chunkSize, chunkCorner, minMaxHeight } = descriptor;

  assertInteger('chunkSize.x', chunkSize[0], 0, U32_MAX);
  assertInteger('chunkSize.y', chunkSize[1], 0, U32_MAX);
  assertInteger('chunkCorner.x', chunkCorner[0], I32_MIN, I32_MAX);
  assertInteger('chunkCorner.y', chunkCorner[1], I32_MIN, I32_MAX);
  if (!Number.isFinite(minMaxHeight[0]) || !Number.isFinite(minMaxHeight[1])) {
    throw new RangeError(`minMaxHeight must be finite, got [${minMaxHeight[0]}, ${minMaxHeight[1]}]`);
  }

  const buffer = new ArrayBuffer(CHUNK_UNIFORM_BYTES);
  const view = new DataView(buffer);
  view.setUint32(0, chunkSize[0], true);
  view.setUint32(4, chunkSize[1], true);
  view.setInt32(8, chunkCorner[0], true);
  view.setInt32(12, chunkCorner[1], true);
  view.setFloat32(16, minMaxHeight[0], true);
  view.setFloat32(20, minMaxHeight[1], true);
  return buffer;
}

export function decodeChunkDescriptor(buffer: ArrayBuffer): ChunkDescriptor {
  if (buffer.byteLength < CHUNK_UNIFORM_BYTES) {
    throw new RangeError(`Chunk uniform needs ${CHUNK_UNIFORM_BYTES} bytes, got ${buffer.byteLength}`);
  }
  const view = new DataView(buffer);
  return {
    chunkSize: [view.getUint32(0, true), view.getUint32(4, true)],
    chunkCorner: [view.getInt32(8, true), view.getInt32(12, true)],
    minMaxHeight: [view.getFloat32(16, true), view.getFloat32(20, true)],
  };
}

export function encodeCameraUniform(camera: CameraState): ArrayBuffer {
  const buffer = new ArrayBuffer(CAMERA_UNIFORM_BYTES);
  const floats = new Float32Array(buffer);
  for (let i = 0; i < 4; i++) floats[i] = camera.viewPos[i];
  for (let i = 0; i < 16; i++) floats[4 + i] = camera.viewProj[i];
  return buffer;
}

export function decodeCameraUniform(buffer: ArrayBuffer): CameraState {
  if (buffer.byteLength < CAMERA_UNIFORM_BYTES) {
    throw new RangeError(`Camera uniform needs ${CAMERA_UNIFORM_BYTES} bytes, got ${buffer.byteLength}`);
  }
  const floats = new Float32Array(buffer, 0, CAMERA_UNIFORM_BYTES / Float32Array.BYTES_PER_ELEMENT);
  return {
    viewPos: floats.slice(0, 4),
    viewProj: floats.slice(4, 20),
  };
}
