/**
 * Host side of the probe kernels.
 *
 * Owns one chunk's worth of vertex and index buffers plus the result and
 * camera buffers. A mesh query uploads a chunk's raw bytes into those
 * buffers, dispatches the mesh probe as a single invocation and reads back
 * result slot 0. The buffers are reused across queries and never resized.
 */

import { dispatchSingle } from '../compute/dispatch';
import {
  CAMERA_UNIFORM_BYTES,
  NO_HIT_DISTANCE,
  createMeshBuffers,
  createResultBuffer,
  decodeCameraUniform,
  encodeCameraUniform,
  type CameraState,
  type MeshBuffers,
  type Vec2,
} from '../compute/layout';
import {
  downwardRay,
  meshProbeKernel,
  planeProbeKernel,
  MESH_PROBE_SCAN_LIMIT,
  type PlaneProbeVariant,
  type Ray,
} from '../probe';
import type { RawChunkData } from './terrainPipeline';
import { createLogger } from '../logging';

const log = createLogger('Probe');

// ── Types ───────────────────────────────────────────────────────────

/**
 * "fixed" scans at most MESH_PROBE_SCAN_LIMIT indices (one 32×32 chunk);
 * "buffer" scans the whole index buffer.
 */
export type ScanMode = 'fixed' | 'buffer';

export interface RayIntersectPipelineConfig {
  chunkSize: Vec2;
  scanMode?: ScanMode;
  planeVariant?: PlaneProbeVariant;
}

export interface ProbeResult {
  distance: number;
  hit: boolean;
}

// ── Helpers ─────────────────────────────────────────────────────────

export function scanLimitFor(mode: ScanMode, indexLength: number): number {
  return mode === 'buffer' ? indexLength : MESH_PROBE_SCAN_LIMIT;
}

export function toProbeResult(distance: number): ProbeResult {
  return { distance, hit: distance < NO_HIT_DISTANCE };
}

// ── Pipeline ────────────────────────────────────────────────────────

export class RayIntersectPipeline {
  readonly chunkSize: Vec2;
  readonly scanMode: ScanMode;
  readonly planeVariant: PlaneProbeVariant;

  private readonly buffers: MeshBuffers;
  private readonly result: Float32Array;
  private readonly cameraUniform: ArrayBuffer;

  constructor(config: RayIntersectPipelineConfig) {
    this.chunkSize = [config.chunkSize[0], config.chunkSize[1]];
    this.scanMode = config.scanMode ?? 'fixed';
    this.planeVariant = config.planeVariant ?? 'camera-height';

    this.buffers = createMeshBuffers(this.chunkSize);
    this.result = createResultBuffer();
    this.cameraUniform = new ArrayBuffer(CAMERA_UNIFORM_BYTES);

    if (this.scanMode === 'fixed' && this.buffers.indices.length > MESH_PROBE_SCAN_LIMIT) {
      log.warn(
        `Chunk has ${this.buffers.indices.length} indices; the fixed scan covers only the first ` +
        `${MESH_PROBE_SCAN_LIMIT}. Hits beyond that are not reported.`,
      );
    }
  }

  get scanLimit(): number {
    return scanLimitFor(this.scanMode, this.buffers.indices.length);
  }

  /** Copy raw chunk bytes into the pipeline's buffers. Sizes must match exactly. */
  upload(raw: RawChunkData): void {
    const { vertices, indices } = this.buffers;

    if (raw.vertexData.byteLength !== vertices.byteLength) {
      throw new RangeError(
        `Vertex data is ${raw.vertexData.byteLength} bytes; pipeline expects ${vertices.byteLength}`,
      );
    }
    if (raw.indexData.byteLength !== indices.byteLength) {
      throw new RangeError(
        `Index data is ${raw.indexData.byteLength} bytes; pipeline expects ${indices.byteLength}`,
      );
    }

    new Uint8Array(vertices.buffer, vertices.byteOffset, vertices.byteLength).set(raw.vertexData);
    new Uint8Array(indices.buffer, indices.byteOffset, indices.byteLength).set(raw.indexData);
  }

  /** Closest positive hit of `ray` against the uploaded chunk. */
  rayIntersect(raw: RawChunkData, ray: Ray): number {
    this.upload(raw);

    dispatchSingle(meshProbeKernel, {
      ray,
      vertices: this.buffers.vertices,
      indices: this.buffers.indices,
      result: this.result,
      scanLimit: this.scanLimit,
    });

    return this.readResult();
  }

  /** Mesh probe straight down from the camera. */
  probeBelowCamera(raw: RawChunkData, camera: CameraState): number {
    return this.rayIntersect(raw, downwardRay(this.writeCamera(camera)));
  }

  planeProbe(camera: CameraState): number {
    dispatchSingle(planeProbeKernel, {
      camera: this.writeCamera(camera),
      result: this.result,
      variant: this.planeVariant,
    });

    return this.readResult();
  }

  /** Copy of result slot 0. */
  readResult(): number {
    return this.result[0];
  }

  /** Write the camera uniform and return the record the kernels bind. */
  private writeCamera(camera: CameraState): CameraState {
    new Uint8Array(this.cameraUniform).set(new Uint8Array(encodeCameraUniform(camera)));
    return decodeCameraUniform(this.cameraUniform);
  }
}
