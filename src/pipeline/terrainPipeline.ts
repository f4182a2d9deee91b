/**
 * Host side of chunk generation.
 *
 * Holds the chunk dimensions and height range shared by every chunk, and
 * for each requested corner: writes the chunk uniform, allocates labelled
 * vertex/index buffers and dispatches the mesh builder with one invocation
 * per vertex. Generation is stateless; asking for the same corner twice
 * produces identical buffers.
 */

import {
  decodeChunkDescriptor,
  encodeChunkDescriptor,
  indexCount,
  type ChunkDescriptor,
  type MeshBuffers,
  type Vec2,
} from '../compute/layout';
import { buildTerrainMesh, TERRAIN_WORKGROUP_SIZE } from '../terrain';
import { createLogger } from '../logging';

const log = createLogger('Terrain');

// ── Types ───────────────────────────────────────────────────────────

export interface TerrainPipelineConfig {
  chunkSize: Vec2;
  minMaxHeight: Vec2;
  workgroupSize?: number;
}

export interface ChunkMesh extends MeshBuffers {
  /** e.g. "Chunk [0, -32]" */
  name: string;
  corner: Vec2;
  descriptor: ChunkDescriptor;
  /** Index count, as drawn */
  numElements: number;
}

/** Byte copies of a chunk's buffers, as read back from the device. */
export interface RawChunkData {
  vertexData: Uint8Array;
  indexData: Uint8Array;
}

// ── Pipeline ────────────────────────────────────────────────────────

export class TerrainPipeline {
  readonly chunkSize: Vec2;
  readonly minMaxHeight: Vec2;
  readonly workgroupSize: number;

  constructor(config: TerrainPipelineConfig) {
    this.chunkSize = [config.chunkSize[0], config.chunkSize[1]];
    this.minMaxHeight = [config.minMaxHeight[0], config.minMaxHeight[1]];
    this.workgroupSize = config.workgroupSize ?? TERRAIN_WORKGROUP_SIZE;
  }

  /** Chunk uniform bytes for `corner`. Throws RangeError on bad values. */
  chunkUniform(corner: Vec2): ArrayBuffer {
    return encodeChunkDescriptor({
      chunkSize: this.chunkSize,
      chunkCorner: corner,
      minMaxHeight: this.minMaxHeight,
    });
  }

  genChunk(corner: Vec2): ChunkMesh {
    const name = `Chunk [${corner[0]}, ${corner[1]}]`;
    const descriptor = decodeChunkDescriptor(this.chunkUniform(corner));

    const mesh = buildTerrainMesh(descriptor, { workgroupSize: this.workgroupSize });

    log.debug(
      `${name}: ${mesh.stats.workgroups} workgroups × ${this.workgroupSize}, ` +
      `${mesh.vertices.byteLength} vertex bytes, ${mesh.indices.byteLength} index bytes`,
    );

    return {
      name,
      corner: [corner[0], corner[1]],
      descriptor,
      vertices: mesh.vertices,
      indices: mesh.indices,
      numElements: indexCount(descriptor.chunkSize),
    };
  }

  /** Copy a chunk's buffers out as raw bytes. */
  snapshot(mesh: MeshBuffers): RawChunkData {
    return {
      vertexData: new Uint8Array(mesh.vertices.buffer, mesh.vertices.byteOffset, mesh.vertices.byteLength).slice(),
      indexData: new Uint8Array(mesh.indices.buffer, mesh.indices.byteOffset, mesh.indices.byteLength).slice(),
    };
  }
}
