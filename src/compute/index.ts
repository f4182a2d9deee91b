export {
  type Invocation,
  type ComputeKernel,
  type DispatchOrder,
  type DispatchOptions,
  type DispatchStats,
  workgroupsFor,
  dispatchWorkgroups,
  dispatchSingle,
} from './dispatch';

export {
  type Vec2,
  type ChunkDescriptor,
  type Vertex,
  type CameraState,
  type MeshBuffers,
  VERTEX_STRIDE_BYTES,
  VERTEX_STRIDE_FLOATS,
  NORMAL_OFFSET_FLOATS,
  INDICES_PER_CELL,
  CHUNK_UNIFORM_BYTES,
  CAMERA_UNIFORM_BYTES,
  NO_HIT,
  NO_HIT_DISTANCE,
  I32_MIN,
  I32_MAX,
  vertexCount,
  indexCount,
  vertexBufferBytes,
  indexBufferBytes,
  createMeshBuffers,
  createResultBuffer,
  writeVertex,
  readVertex,
  readPosition,
  encodeChunkDescriptor,
  decodeChunkDescriptor,
  encodeCameraUniform,
  decodeCameraUniform,
} from './layout';
