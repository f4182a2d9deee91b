export {
  type TerrainPipelineConfig,
  type ChunkMesh,
  type RawChunkData,
  TerrainPipeline,
} from './terrainPipeline';

export {
  type ScanMode,
  type RayIntersectPipelineConfig,
  type ProbeResult,
  scanLimitFor,
  toProbeResult,
  RayIntersectPipeline,
} from './rayIntersectPipeline';
