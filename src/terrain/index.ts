export { snoise2, permute, NOISE_PERIOD } from './simplex2d';

export { fbm, NUM_OCTAVES, FBM_INPUT_SCALE, FBM_SHIFT, FBM_ROTATION } from './fbm';

export { lerp, terrainPoint, terrainVertex, NORMAL_SAMPLE_OFFSET } from './heightSampler';

export {
  type TerrainKernelBindings,
  type BuildTerrainOptions,
  type TerrainMesh,
  type OwnedSlots,
  TERRAIN_WORKGROUP_SIZE,
  indexToLattice,
  cellCorners,
  ownedSlots,
  genTerrainKernel,
  buildTerrainMesh,
  dispatchTerrain,
} from './meshBuilder';
