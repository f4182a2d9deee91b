export { type Ray, PARALLEL_EPSILON, intersectRayTriangle } from './rayTriangle';

export { DOWN, downwardRay, pickRay } from './ray';

export {
  type MeshProbeBindings,
  type CellProbeBindings,
  type ReduceBindings,
  type MeshProbeOptions,
  MESH_PROBE_SCAN_LIMIT,
  PROBE_WORKGROUP_SIZE,
  scannedCells,
  cellClosestHit,
  meshProbeKernel,
  cellProbeKernel,
  reduceMinKernel,
  probeMesh,
  probeMeshParallel,
} from './meshProbe';

export {
  type PlaneProbeVariant,
  type PlaneProbeBindings,
  PLANE_PROBE_PLACEHOLDER,
  planeProbeKernel,
  probePlane,
} from './planeProbe';
