import { Router, Request, Response } from 'express';
import { getConfig } from '../config';
import { MESH_PROBE_SCAN_LIMIT } from '../probe';

const router = Router();

router.get('/', (req: Request, res: Response) => {
  const config = getConfig();

  res.status(200).json({
    terrain: {
      chunkSize: [config.terrain.chunkSize.x, config.terrain.chunkSize.y],
      minMaxHeight: [config.terrain.minMaxHeight.min, config.terrain.minMaxHeight.max],
      workgroupSize: config.terrain.workgroupSize,
      verticesPerChunk: config.derived.verticesPerChunk,
      indicesPerChunk: config.derived.indicesPerChunk,
      vertexBufferBytes: config.derived.vertexBufferBytes,
      indexBufferBytes: config.derived.indexBufferBytes,
      workgroupsPerChunk: config.derived.workgroupsPerChunk,
    },
    probe: {
      scanMode: config.probe.scanMode,
      scanLimit: config.derived.scanLimit,
      fixedScanLimit: MESH_PROBE_SCAN_LIMIT,
      scanTruncates: config.derived.scanTruncates,
      planeVariant: config.probe.planeVariant,
    },
  });
});

export default router;
