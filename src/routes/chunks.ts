import { Router, Request, Response } from 'express';
import { z } from 'zod';
import { getTerrain } from '../world';
import { readVertex, vertexCount } from '../compute';
import { formatRequestIssues, Int32Schema } from './requestIssues';

const router = Router();

const I32 = z.coerce.number().pipe(Int32Schema);

export const ChunkParamsSchema = z.object({
  x: I32,
  y: I32,
});

export const ChunkQuerySchema = z.object({
  include: z.enum(['summary', 'mesh']).default('summary'),
});

router.get('/:x/:y', (req: Request, res: Response) => {
  const terrain = getTerrain();

  if (!terrain) {
    res.status(503).json({ error: 'Terrain is not initialized' });
    return;
  }

  const params = ChunkParamsSchema.safeParse(req.params);
  const query = ChunkQuerySchema.safeParse(req.query);
  if (!params.success || !query.success) {
    const issues = [
      ...(params.success ? [] : formatRequestIssues(params.error)),
      ...(query.success ? [] : formatRequestIssues(query.error)),
    ];
    res.status(400).json({ error: 'Invalid chunk request', issues });
    return;
  }

  const chunk = terrain.terrainPipeline.genChunk([params.data.x, params.data.y]);
  const numVertices = vertexCount(chunk.descriptor.chunkSize);

  let minHeight = Infinity;
  let maxHeight = -Infinity;
  const positions: number[] = [];
  const normals: number[] = [];

  for (let i = 0; i < numVertices; i++) {
    const { position, normal } = readVertex(chunk.vertices, i);
    if (position[1] < minHeight) minHeight = position[1];
    if (position[1] > maxHeight) maxHeight = position[1];
    positions.push(...position);
    normals.push(...normal);
  }

  res.status(200).json({
    name: chunk.name,
    corner: chunk.corner,
    chunkSize: chunk.descriptor.chunkSize,
    vertexCount: numVertices,
    indexCount: chunk.numElements,
    heightRange: { min: minHeight, max: maxHeight },
    ...(query.data.include === 'mesh'
      ? { mesh: { positions, normals, indices: Array.from(chunk.indices) } }
      : {}),
  });
});

export default router;
