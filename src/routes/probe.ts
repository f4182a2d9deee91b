import { Router, Request, Response } from 'express';
import { mat4 } from 'gl-matrix';
import { z } from 'zod';
import { getTerrain } from '../world';
import { toProbeResult } from '../pipeline';
import { downwardRay, pickRay, type Ray } from '../probe';
import type { CameraState } from '../compute';
import { formatRequestIssues, Int32Schema } from './requestIssues';

const router = Router();

const Finite = z.number().finite();
const Vec3Schema = z.tuple([Finite, Finite, Finite]);

export const ProbeRequestSchema = z.object({
  corner: z.tuple([Int32Schema, Int32Schema]),
  mode: z.enum(['mesh', 'plane']).default('mesh'),
  camera: z.object({
    viewPos: z.tuple([Finite, Finite, Finite, Finite]),
    viewProj: z.array(Finite).length(16).optional(),
  }).strict(),
  ray: z.object({
    origin: Vec3Schema,
    direction: Vec3Schema,
  }).strict().optional(),
  cursor: z.tuple([z.number().min(-1).max(1), z.number().min(-1).max(1)]).optional(),
}).strict()
  .refine((body) => !(body.ray && body.cursor), {
    message: 'ray and cursor cannot both be given',
    path: ['cursor'],
  })
  .refine((body) => !body.cursor || body.camera.viewProj !== undefined, {
    message: 'cursor requires camera.viewProj',
    path: ['camera', 'viewProj'],
  });

export type ProbeRequest = z.output<typeof ProbeRequestSchema>;

function requestRay(body: ProbeRequest, camera: CameraState): Ray {
  if (body.ray) return body.ray;
  if (body.cursor) return pickRay(camera, body.cursor[0], body.cursor[1]);
  return downwardRay(camera);
}

router.post('/', (req: Request, res: Response) => {
  const terrain = getTerrain();

  if (!terrain) {
    res.status(503).json({ error: 'Terrain is not initialized' });
    return;
  }

  const parsed = ProbeRequestSchema.safeParse(req.body);
  if (!parsed.success) {
    res.status(400).json({ error: 'Invalid probe request', issues: formatRequestIssues(parsed.error) });
    return;
  }

  const body = parsed.data;
  const camera: CameraState = {
    viewPos: body.camera.viewPos,
    viewProj: body.camera.viewProj ?? mat4.create(),
  };

  if (body.mode === 'plane') {
    const distance = terrain.probePipeline.planeProbe(camera);
    res.status(200).json({ mode: body.mode, ...toProbeResult(distance) });
    return;
  }

  let ray: Ray;
  try {
    ray = requestRay(body, camera);
  } catch (error) {
    res.status(400).json({ error: error instanceof Error ? error.message : String(error) });
    return;
  }

  const chunk = terrain.terrainPipeline.genChunk(body.corner);
  const distance = terrain.probePipeline.rayIntersect(terrain.terrainPipeline.snapshot(chunk), ray);

  res.status(200).json({ mode: body.mode, chunk: chunk.name, ...toProbeResult(distance) });
});

export default router;
