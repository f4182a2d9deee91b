import { z } from 'zod';

export const ChunkSizeConfigSchema = z.object({
  x: z.number().int().min(1).max(1024).describe('Grid cells along x per chunk'),
  y: z.number().int().min(1).max(1024).describe('Grid cells along y (world z) per chunk'),
}).strict();

export const HeightRangeConfigSchema = z.object({
  min: z.number().finite().describe('Height for an fbm blend of 0'),
  max: z.number().finite().describe('Height for an fbm blend of 1'),
}).strict().refine((range) => range.min <= range.max, {
  message: 'min must be less than or equal to max',
});

export const TerrainConfigSchema = z.object({
  chunkSize: ChunkSizeConfigSchema,
  minMaxHeight: HeightRangeConfigSchema,
  workgroupSize: z.number().int().min(1).max(256).describe('Invocations per mesh-builder workgroup'),
}).strict();

export const ProbeConfigSchema = z.object({
  scanMode: z.enum(['fixed', 'buffer']).describe('"fixed" stops at 6144 indices, "buffer" scans everything'),
  planeVariant: z.enum(['constant', 'camera-height']).describe('Value written by the plane probe'),
}).strict();

export const RuntimeConfigSchema = z.object({
  logLevel: z.enum(['debug', 'info', 'warn', 'error']).describe('Logging level'),
}).strict();

export const AppConfigSchema = z.object({
  terrain: TerrainConfigSchema,
  probe: ProbeConfigSchema,
  runtime: RuntimeConfigSchema,
}).strict();

export type AppConfigInput = z.input<typeof AppConfigSchema>;
export type AppConfig = z.output<typeof AppConfigSchema>;

export interface DerivedConfig {
  verticesPerChunk: number;
  indicesPerChunk: number;
  vertexBufferBytes: number;
  indexBufferBytes: number;
  workgroupsPerChunk: number;
  scanLimit: number;
  /** True when the fixed scan bound skips part of a chunk */
  scanTruncates: boolean;
}

export interface ValidatedConfig {
  terrain: AppConfig['terrain'];
  probe: AppConfig['probe'];
  runtime: AppConfig['runtime'];
  derived: DerivedConfig;
}
