/**
 * Terrain Singleton — Server-wide access to the chunk and probe pipelines.
 *
 * Call `initTerrain(config)` once at server startup, then use `getTerrain()`
 * from routes.
 */

import type { ValidatedConfig } from '../config/types';
import { TerrainPipeline, RayIntersectPipeline } from '../pipeline';
import { createLogger } from '../logging';

const log = createLogger('Terrain');

// ── Types ───────────────────────────────────────────────────────────

export interface TerrainState {
  terrainPipeline: TerrainPipeline;
  probePipeline: RayIntersectPipeline;
}

// ── Module-level singleton ──────────────────────────────────────────

let terrainState: TerrainState | null = null;

// ── Public API ──────────────────────────────────────────────────────

/**
 * Build both pipelines from validated configuration.
 * Throws if already initialized.
 */
export function initTerrain(config: ValidatedConfig): TerrainState {
  if (terrainState !== null) {
    throw new Error('Terrain is already initialized. Restart the server to re-initialize.');
  }

  const { chunkSize, minMaxHeight, workgroupSize } = config.terrain;

  terrainState = {
    terrainPipeline: new TerrainPipeline({
      chunkSize: [chunkSize.x, chunkSize.y],
      minMaxHeight: [minMaxHeight.min, minMaxHeight.max],
      workgroupSize,
    }),
    probePipeline: new RayIntersectPipeline({
      chunkSize: [chunkSize.x, chunkSize.y],
      scanMode: config.probe.scanMode,
      planeVariant: config.probe.planeVariant,
    }),
  };

  log.info(
    `Initialized: ${chunkSize.x}×${chunkSize.y} chunks, heights ${minMaxHeight.min}..${minMaxHeight.max}, ` +
    `probe scan ${config.probe.scanMode} (${config.derived.scanLimit} indices)`,
  );

  return terrainState;
}

/**
 * Get the current terrain state. Returns null if not initialized.
 */
export function getTerrain(): TerrainState | null {
  return terrainState;
}

/**
 * Reset terrain state. Intended for testing only.
 * @internal
 */
export function _resetTerrainSingleton(): void {
  terrainState = null;
}
