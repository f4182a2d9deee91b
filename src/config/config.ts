import type { AppConfigInput } from './schema';

export const config: AppConfigInput = {
  terrain: {
    chunkSize: { x: 32, y: 32 },
    minMaxHeight: { min: -5, max: 5 },
    workgroupSize: 64,
  },

  probe: {
    scanMode: 'fixed',
    planeVariant: 'camera-height',
  },

  runtime: {
    logLevel: 'info',
  },
};
