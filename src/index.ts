import express, { Application } from 'express';
import cors from 'cors';
import dotenv from 'dotenv';
import healthCheckRouter from './routes/healthCheck';
import terrainInfoRouter from './routes/terrainInfo';
import chunksRouter from './routes/chunks';
import probeRouter from './routes/probe';
import { getConfig } from './config';
import { requireApiKey } from './middleware/auth';
import { initTerrain } from './world';
import { createLogger, setLogLevel } from './logging';

dotenv.config();

const config = getConfig();
setLogLevel(config.runtime.logLevel);

const log = createLogger('Server');

log.info('=== Terrain Probe Configuration ===');
log.info(`Chunk: ${config.terrain.chunkSize.x}x${config.terrain.chunkSize.y} cells, heights ${config.terrain.minMaxHeight.min}..${config.terrain.minMaxHeight.max}`);
log.info(`Buffers: ${config.derived.verticesPerChunk} vertices (${config.derived.vertexBufferBytes} B), ${config.derived.indicesPerChunk} indices (${config.derived.indexBufferBytes} B)`);
log.info(`Mesh builder: ${config.derived.workgroupsPerChunk} workgroups of ${config.terrain.workgroupSize}`);
log.info(`Probe: ${config.probe.scanMode} scan, ${config.derived.scanLimit} indices${config.derived.scanTruncates ? ' (truncates chunk)' : ''}, plane ${config.probe.planeVariant}`);
log.info(`Log Level: ${config.runtime.logLevel}`);
log.info('===================================');

const app: Application = express();
const PORT = process.env.PORT || 3001;

app.use(cors());
app.use(express.json());

app.use('/api/health-check', healthCheckRouter);

app.use(requireApiKey());

// All routes after this point require API key authentication
app.use('/api/terrain-info', terrainInfoRouter);
app.use('/api/chunks', chunksRouter);
app.use('/api/probe', probeRouter);

app.listen(PORT, () => {
  log.info(`Server is running on port ${PORT}`);
  log.info(`Health check available at http://localhost:${PORT}/api/health-check`);

  initTerrain(config);
});
