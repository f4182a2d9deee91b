export {
  type TerrainState,
  initTerrain,
  getTerrain,
  _resetTerrainSingleton,
} from './terrainSingleton';
