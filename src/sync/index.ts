export { syncPlantCollections, type PlantSyncOptions } from './plant-collections.js';
export { syncSpeciesImages, type ImageSyncOptions } from './species-images.js';
export { warnOnHeaderDrift } from './header.js';
export {
  ROW_STAGES,
  emptyOutcomes,
  formatSummary,
  type RowStage,
  type SyncSummary,
} from './summary.js';
