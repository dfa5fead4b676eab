/**
 * brahms-sync library entry point
 */

export * from './core/errors.js';
export * from './core/types.js';
export * from './core/http-client.js';
export * from './core/utils/logger.js';

export * from './ingestion/delimited-parser.js';
export * from './ingestion/export-reader.js';

export * from './schemas/row-schema.js';

export * from './transformation/coercers.js';
export * from './transformation/image-path.js';
export * from './transformation/plant-collection.js';
export * from './transformation/species-image.js';

export * from './services/collections-api.js';
export * from './sync/index.js';

export {
  DEFAULT_CONFIG,
  apiBaseUrl,
  findConfigFile,
  loadConfig,
  loadCredentials,
  validateConfig,
  type ApiCredentials,
  type SyncConfig,
  type ValidSyncConfig,
} from './cli/lib/config.js';
export { runSync, connectToApi, type RunSyncOptions } from './cli/commands/sync/run.js';
