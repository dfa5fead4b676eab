/**
 * Sync run orchestration
 *
 * Resolves credentials and the API session once, then syncs each requested
 * export in order (collections before images). A file-level error stops
 * the run; row-level failures only show up in the summaries.
 */

import { HTTPClient } from '../../../core/http-client.js';
import type { RecordKind } from '../../../core/types.js';
import type { Logger } from '../../../core/utils/logger.js';
import {
  PLANT_COLLECTION_FIELDS,
  SPECIES_IMAGE_FIELDS,
  loadRowSchemaFile,
} from '../../../schemas/row-schema.js';
import { CollectionsApiClient, type CollectionsApi } from '../../../services/collections-api.js';
import { syncPlantCollections } from '../../../sync/plant-collections.js';
import { syncSpeciesImages } from '../../../sync/species-images.js';
import type { SyncSummary } from '../../../sync/summary.js';
import { createImagePathResolver } from '../../../transformation/image-path.js';
import {
  apiBaseUrl,
  loadCredentials,
  type ApiCredentials,
  type ValidSyncConfig,
} from '../../lib/config.js';

export type ApiConnector = (
  config: ValidSyncConfig,
  credentials: ApiCredentials,
  logger: Logger
) => Promise<CollectionsApi>;

/**
 * Authenticate against the configured target
 */
export const connectToApi: ApiConnector = (config, credentials, logger) =>
  CollectionsApiClient.authenticate({
    baseUrl: apiBaseUrl(config),
    username: credentials.username,
    password: credentials.password,
    http: new HTTPClient(
      { timeoutMs: config.http.timeout, maxRetries: config.http.retries },
      logger.child({ component: 'http' })
    ),
    logger,
  });

export interface RunSyncOptions {
  readonly config: ValidSyncConfig;
  readonly logger: Logger;
  /** Exports to sync, in order */
  readonly kinds: readonly RecordKind[];
  /** Source of RBG_API_* credentials (default: process.env) */
  readonly env?: NodeJS.ProcessEnv;
  readonly connect?: ApiConnector;
  readonly platform?: NodeJS.Platform;
  readonly homeDir?: string;
}

/**
 * @throws {ConfigurationError} Missing credentials or an invalid column profile
 * @throws {AuthenticationError} If the API does not issue a session
 * @throws {FileDecodeError} If an export cannot be decoded
 */
export async function runSync(options: RunSyncOptions): Promise<SyncSummary[]> {
  const { config, logger } = options;

  const plantSchema = config.paths.plantSchema
    ? loadRowSchemaFile(config.paths.plantSchema, PLANT_COLLECTION_FIELDS)
    : undefined;
  const imageSchema = config.paths.imageSchema
    ? loadRowSchemaFile(config.paths.imageSchema, SPECIES_IMAGE_FIELDS)
    : undefined;

  let api: CollectionsApi | undefined;
  if (config.dryRun) {
    logger.info('Dry run: rows are transformed but nothing is sent');
  } else {
    const credentials = loadCredentials(options.env);
    api = await (options.connect ?? connectToApi)(config, credentials, logger);
  }

  const summaries: SyncSummary[] = [];

  for (const kind of options.kinds) {
    if (kind === 'plant-collections') {
      summaries.push(
        await syncPlantCollections({
          filePath: config.paths.plantData,
          logger,
          api,
          encoding: config.export.plantEncoding,
          delimiter: config.export.delimiter,
          schema: plantSchema,
          dryRun: config.dryRun,
        })
      );
    } else {
      summaries.push(
        await syncSpeciesImages({
          filePath: config.paths.imageData,
          logger,
          api,
          pathResolver: createImagePathResolver({
            strategy: config.images.strategy,
            platform: options.platform,
            homeDir: options.homeDir,
            drivePrefix: config.images.drivePrefix ?? undefined,
            mountPoint: config.images.mountPoint ?? undefined,
          }),
          encodings: config.export.imageEncodings,
          delimiter: config.export.delimiter,
          schema: imageSchema,
          dryRun: config.dryRun,
        })
      );
    }
  }

  return summaries;
}
