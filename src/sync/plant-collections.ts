/**
 * Plant collection sync loop
 *
 * Reads the living-collections export row by row and POSTs each payload.
 * Row failures are logged and counted; only a FileDecodeError (or an
 * unreadable file) ends the loop early.
 */

import { errorMessage } from '../core/errors.js';
import { HTTPError } from '../core/http-client.js';
import type { Logger } from '../core/utils/logger.js';
import { openExport, type ExportEncoding } from '../ingestion/export-reader.js';
import {
  PLANT_COLLECTION_SCHEMA,
  checkHeader,
  type PlantCollectionField,
  type RowSchema,
} from '../schemas/row-schema.js';
import type { CollectionsApi } from '../services/collections-api.js';
import { transformPlantCollectionRow } from '../transformation/plant-collection.js';
import { warnOnHeaderDrift } from './header.js';
import { emptyOutcomes, type RowStage, type SyncSummary } from './summary.js';

export interface PlantSyncOptions {
  readonly filePath: string;
  readonly logger: Logger;
  /** Required unless dryRun is set */
  readonly api?: CollectionsApi;
  /** Default: utf-16le */
  readonly encoding?: ExportEncoding;
  /** Default: | */
  readonly delimiter?: string;
  readonly schema?: RowSchema<PlantCollectionField>;
  readonly dryRun?: boolean;
}

/**
 * @throws {FileDecodeError} If the export does not decode as the configured encoding
 */
export async function syncPlantCollections(options: PlantSyncOptions): Promise<SyncSummary> {
  const startTime = Date.now();
  const schema = options.schema ?? PLANT_COLLECTION_SCHEMA;
  const logger = options.logger.child({ kind: 'plant-collections' });
  const outcomes = emptyOutcomes();
  const { api } = options;

  if (!options.dryRun && !api) {
    throw new Error('syncPlantCollections requires an api client unless dryRun is set');
  }

  const opened = await openExport({
    filePath: options.filePath,
    encodings: [options.encoding ?? 'utf-16le'],
    delimiter: options.delimiter,
    logger,
  });
  warnOnHeaderDrift(logger, options.filePath, checkHeader(schema, opened.header));

  let rowsRead = 0;
  for await (const row of opened.rows) {
    rowsRead++;

    const result = transformPlantCollectionRow(row, { logger, schema });
    if (!result.ok) {
      outcomes.transform_failed++;
      continue;
    }

    const record = result.value;
    logger.debug(`Collection payload for ${record.plant_id}`, { payload: record });

    if (options.dryRun || !api) {
      outcomes.dry_run++;
      continue;
    }

    let stage: RowStage;
    try {
      const response = await api.createCollection(record);
      if (response.status === 200) {
        stage = 'submitted';
      } else {
        logger.warn(`Collection ${record.plant_id} returned status ${response.status}`, {
          plantId: record.plant_id,
          status: response.status,
          body: response.body,
        });
        stage = 'rejected';
      }
    } catch (error) {
      logger.error(`Failed to submit collection with ID ${record.plant_id}: ${errorMessage(error)}`, {
        plantId: record.plant_id,
        status: error instanceof HTTPError ? error.statusCode : undefined,
        body: error instanceof HTTPError ? error.responseBody : undefined,
        payload: record,
      });
      stage = 'submit_failed';
    }
    outcomes[stage]++;
  }

  return {
    kind: 'plant-collections',
    filePath: options.filePath,
    encoding: opened.encoding,
    rowsRead,
    outcomes,
    durationMs: Date.now() - startTime,
  };
}
