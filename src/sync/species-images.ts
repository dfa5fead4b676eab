/**
 * Species image sync loop
 *
 * For each row of the image export: resolve the taxonomy to exactly one
 * species, then upload the image file to it. Zero or several matches skip
 * the row.
 */

import { errorMessage } from '../core/errors.js';
import { HTTPError } from '../core/http-client.js';
import type { Logger } from '../core/utils/logger.js';
import { openExport, type ExportEncoding } from '../ingestion/export-reader.js';
import {
  SPECIES_IMAGE_SCHEMA,
  checkHeader,
  type RowSchema,
  type SpeciesImageField,
} from '../schemas/row-schema.js';
import type { CollectionsApi } from '../services/collections-api.js';
import type { SpeciesImageRow } from '../core/types.js';
import type { ImagePathResolver } from '../transformation/image-path.js';
import { transformSpeciesImageRow } from '../transformation/species-image.js';
import { warnOnHeaderDrift } from './header.js';
import { emptyOutcomes, type RowStage, type SyncSummary } from './summary.js';

export interface ImageSyncOptions {
  readonly filePath: string;
  readonly logger: Logger;
  readonly pathResolver: ImagePathResolver;
  /** Required unless dryRun is set */
  readonly api?: CollectionsApi;
  /** Tried in order on the header (default: utf-8, then utf-16le) */
  readonly encodings?: readonly [ExportEncoding, ...ExportEncoding[]];
  readonly delimiter?: string;
  readonly schema?: RowSchema<SpeciesImageField>;
  readonly dryRun?: boolean;
}

async function submitImage(api: CollectionsApi, image: SpeciesImageRow, logger: Logger): Promise<RowStage> {
  const { query, imagePath } = image;
  const species = await api.findSpecies(query);
  const [match] = species.results;

  if (species.count !== 1 || !match) {
    logger.info(`Species lookup returned ${species.count} matches; skipping ${imagePath}`, {
      query,
      count: species.count,
    });
    return 'unresolved';
  }

  const response = await api.attachSpeciesImage(match.id, imagePath);
  if (response.status !== 200) {
    logger.warn(`Image upload for species ${match.id} returned status ${response.status}`, {
      speciesId: match.id,
      imagePath,
      status: response.status,
      body: response.body,
    });
    return 'rejected';
  }

  logger.debug(`Attached ${imagePath} to species ${match.id}`, { speciesId: match.id });
  return 'submitted';
}

/**
 * @throws {FileDecodeError} If no encoding decodes the header, or a later
 *   row fails to decode
 */
export async function syncSpeciesImages(options: ImageSyncOptions): Promise<SyncSummary> {
  const startTime = Date.now();
  const schema = options.schema ?? SPECIES_IMAGE_SCHEMA;
  const logger = options.logger.child({ kind: 'species-images' });
  const outcomes = emptyOutcomes();
  const { api } = options;

  if (!options.dryRun && !api) {
    throw new Error('syncSpeciesImages requires an api client unless dryRun is set');
  }

  const opened = await openExport({
    filePath: options.filePath,
    encodings: options.encodings ?? ['utf-8', 'utf-16le'],
    delimiter: options.delimiter,
    logger,
  });
  warnOnHeaderDrift(logger, options.filePath, checkHeader(schema, opened.header));

  let rowsRead = 0;
  for await (const row of opened.rows) {
    rowsRead++;

    const result = transformSpeciesImageRow(row, {
      logger,
      pathResolver: options.pathResolver,
      schema,
    });
    if (!result.ok) {
      outcomes.transform_failed++;
      continue;
    }

    const image = result.value;
    if (options.dryRun || !api) {
      logger.debug(`Resolved image path ${image.imagePath}`, { query: image.query });
      outcomes.dry_run++;
      continue;
    }

    let stage: RowStage;
    try {
      stage = await submitImage(api, image, logger);
    } catch (error) {
      logger.error(`Failed to attach image ${image.imagePath}: ${errorMessage(error)}`, {
        imagePath: image.imagePath,
        copyright: image.copyright,
        status: error instanceof HTTPError ? error.statusCode : undefined,
        body: error instanceof HTTPError ? error.responseBody : undefined,
        query: image.query,
      });
      stage = 'submit_failed';
    }
    outcomes[stage]++;
  }

  return {
    kind: 'species-images',
    filePath: options.filePath,
    encoding: opened.encoding,
    rowsRead,
    outcomes,
    durationMs: Date.now() - startTime,
  };
}
