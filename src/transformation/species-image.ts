/**
 * Species Image Row Transformer
 *
 * Builds the species lookup and the local image path for one row of the
 * species-image export. A row whose width does not match the schema is
 * logged with its content and skipped.
 */

import { RowSchemaError } from '../core/errors.js';
import type { Logger } from '../core/utils/logger.js';
import type { RawRow, RowResult, SpeciesImageQuery, SpeciesImageRow } from '../core/types.js';
import {
  MappedRow,
  SPECIES_IMAGE_SCHEMA,
  fitRowWidth,
  type RowSchema,
  type SpeciesImageField,
} from '../schemas/row-schema.js';
import { stripDelimiterArtifacts } from './coercers.js';
import { cleanFileName, type ImagePathResolver } from './image-path.js';

export interface ImageTransformContext {
  readonly logger: Logger;
  readonly pathResolver: ImagePathResolver;
  readonly schema?: RowSchema<SpeciesImageField>;
}

export function extractSpeciesQuery(fields: MappedRow<SpeciesImageField>): SpeciesImageQuery {
  return {
    genus: fields.get('genusName'),
    name: fields.get('speciesName'),
    subspecies: fields.get('subspecies'),
    variety: fields.get('variety'),
    subvariety: fields.get('subvariety'),
    forma: fields.get('forma'),
    subforma: fields.get('subforma'),
    cultivar: fields.get('cultivar'),
  };
}

export function transformSpeciesImageRow(
  row: RawRow,
  context: ImageTransformContext
): RowResult<SpeciesImageRow> {
  const schema = context.schema ?? SPECIES_IMAGE_SCHEMA;
  const cleaned = stripDelimiterArtifacts(row);

  const fitted = fitRowWidth(cleaned, schema.width);
  if (fitted instanceof RowSchemaError) {
    const imageFile = cleanFileName(new MappedRow(schema, cleaned).get('imageFile'));
    const error = fitted.withRowId(imageFile);
    context.logger.error(
      `Invalid row: ${error.rawValue}. Check the image list file and confirm its columns match the ${schema.id} v${schema.version} schema.`,
      { imageFile, code: error.code, expected: error.expected, actual: error.actual }
    );
    return { ok: false, error };
  }

  const fields = new MappedRow(schema, fitted);

  return {
    ok: true,
    value: {
      query: extractSpeciesQuery(fields),
      imagePath: context.pathResolver.resolve(fields.get('directoryName'), fields.get('imageFile')),
      copyright: fields.get('copyright'),
    },
  };
}
