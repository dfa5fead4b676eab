/**
 * Plant Collection Row Transformer
 *
 * Converts one row of the living-collections export into the nested payload
 * accepted by the collections endpoint.
 *
 * FAILURE POLICY:
 * Width, hardiness, bloom time, date and coordinate failures are logged
 * with the plant id and raw value, and the row is returned as failed.
 * Nothing row-specific is thrown, so the caller keeps going.
 */

import { RowError, RowSchemaError } from '../core/errors.js';
import type { Logger } from '../core/utils/logger.js';
import type { PlantCollectionRecord, RawRow, RowResult } from '../core/types.js';
import {
  MappedRow,
  PLANT_COLLECTION_SCHEMA,
  fitRowWidth,
  type PlantCollectionField,
  type RowSchema,
} from '../schemas/row-schema.js';
import {
  UTAH_NATIVE_VALUES,
  composePlantDate,
  isAffirmative,
  parseBloomMonths,
  parseCoordinate,
  parseHardinessZones,
  stripDelimiterArtifacts,
} from './coercers.js';

export interface PlantTransformContext {
  readonly logger: Logger;
  readonly schema?: RowSchema<PlantCollectionField>;
}

function buildRecord(
  fields: MappedRow<PlantCollectionField>,
  context: PlantTransformContext
): PlantCollectionRecord {
  const plantId = fields.get('plantId');

  const hardiness = parseHardinessZones(fields.get('hardiness'));
  const bloomTime = parseBloomMonths(fields.get('bloomTime'));
  const plantDate = composePlantDate(
    fields.get('plantDay'),
    fields.get('plantMonth'),
    fields.get('plantYear'),
    { plantId, logger: context.logger }
  );
  const latitude = parseCoordinate(fields.get('latitude'));
  const longitude = parseCoordinate(fields.get('longitude'));

  return {
    species: {
      genus: {
        family: {
          name: fields.get('familyName'),
          vernacular_name: fields.get('familyVernacularName'),
        },
        name: fields.get('genusName'),
      },
      name: fields.get('speciesName'),
      full_name: fields.get('fullName'),
      subspecies: fields.get('subspecies'),
      variety: fields.get('variety'),
      subvariety: fields.get('subvariety'),
      forma: fields.get('forma'),
      subforma: fields.get('subforma'),
      cultivar: fields.get('cultivar'),
      vernacular_name: fields.get('vernacularName'),
      habit: fields.get('habit'),
      hardiness,
      water_regime: fields.get('waterRegime'),
      exposure: fields.get('exposure'),
      bloom_time: bloomTime,
      plant_size: fields.get('plantSize'),
      flower_color: fields.get('flowerColor'),
      utah_native: isAffirmative(fields.get('utahNative'), UTAH_NATIVE_VALUES),
      plant_select: isAffirmative(fields.get('plantSelect')),
      deer_resist: isAffirmative(fields.get('deerResistant')),
      rabbit_resist: isAffirmative(fields.get('rabbitResistant')),
      bee_friend: isAffirmative(fields.get('beeFriendly')),
      high_elevation: isAffirmative(fields.get('highElevation')),
    },
    garden: {
      area: fields.get('gardenArea'),
      name: fields.get('gardenName'),
      code: fields.get('gardenCode'),
    },
    location: { latitude, longitude },
    plant_date: plantDate,
    plant_id: plantId,
    commemoration_category: fields.get('commemorationCategory'),
    commemoration_person: fields.get('commemorationPerson'),
  };
}

/**
 * Transform one data row (header excluded) into a collection payload
 */
export function transformPlantCollectionRow(
  row: RawRow,
  context: PlantTransformContext
): RowResult<PlantCollectionRecord> {
  const schema = context.schema ?? PLANT_COLLECTION_SCHEMA;
  const cleaned = stripDelimiterArtifacts(row);
  const plantId = new MappedRow(schema, cleaned).get('plantId');

  const fitted = fitRowWidth(cleaned, schema.width);
  if (fitted instanceof RowSchemaError) {
    const error = fitted.withRowId(plantId);
    context.logger.error(`Skipping collection row with ID ${plantId}: ${error.message}`, {
      plantId,
      code: error.code,
      row: error.rawValue,
    });
    return { ok: false, error };
  }

  try {
    return { ok: true, value: buildRecord(new MappedRow(schema, fitted), context) };
  } catch (caught) {
    if (!(caught instanceof RowError)) {
      throw caught;
    }
    const error = caught.withRowId(plantId);
    context.logger.error(`Failed to process collection with ID ${plantId}: ${error.message}`, {
      plantId,
      code: error.code,
      rawValue: error.rawValue,
    });
    return { ok: false, error };
  }
}
