/**
 * Row Schema Descriptors
 *
 * Column positions of the BRAHMS exports, kept as versioned data profiles
 * (schemas/profiles/*.json) instead of hard-coded indexes. When the export
 * layout drifts, a new profile is written; transformers read fields by name.
 *
 * A profile maps each position to:
 * - column: the header name the export writes for that position
 * - field: the semantic name the transformer reads
 *
 * Profiles are validated on load: field names must be exactly the set the
 * transformer expects and indexes must cover 0..width-1 once each.
 */

import { readFileSync } from 'node:fs';
import { parse as parseYaml } from 'yaml';
import { z } from 'zod';
import { ConfigurationError, RowSchemaError } from '../core/errors.js';
import type { RawRow } from '../core/types.js';
import plantCollectionsProfile from './profiles/plant-collections.v1.json' with { type: 'json' };
import speciesImagesProfile from './profiles/species-images.v1.json' with { type: 'json' };

// ============================================================================
// Field names
// ============================================================================

export const PLANT_COLLECTION_FIELDS = [
  'familyName',
  'familyVernacularName',
  'genusName',
  'speciesName',
  'fullName',
  'subspecies',
  'variety',
  'subvariety',
  'forma',
  'subforma',
  'cultivar',
  'vernacularName',
  'habit',
  'hardiness',
  'waterRegime',
  'exposure',
  'plantSize',
  'flowerColor',
  'gardenArea',
  'gardenName',
  'gardenCode',
  'plantId',
  'latitude',
  'longitude',
  'commemorationCategory',
  'commemorationPerson',
  'plantDay',
  'plantMonth',
  'plantYear',
  'notOnline',
  'lastModified',
  'bloomTime',
  'utahNative',
  'plantSelect',
  'deerResistant',
  'rabbitResistant',
  'beeFriendly',
  'highElevation',
] as const;

export type PlantCollectionField = (typeof PLANT_COLLECTION_FIELDS)[number];

export const SPECIES_IMAGE_FIELDS = [
  'imageFile',
  'copyright',
  'directoryName',
  'genusName',
  'speciesName',
  'subspecies',
  'variety',
  'subvariety',
  'forma',
  'subforma',
  'cultivar',
  'lastModified',
] as const;

export type SpeciesImageField = (typeof SPECIES_IMAGE_FIELDS)[number];

// ============================================================================
// Types
// ============================================================================

export interface ColumnDescriptor<F extends string> {
  readonly index: number;
  /** Header name written by the export */
  readonly column: string;
  readonly field: F;
}

export interface RowSchema<F extends string> {
  readonly id: string;
  readonly version: number;
  readonly width: number;
  readonly columns: readonly ColumnDescriptor<F>[];
}

export interface HeaderMismatch {
  readonly index: number;
  readonly expected: string;
  readonly actual: string;
}

// ============================================================================
// Parsing
// ============================================================================

function isKnownField<F extends string>(fields: readonly F[], value: string): value is F {
  return fields.some((field) => field === value);
}

/**
 * Validate profile data against the fields a transformer expects
 *
 * @throws {ConfigurationError} If the profile is malformed
 */
export function parseRowSchema<F extends string>(
  data: unknown,
  fields: readonly [F, ...F[]]
): RowSchema<F> {
  const profileShape = z.object({
    id: z.string().min(1),
    version: z.number().int().positive(),
    width: z.number().int().positive(),
    columns: z.array(
      z.object({
        index: z.number().int().nonnegative(),
        column: z.string().min(1),
        field: z.string().min(1),
      })
    ),
  });

  const result = profileShape.safeParse(data);
  if (!result.success) {
    const issues = result.error.issues
      .map((issue) => `${issue.path.join('.') || '<root>'}: ${issue.message}`)
      .join('; ');
    throw new ConfigurationError(`Invalid row schema: ${issues}`);
  }

  const profile = result.data;
  const problems: string[] = [];

  if (profile.columns.length !== profile.width) {
    problems.push(`width is ${profile.width} but ${profile.columns.length} columns are listed`);
  }

  const columns: ColumnDescriptor<F>[] = [];
  for (const column of profile.columns) {
    if (isKnownField(fields, column.field)) {
      columns.push({ index: column.index, column: column.column, field: column.field });
    } else {
      problems.push(`unknown field "${column.field}"`);
    }
  }

  columns.sort((a, b) => a.index - b.index);
  columns.forEach((column, position) => {
    if (column.index !== position) {
      problems.push(`expected index ${position}, found ${column.index}`);
    }
  });

  const seen = new Set<F>();
  for (const column of columns) {
    if (seen.has(column.field)) {
      problems.push(`field "${column.field}" is mapped more than once`);
    }
    seen.add(column.field);
  }
  for (const field of fields) {
    if (!seen.has(field)) {
      problems.push(`field "${field}" is not mapped`);
    }
  }

  if (problems.length > 0) {
    throw new ConfigurationError(`Invalid row schema "${profile.id}": ${problems.join('; ')}`);
  }

  return {
    id: profile.id,
    version: profile.version,
    width: profile.width,
    columns,
  };
}

/**
 * Load a profile from a JSON or YAML file
 */
export function loadRowSchemaFile<F extends string>(
  filePath: string,
  fields: readonly [F, ...F[]]
): RowSchema<F> {
  let data: unknown;
  try {
    data = parseYaml(readFileSync(filePath, 'utf-8'));
  } catch (error) {
    throw new ConfigurationError(
      `Cannot read row schema ${filePath}: ${error instanceof Error ? error.message : String(error)}`
    );
  }
  return parseRowSchema(data, fields);
}

export const PLANT_COLLECTION_SCHEMA: RowSchema<PlantCollectionField> = parseRowSchema(
  plantCollectionsProfile,
  PLANT_COLLECTION_FIELDS
);

export const SPECIES_IMAGE_SCHEMA: RowSchema<SpeciesImageField> = parseRowSchema(
  speciesImagesProfile,
  SPECIES_IMAGE_FIELDS
);

// ============================================================================
// Row access
// ============================================================================

/**
 * Named view over a raw row
 */
export class MappedRow<F extends string> {
  private readonly values: ReadonlyMap<F, string>;

  constructor(schema: RowSchema<F>, row: RawRow) {
    this.values = new Map(
      schema.columns.map((column): [F, string] => [column.field, row[column.index] ?? ''])
    );
  }

  get(field: F): string {
    return this.values.get(field) ?? '';
  }
}

function normalizeHeaderName(name: string): string {
  return name.replace(/\uFEFF/g, '').replace(/^,+|,+$/g, '').trim().toLowerCase();
}

/**
 * Compare an export header row with the schema's column names
 *
 * Ignores case, a byte-order mark and comma artifacts. Extra trailing
 * header cells are not reported.
 */
export function checkHeader<F extends string>(schema: RowSchema<F>, header: RawRow): HeaderMismatch[] {
  const mismatches: HeaderMismatch[] = [];

  for (const column of schema.columns) {
    const actual = normalizeHeaderName(header[column.index] ?? '');
    if (actual !== column.column.toLowerCase()) {
      mismatches.push({ index: column.index, expected: column.column, actual });
    }
  }

  return mismatches;
}

/**
 * Fit a row to the schema width
 *
 * Empty cells past the width are export artifacts and are dropped; any
 * other width mismatch is a RowSchemaError.
 */
export function fitRowWidth(row: RawRow, width: number): RawRow | RowSchemaError {
  let end = row.length;
  while (end > width && row[end - 1] === '') {
    end--;
  }

  if (end !== width) {
    return new RowSchemaError(width, end, row.join('|'));
  }
  return end === row.length ? row : row.slice(0, end);
}
