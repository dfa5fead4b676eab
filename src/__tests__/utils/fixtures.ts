/**
 * Test Fixtures
 *
 * Row builders for both exports and helpers for temporary export files.
 */

import { mkdtempSync, rmSync, writeFileSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { Logger, MemorySink } from '../../core/utils/logger.js';
import {
  PLANT_COLLECTION_SCHEMA,
  SPECIES_IMAGE_SCHEMA,
  type PlantCollectionField,
  type SpeciesImageField,
} from '../../schemas/row-schema.js';

// ============================================================================
// Logging
// ============================================================================

export interface TestLogger {
  readonly logger: Logger;
  readonly sink: MemorySink;
}

export function createTestLogger(): TestLogger {
  const sink = new MemorySink('debug');
  return { logger: new Logger({ service: 'test', sinks: [sink] }), sink };
}

// ============================================================================
// Rows
// ============================================================================

const BASE_PLANT: Partial<Record<PlantCollectionField, string>> = {
  familyName: 'Pinaceae',
  familyVernacularName: 'Pine family',
  genusName: 'Pinus',
  speciesName: 'aristata',
  fullName: 'Pinus aristata',
  vernacularName: 'Bristlecone pine',
  habit: 'Tree',
  hardiness: '4,5,6',
  waterRegime: 'Low',
  exposure: 'Sun',
  plantSize: '20 ft',
  flowerColor: '',
  gardenArea: 'Conifer Forest',
  gardenName: 'Upper Garden',
  gardenCode: 'UG-04',
  plantId: '2019-0042*1',
  latitude: '40.766',
  longitude: '-111.8225',
  plantDay: '15',
  plantMonth: '6',
  plantYear: '2021',
  bloomTime: 'Early April May',
  utahNative: 'Utah Native',
  plantSelect: 'X',
  deerResistant: 'yes',
  rabbitResistant: '',
  beeFriendly: 'no',
  highElevation: 'x',
};

/**
 * A 38-field plant collection row; unspecified fields are empty
 */
export function plantRow(overrides: Partial<Record<PlantCollectionField, string>> = {}): string[] {
  const values = { ...BASE_PLANT, ...overrides };
  return PLANT_COLLECTION_SCHEMA.columns.map((column) => values[column.field] ?? '');
}

const BASE_IMAGE: Partial<Record<SpeciesImageField, string>> = {
  imageFile: 'pinus-aristata.jpg',
  copyright: 'Test Photographer',
  directoryName: 'B:\\Conifers\\Pinus',
  genusName: 'Pinus',
  speciesName: 'aristata',
  lastModified: '2023-01-05',
};

/**
 * A 12-field species image row; unspecified fields are empty
 */
export function imageRow(overrides: Partial<Record<SpeciesImageField, string>> = {}): string[] {
  const values = { ...BASE_IMAGE, ...overrides };
  return SPECIES_IMAGE_SCHEMA.columns.map((column) => values[column.field] ?? '');
}

export const PLANT_HEADER: readonly string[] = PLANT_COLLECTION_SCHEMA.columns.map((c) => c.column);
export const IMAGE_HEADER: readonly string[] = SPECIES_IMAGE_SCHEMA.columns.map((c) => c.column);

/**
 * Join rows into export text with CRLF line endings
 */
export function exportText(rows: readonly (readonly string[])[]): string {
  return rows.map((row) => row.join('|')).join('\r\n') + '\r\n';
}

// ============================================================================
// Temporary files
// ============================================================================

export interface TempDir {
  readonly path: string;
  write(name: string, content: string | Uint8Array): string;
  cleanup(): void;
}

export function createTempDir(): TempDir {
  const path = mkdtempSync(join(tmpdir(), 'brahms-sync-test-'));
  return {
    path,
    write(name, content) {
      const filePath = join(path, name);
      writeFileSync(filePath, content);
      return filePath;
    },
    cleanup() {
      rmSync(path, { recursive: true, force: true });
    },
  };
}

/**
 * UTF-16LE bytes with a byte-order mark, as the BRAHMS export tool writes
 */
export function utf16le(text: string): Buffer {
  return Buffer.concat([Buffer.from([0xff, 0xfe]), Buffer.from(text, 'utf16le')]);
}
