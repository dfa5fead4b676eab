/**
 * Core types shared by the reader, transformers and sync driver.
 *
 * Payload interfaces use the snake_case keys the collections API expects.
 */

import type { RowError } from './errors.js';

/**
 * One delimited line of a BRAHMS export, positionally significant
 */
export type RawRow = readonly string[];

export type RecordKind = 'plant-collections' | 'species-images';

/**
 * Outcome of transforming one row
 */
export type RowResult<T> =
  | { readonly ok: true; readonly value: T }
  | { readonly ok: false; readonly error: RowError };

// ============================================================================
// Plant collections
// ============================================================================

export interface FamilyPayload {
  readonly name: string;
  readonly vernacular_name: string;
}

export interface GenusPayload {
  readonly family: FamilyPayload;
  readonly name: string;
}

export interface SpeciesPayload {
  readonly genus: GenusPayload;
  readonly name: string;
  readonly full_name: string;
  readonly subspecies: string;
  readonly variety: string;
  readonly subvariety: string;
  readonly forma: string;
  readonly subforma: string;
  readonly cultivar: string;
  readonly vernacular_name: string;
  readonly habit: string;
  readonly hardiness: readonly number[];
  readonly water_regime: string;
  readonly exposure: string;
  readonly bloom_time: readonly string[];
  readonly plant_size: string;
  readonly flower_color: string;
  readonly utah_native: boolean;
  readonly plant_select: boolean;
  readonly deer_resist: boolean;
  readonly rabbit_resist: boolean;
  readonly bee_friend: boolean;
  readonly high_elevation: boolean;
}

export interface GardenPayload {
  readonly area: string;
  readonly name: string;
  readonly code: string;
}

export interface LocationPayload {
  readonly latitude: number | null;
  readonly longitude: number | null;
}

/**
 * A single planted specimen, as POSTed to the collections endpoint
 */
export interface PlantCollectionRecord {
  readonly species: SpeciesPayload;
  readonly garden: GardenPayload;
  readonly location: LocationPayload;
  /** `YYYY-M-D` built from the raw export parts, or null */
  readonly plant_date: string | null;
  readonly plant_id: string;
  readonly commemoration_category: string;
  readonly commemoration_person: string;
}

// ============================================================================
// Species images
// ============================================================================

/**
 * Taxonomic lookup sent as query parameters; missing values are ''
 */
export interface SpeciesImageQuery {
  readonly genus: string;
  readonly name: string;
  readonly subspecies: string;
  readonly variety: string;
  readonly subvariety: string;
  readonly forma: string;
  readonly subforma: string;
  readonly cultivar: string;
}

export interface SpeciesImageRow {
  readonly query: SpeciesImageQuery;
  /** Local path of the image file to upload */
  readonly imagePath: string;
  readonly copyright: string;
}
