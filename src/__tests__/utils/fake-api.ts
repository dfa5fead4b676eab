/**
 * In-memory CollectionsApi
 *
 * Records every call; responses are programmable per call.
 */

import type { PlantCollectionRecord, SpeciesImageQuery } from '../../core/types.js';
import type {
  ApiResponse,
  CollectionsApi,
  SpeciesSearchResult,
} from '../../services/collections-api.js';

type Responder<A, R> = (arg: A, callIndex: number) => R | Promise<R>;

export interface FakeApiOptions {
  readonly createCollection?: Responder<PlantCollectionRecord, ApiResponse>;
  readonly findSpecies?: Responder<SpeciesImageQuery, SpeciesSearchResult>;
  readonly attachSpeciesImage?: Responder<{ speciesId: number | string; filePath: string }, ApiResponse>;
}

const OK: ApiResponse = { status: 200, body: '{}' };

export class FakeCollectionsApi implements CollectionsApi {
  readonly collections: PlantCollectionRecord[] = [];
  readonly speciesQueries: SpeciesImageQuery[] = [];
  readonly attachments: { speciesId: number | string; filePath: string }[] = [];

  constructor(private readonly options: FakeApiOptions = {}) {}

  async createCollection(record: PlantCollectionRecord): Promise<ApiResponse> {
    const index = this.collections.push(record) - 1;
    return this.options.createCollection ? this.options.createCollection(record, index) : OK;
  }

  async findSpecies(query: SpeciesImageQuery): Promise<SpeciesSearchResult> {
    const index = this.speciesQueries.push(query) - 1;
    return this.options.findSpecies
      ? this.options.findSpecies(query, index)
      : { count: 1, results: [{ id: 1 }] };
  }

  async attachSpeciesImage(speciesId: number | string, filePath: string): Promise<ApiResponse> {
    const call = { speciesId, filePath };
    const index = this.attachments.push(call) - 1;
    return this.options.attachSpeciesImage ? this.options.attachSpeciesImage(call, index) : OK;
  }
}
