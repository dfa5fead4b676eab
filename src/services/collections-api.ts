/**
 * Collections API Client
 *
 * Authenticated session against the garden website's plant API.
 *
 * SESSION:
 * - POST /plants/api/token/ with username and password (form-encoded)
 * - The response must set a csrftoken cookie and return { token }
 * - Every later request carries the CSRF token (header and cookie) and
 *   `Authorization: Token <token>`
 *
 * Submissions are never retried; a repeated POST could duplicate a
 * collection. Only the species lookup uses the client's retry budget.
 */

import { open } from 'node:fs/promises';
import { basename } from 'node:path';
import { z } from 'zod';
import { AuthenticationError, errorMessage } from '../core/errors.js';
import { HTTPClient, HTTPError } from '../core/http-client.js';
import type { PlantCollectionRecord, SpeciesImageQuery } from '../core/types.js';
import type { Logger } from '../core/utils/logger.js';

// ============================================================================
// Types
// ============================================================================

/**
 * Status and body of a submission
 */
export interface ApiResponse {
  readonly status: number;
  readonly body: string;
}

export interface SpeciesMatch {
  readonly id: number | string;
}

export interface SpeciesSearchResult {
  readonly count: number;
  readonly results: readonly SpeciesMatch[];
}

/**
 * Remote operations used by the sync driver
 */
export interface CollectionsApi {
  createCollection(record: PlantCollectionRecord): Promise<ApiResponse>;
  findSpecies(query: SpeciesImageQuery): Promise<SpeciesSearchResult>;
  attachSpeciesImage(speciesId: number | string, filePath: string): Promise<ApiResponse>;
}

export interface AuthenticateOptions {
  /** e.g. https://redbuttegarden.org */
  readonly baseUrl: string;
  readonly username: string;
  readonly password: string;
  readonly http: HTTPClient;
  readonly logger?: Logger;
}

export interface ApiSession {
  readonly csrfToken: string;
  readonly token: string;
}

// ============================================================================
// Response schemas
// ============================================================================

const TokenResponseSchema = z.object({
  token: z.string().min(1),
});

const SpeciesSearchSchema = z.object({
  count: z.number().int().nonnegative(),
  results: z.array(
    z
      .object({
        id: z.union([z.number(), z.string()]),
      })
      .passthrough()
  ),
});

export const API_PATHS = {
  token: '/plants/api/token/',
  collections: '/plants/api/collections/',
  species: '/plants/api/species/',
  setImage: (speciesId: number | string) => `/plants/api/species/${speciesId}/set-image/`,
} as const;

const SPECIES_QUERY_KEYS: readonly (keyof SpeciesImageQuery)[] = [
  'genus',
  'name',
  'subspecies',
  'variety',
  'subvariety',
  'forma',
  'subforma',
  'cultivar',
];

const CSRF_COOKIE = 'csrftoken';

/**
 * Find a cookie value among Set-Cookie header lines
 */
export function findCookie(setCookies: readonly string[], name: string): string | null {
  for (const line of setCookies) {
    const [pair = ''] = line.split(';');
    const separator = pair.indexOf('=');
    if (separator === -1) continue;
    if (pair.slice(0, separator).trim() === name) {
      return pair.slice(separator + 1).trim();
    }
  }
  return null;
}

// ============================================================================
// Client
// ============================================================================

export class CollectionsApiClient implements CollectionsApi {
  private readonly baseUrl: string;
  private readonly http: HTTPClient;
  private readonly session: ApiSession;
  private readonly logger?: Logger;

  constructor(baseUrl: string, http: HTTPClient, session: ApiSession, logger?: Logger) {
    this.baseUrl = baseUrl.replace(/\/+$/, '');
    this.http = http;
    this.session = session;
    this.logger = logger;
  }

  /**
   * Obtain a session and return a client bound to it
   *
   * @throws {AuthenticationError} If the token endpoint does not return 200
   *   with a csrftoken cookie and a token
   */
  static async authenticate(options: AuthenticateOptions): Promise<CollectionsApiClient> {
    const baseUrl = options.baseUrl.replace(/\/+$/, '');
    const url = `${baseUrl}${API_PATHS.token}`;

    let response: Response;
    try {
      response = await options.http.fetchWithRetry(url, {
        method: 'POST',
        body: new URLSearchParams({ username: options.username, password: options.password }),
        retries: 0,
      });
    } catch (error) {
      if (error instanceof HTTPError) {
        throw new AuthenticationError(
          `Token request rejected with status ${error.statusCode}: ${error.responseBody}`,
          error.statusCode
        );
      }
      throw new AuthenticationError(`Token request failed: ${errorMessage(error)}`);
    }

    if (response.status !== 200) {
      throw new AuthenticationError(
        `Token request returned status ${response.status}`,
        response.status
      );
    }

    const csrfToken = findCookie(response.headers.getSetCookie(), CSRF_COOKIE);
    if (!csrfToken) {
      throw new AuthenticationError('Token response did not set a csrftoken cookie', response.status);
    }

    let token: string;
    try {
      ({ token } = await options.http.parseJSON(url, response, TokenResponseSchema));
    } catch (error) {
      throw new AuthenticationError(`Token response is invalid: ${errorMessage(error)}`, response.status);
    }

    options.logger?.info('Authenticated', { baseUrl, username: options.username });
    return new CollectionsApiClient(baseUrl, options.http, { csrfToken, token }, options.logger);
  }

  async createCollection(record: PlantCollectionRecord): Promise<ApiResponse> {
    const response = await this.http.fetchWithRetry(this.url(API_PATHS.collections), {
      method: 'POST',
      headers: { ...this.sessionHeaders(), 'Content-Type': 'application/json' },
      body: JSON.stringify(record),
      retries: 0,
    });
    return { status: response.status, body: await response.text() };
  }

  async findSpecies(query: SpeciesImageQuery): Promise<SpeciesSearchResult> {
    const params = new URLSearchParams();
    for (const key of SPECIES_QUERY_KEYS) {
      params.set(key, query[key]);
    }

    return this.http.fetchJSON(`${this.url(API_PATHS.species)}?${params.toString()}`, SpeciesSearchSchema, {
      headers: this.sessionHeaders(),
    });
  }

  /**
   * Upload an image file as the species' image
   *
   * The file handle is closed whatever the outcome.
   */
  async attachSpeciesImage(speciesId: number | string, filePath: string): Promise<ApiResponse> {
    const handle = await open(filePath, 'r');
    try {
      const data = await handle.readFile();
      const form = new FormData();
      form.append('image', new Blob([data]), basename(filePath));

      this.logger?.debug('Uploading species image', { speciesId, filePath, bytes: data.length });

      const response = await this.http.fetchWithRetry(this.url(API_PATHS.setImage(speciesId)), {
        method: 'POST',
        headers: this.sessionHeaders(),
        body: form,
        retries: 0,
      });
      return { status: response.status, body: await response.text() };
    } finally {
      await handle.close();
    }
  }

  private url(path: string): string {
    return `${this.baseUrl}${path}`;
  }

  private sessionHeaders(): Record<string, string> {
    return {
      Accept: 'application/json; q=1.0, */*',
      'X-CSRFToken': this.session.csrfToken,
      Cookie: `${CSRF_COOKIE}=${this.session.csrfToken}`,
      Authorization: `Token ${this.session.token}`,
    };
  }
}
