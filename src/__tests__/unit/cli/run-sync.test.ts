/**
 * Sync run orchestration tests (in-memory API)
 */

import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { AuthenticationError, ConfigurationError, FileDecodeError } from '../../../core/errors.js';
import { runSync, type ApiConnector } from '../../../cli/commands/sync/run.js';
import {
  DEFAULT_CONFIG,
  validateConfig,
  type SyncConfig,
  type ValidSyncConfig,
} from '../../../cli/lib/config.js';
import { EXIT_CODES, exitCodeFor } from '../../../cli/lib/exit-codes.js';
import { FakeCollectionsApi } from '../../utils/fake-api.js';
import {
  IMAGE_HEADER,
  PLANT_HEADER,
  createTempDir,
  createTestLogger,
  exportText,
  imageRow,
  plantRow,
  utf16le,
  type TempDir,
} from '../../utils/fixtures.js';

const CREDENTIALS = { RBG_API_USERNAME: 'test-user', RBG_API_PASSWORD: 'test-secret' };

describe('runSync', () => {
  let dir: TempDir;
  let config: ValidSyncConfig;

  function configWith(changes: Partial<SyncConfig>): ValidSyncConfig {
    const candidate: SyncConfig = { ...config, ...changes };
    validateConfig(candidate);
    return candidate;
  }

  beforeEach(() => {
    dir = createTempDir();
    const plantData = dir.write(
      'plants.csv',
      utf16le(exportText([[...PLANT_HEADER], plantRow({ plantId: 'P-1' }), plantRow({ plantId: 'P-2' })]))
    );
    const imageData = dir.write(
      'images.csv',
      exportText([[...IMAGE_HEADER], imageRow({ directoryName: dir.path })])
    );

    const base: SyncConfig = {
      ...DEFAULT_CONFIG,
      paths: { ...DEFAULT_CONFIG.paths, plantData, imageData },
      images: { ...DEFAULT_CONFIG.images, strategy: 'direct' },
      configPath: null,
    };
    validateConfig(base);
    config = base;
  });

  afterEach(() => {
    dir.cleanup();
  });

  it('dry run reads both exports without credentials or a session', async () => {
    const { logger } = createTestLogger();
    const connect = vi.fn<ApiConnector>();

    const summaries = await runSync({
      config: configWith({ dryRun: true }),
      logger,
      kinds: ['plant-collections', 'species-images'],
      env: {},
      connect,
    });

    expect(connect).not.toHaveBeenCalled();
    expect(summaries.map((s) => [s.kind, s.outcomes.dry_run])).toEqual([
      ['plant-collections', 2],
      ['species-images', 1],
    ]);
  });

  it('missing credentials fail before any row is read', async () => {
    const { logger } = createTestLogger();
    const connect = vi.fn<ApiConnector>();

    await expect(
      runSync({ config, logger, kinds: ['plant-collections'], env: {}, connect })
    ).rejects.toThrow(ConfigurationError);
    expect(connect).not.toHaveBeenCalled();
  });

  it('connects once and syncs exports in the requested order', async () => {
    const { logger } = createTestLogger();
    const api = new FakeCollectionsApi();
    const connect = vi.fn<ApiConnector>(async () => api);

    const summaries = await runSync({
      config,
      logger,
      kinds: ['plant-collections', 'species-images'],
      env: CREDENTIALS,
      connect,
    });

    expect(connect).toHaveBeenCalledTimes(1);
    expect(connect.mock.calls[0]?.[1]).toEqual({ username: 'test-user', password: 'test-secret' });
    expect(api.collections.map((r) => r.plant_id)).toEqual(['P-1', 'P-2']);
    expect(api.attachments).toHaveLength(1);
    expect(summaries.map((s) => s.outcomes.submitted)).toEqual([2, 1]);
  });

  it('syncs only the requested export', async () => {
    const { logger } = createTestLogger();
    const api = new FakeCollectionsApi();

    const summaries = await runSync({
      config,
      logger,
      kinds: ['species-images'],
      env: CREDENTIALS,
      connect: async () => api,
    });

    expect(summaries.map((s) => s.kind)).toEqual(['species-images']);
    expect(api.collections).toEqual([]);
  });

  it('authentication failures propagate', async () => {
    const { logger } = createTestLogger();

    await expect(
      runSync({
        config,
        logger,
        kinds: ['plant-collections'],
        env: CREDENTIALS,
        connect: async () => {
          throw new AuthenticationError('Token request returned status 403', 403);
        },
      })
    ).rejects.toThrow(AuthenticationError);
  });

  it('loads a custom column profile', async () => {
    const { logger } = createTestLogger();
    const columns = IMAGE_HEADER.map((column, index) => ({
      index,
      column,
      field: [
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
      ][index],
    }));
    const imageSchema = dir.write(
      'images.v1.json',
      JSON.stringify({ id: 'species-images', version: 1, width: 12, columns })
    );

    const [summary] = await runSync({
      config: configWith({ dryRun: true, paths: { ...config.paths, imageSchema } }),
      logger,
      kinds: ['species-images'],
    });

    expect(summary?.outcomes.dry_run).toBe(1);
  });
});

describe('exitCodeFor', () => {
  it.each([
    [new ConfigurationError('missing'), EXIT_CODES.CONFIG_ERROR],
    [new AuthenticationError('denied', 401), EXIT_CODES.NETWORK_ERROR],
    [new FileDecodeError('plants.csv', 'utf-16le'), EXIT_CODES.DATA_INTEGRITY_ERROR],
    [Object.assign(new Error('ENOENT: no such file'), { code: 'ENOENT' }), EXIT_CODES.DATA_INTEGRITY_ERROR],
    [new Error('unexpected'), EXIT_CODES.ERRORS],
    ['not an error', EXIT_CODES.ERRORS],
  ])('%s -> %i', (error, code) => {
    expect(exitCodeFor(error)).toBe(code);
  });
});
