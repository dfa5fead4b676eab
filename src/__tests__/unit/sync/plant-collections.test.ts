/**
 * Plant collection sync loop tests (in-memory API)
 */

import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { FileDecodeError } from '../../../core/errors.js';
import { HTTPError } from '../../../core/http-client.js';
import { syncPlantCollections } from '../../../sync/plant-collections.js';
import { FakeCollectionsApi } from '../../utils/fake-api.js';
import {
  PLANT_HEADER,
  createTempDir,
  createTestLogger,
  exportText,
  plantRow,
  utf16le,
  type TempDir,
} from '../../utils/fixtures.js';

describe('syncPlantCollections', () => {
  let dir: TempDir;

  beforeEach(() => {
    dir = createTempDir();
  });

  afterEach(() => {
    dir.cleanup();
  });

  function writeExport(rows: string[][]): string {
    return dir.write('plants.csv', utf16le(exportText([[...PLANT_HEADER], ...rows])));
  }

  it('skips a row with invalid hardiness and submits the rest', async () => {
    const { logger, sink } = createTestLogger();
    const api = new FakeCollectionsApi();
    const filePath = writeExport([
      plantRow({ plantId: 'P-1' }),
      plantRow({ plantId: 'P-2', hardiness: 'x' }),
      plantRow({ plantId: 'P-3' }),
    ]);

    const summary = await syncPlantCollections({ filePath, logger, api });

    expect(api.collections.map((record) => record.plant_id)).toEqual(['P-1', 'P-3']);
    expect(summary).toMatchObject({
      kind: 'plant-collections',
      filePath,
      encoding: 'utf-16le',
      rowsRead: 3,
      outcomes: {
        submitted: 2,
        rejected: 0,
        submit_failed: 0,
        transform_failed: 1,
        unresolved: 0,
        dry_run: 0,
      },
    });
    expect(sink.at('error').map((e) => e.message)).toEqual([
      'Failed to process collection with ID P-2: Invalid hardiness zone list: "x"',
    ]);
  });

  it('a status other than 200 is a warning and counts as rejected', async () => {
    const { logger, sink } = createTestLogger();
    const api = new FakeCollectionsApi({
      createCollection: () => ({ status: 201, body: '{"id":5}' }),
    });
    const filePath = writeExport([plantRow({ plantId: 'P-1' })]);

    const summary = await syncPlantCollections({ filePath, logger, api });

    expect(summary.outcomes.rejected).toBe(1);
    const [warning] = sink.at('warn');
    expect(warning?.message).toBe('Collection P-1 returned status 201');
    expect(warning?.metadata).toMatchObject({ status: 201, body: '{"id":5}' });
  });

  it('HTTP errors are logged with status, body and payload and the loop continues', async () => {
    const { logger, sink } = createTestLogger();
    const api = new FakeCollectionsApi({
      createCollection: (_record, index) => {
        if (index === 0) {
          throw new HTTPError('HTTP 400: Bad Request', 400, 'https://example.test', '{"detail":"bad"}');
        }
        return { status: 200, body: '' };
      },
    });
    const filePath = writeExport([plantRow({ plantId: 'P-1' }), plantRow({ plantId: 'P-2' })]);

    const summary = await syncPlantCollections({ filePath, logger, api });

    expect(api.collections).toHaveLength(2);
    expect(summary.outcomes).toMatchObject({ submit_failed: 1, submitted: 1 });

    const [error] = sink.at('error');
    expect(error?.message).toBe('Failed to submit collection with ID P-1: HTTP 400: Bad Request');
    expect(error?.metadata).toMatchObject({
      plantId: 'P-1',
      status: 400,
      body: '{"detail":"bad"}',
      payload: { plant_id: 'P-1' },
    });
  });

  it('dry run transforms without an API', async () => {
    const { logger } = createTestLogger();
    const filePath = writeExport([plantRow(), plantRow({ latitude: 'north' })]);

    const summary = await syncPlantCollections({ filePath, logger, dryRun: true });

    expect(summary.outcomes).toMatchObject({ dry_run: 1, transform_failed: 1, submitted: 0 });
  });

  it('requires an API unless dry run is set', async () => {
    const { logger } = createTestLogger();
    const filePath = writeExport([]);

    await expect(syncPlantCollections({ filePath, logger })).rejects.toThrow(
      'syncPlantCollections requires an api client unless dryRun is set'
    );
  });

  it('warns when the header drifts from the schema', async () => {
    const { logger, sink } = createTestLogger();
    const header = [...PLANT_HEADER];
    header[21] = 'accession';
    const filePath = dir.write('plants.csv', utf16le(exportText([header, plantRow()])));

    await syncPlantCollections({ filePath, logger, dryRun: true });

    const [warning] = sink.at('warn');
    expect(warning?.message).toBe(`Header of ${filePath} does not match the expected columns`);
    expect(warning?.metadata).toMatchObject({
      mismatchCount: 1,
      mismatches: ['#21: expected "plantid", found "accession"'],
    });
  });

  it('undecodable file propagates FileDecodeError', async () => {
    const { logger } = createTestLogger();
    const filePath = dir.write('plants.csv', Buffer.from([0x68, 0x00, 0x41]));

    await expect(syncPlantCollections({ filePath, logger, dryRun: true })).rejects.toThrow(
      FileDecodeError
    );
  });
});
