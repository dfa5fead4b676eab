/**
 * Species image sync loop tests (in-memory API)
 */

import { join } from 'node:path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { syncSpeciesImages } from '../../../sync/species-images.js';
import { DirectPathResolver } from '../../../transformation/image-path.js';
import { FakeCollectionsApi } from '../../utils/fake-api.js';
import {
  IMAGE_HEADER,
  createTempDir,
  createTestLogger,
  exportText,
  imageRow,
  type TempDir,
} from '../../utils/fixtures.js';

const pathResolver = new DirectPathResolver();

describe('syncSpeciesImages', () => {
  let dir: TempDir;

  beforeEach(() => {
    dir = createTempDir();
  });

  afterEach(() => {
    dir.cleanup();
  });

  function writeExport(rows: string[][]): string {
    return dir.write('images.csv', exportText([[...IMAGE_HEADER], ...rows]));
  }

  it('attaches the image when exactly one species matches', async () => {
    const { logger } = createTestLogger();
    const api = new FakeCollectionsApi({ findSpecies: () => ({ count: 1, results: [{ id: 7 }] }) });
    const filePath = writeExport([imageRow({ directoryName: '/photos/Pinus' })]);

    const summary = await syncSpeciesImages({ filePath, logger, api, pathResolver });

    expect(api.speciesQueries[0]).toMatchObject({ genus: 'Pinus', name: 'aristata' });
    expect(api.attachments).toEqual([
      { speciesId: 7, filePath: join('/photos/Pinus', 'pinus-aristata.jpg') },
    ]);
    expect(summary).toMatchObject({
      kind: 'species-images',
      encoding: 'utf-8',
      rowsRead: 1,
      outcomes: { submitted: 1 },
    });
  });

  it('two matches skip the row without attaching', async () => {
    const { logger, sink } = createTestLogger();
    const api = new FakeCollectionsApi({
      findSpecies: () => ({ count: 2, results: [{ id: 7 }, { id: 8 }] }),
    });
    const filePath = writeExport([imageRow()]);

    const summary = await syncSpeciesImages({ filePath, logger, api, pathResolver });

    expect(api.attachments).toEqual([]);
    expect(summary.outcomes.unresolved).toBe(1);
    expect(sink.at('info').some((e) => e.message.startsWith('Species lookup returned 2 matches'))).toBe(
      true
    );
  });

  it('no match skips the row', async () => {
    const { logger } = createTestLogger();
    const api = new FakeCollectionsApi({ findSpecies: () => ({ count: 0, results: [] }) });
    const filePath = writeExport([imageRow()]);

    const summary = await syncSpeciesImages({ filePath, logger, api, pathResolver });

    expect(api.attachments).toEqual([]);
    expect(summary.outcomes.unresolved).toBe(1);
  });

  it('upload failure is logged and the loop continues', async () => {
    const { logger, sink } = createTestLogger();
    const api = new FakeCollectionsApi({
      attachSpeciesImage: (_call, index) => {
        if (index === 0) throw new Error('ENOENT: no such file or directory');
        return { status: 200, body: '' };
      },
    });
    const filePath = writeExport([
      imageRow({ imageFile: 'missing.jpg', directoryName: '/photos' }),
      imageRow({ imageFile: 'present.jpg', directoryName: '/photos' }),
    ]);

    const summary = await syncSpeciesImages({ filePath, logger, api, pathResolver });

    expect(summary.outcomes).toMatchObject({ submit_failed: 1, submitted: 1 });
    expect(sink.at('error').map((e) => e.message)).toEqual([
      `Failed to attach image ${join('/photos', 'missing.jpg')}: ENOENT: no such file or directory`,
    ]);
  });

  it('a status other than 200 counts as rejected', async () => {
    const { logger } = createTestLogger();
    const api = new FakeCollectionsApi({ attachSpeciesImage: () => ({ status: 202, body: '' }) });
    const filePath = writeExport([imageRow()]);

    const summary = await syncSpeciesImages({ filePath, logger, api, pathResolver });

    expect(summary.outcomes.rejected).toBe(1);
  });

  it('width errors count as transform failures', async () => {
    const { logger } = createTestLogger();
    const api = new FakeCollectionsApi();
    const filePath = writeExport([imageRow().slice(0, 11), [...imageRow(), 'extra'], imageRow()]);

    const summary = await syncSpeciesImages({ filePath, logger, api, pathResolver });

    expect(summary.rowsRead).toBe(3);
    expect(summary.outcomes).toMatchObject({ transform_failed: 2, submitted: 1 });
    expect(api.speciesQueries).toHaveLength(1);
  });

  it('dry run makes no API calls', async () => {
    const { logger } = createTestLogger();
    const filePath = writeExport([imageRow(), imageRow()]);

    const summary = await syncSpeciesImages({ filePath, logger, pathResolver, dryRun: true });

    expect(summary.outcomes.dry_run).toBe(2);
  });
});
