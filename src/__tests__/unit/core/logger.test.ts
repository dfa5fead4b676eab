import { readFileSync } from 'node:fs';
import { join } from 'node:path';
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import {
  ConsoleSink,
  FileSink,
  Logger,
  MemorySink,
  createLogger,
  formatDuration,
} from '../../../core/utils/logger.js';
import { createTempDir, type TempDir } from '../../utils/fixtures.js';

describe('Logger', () => {
  beforeEach(() => {
    vi.useFakeTimers();
    vi.setSystemTime(new Date('2024-05-01T12:00:00.000Z'));
  });

  afterEach(() => {
    vi.useRealTimers();
  });

  it('each sink applies its own minimum level', () => {
    const all = new MemorySink('debug');
    const warnings = new MemorySink('warn');
    const logger = new Logger({ service: 'test', sinks: [all, warnings] });

    logger.debug('one');
    logger.info('two');
    logger.warn('three');
    logger.error('four');

    expect(all.entries.map((e) => e.message)).toEqual(['one', 'two', 'three', 'four']);
    expect(warnings.entries.map((e) => e.level)).toEqual(['warn', 'error']);
  });

  it('child loggers merge context into every entry', () => {
    const sink = new MemorySink();
    const logger = new Logger({ service: 'test', sinks: [sink], context: { run: 1 } });

    logger.child({ kind: 'species-images' }).info('row', { row: 3 });

    expect(sink.entries).toEqual([
      {
        timestamp: '2024-05-01T12:00:00.000Z',
        level: 'info',
        service: 'test',
        message: 'row',
        metadata: { run: 1, kind: 'species-images', row: 3 },
      },
    ]);
  });

  it('createLogger adds the file sink only when configured', () => {
    expect(createLogger({ console: false }).sinks).toEqual([]);

    const logger = createLogger({ file: { filePath: 'main.log', level: 'warn' } });
    expect(logger.sinks.map((sink) => sink.constructor.name)).toEqual(['ConsoleSink', 'FileSink']);
    expect(logger.sinks.map((sink) => sink.level)).toEqual(['info', 'warn']);
  });
});

describe('FileSink', () => {
  let dir: TempDir;

  beforeEach(() => {
    dir = createTempDir();
  });

  afterEach(() => {
    dir.cleanup();
  });

  it('appends one formatted line per entry', () => {
    const filePath = join(dir.path, 'main.log');
    const sink = new FileSink({ filePath, level: 'warn' });
    const logger = new Logger({ service: 'brahms-sync', sinks: [sink] });

    logger.info('ignored');
    logger.warn('Collection P-1 returned status 201', { status: 201 });
    logger.error('Failed');

    const lines = readFileSync(filePath, 'utf-8').trimEnd().split('\n');
    expect(lines).toHaveLength(2);
    expect(lines[0]).toMatch(
      /^\d{4}-\d{2}-\d{2}T[\d:.]+Z \[brahms-sync\] \[WARN \] Collection P-1 returned status 201 \{"status":201\}$/
    );
    expect(lines[1]).toMatch(/\[ERROR\] Failed$/);
  });
});

describe('ConsoleSink', () => {
  it('writes JSON lines through the matching console method', () => {
    const info = vi.spyOn(console, 'info').mockImplementation(() => undefined);
    const sink = new ConsoleSink({ level: 'debug', json: true });

    sink.write({
      timestamp: '2024-05-01T12:00:00.000Z',
      level: 'info',
      service: 'test',
      message: 'hello',
      metadata: { rows: 2 },
    });

    expect(info).toHaveBeenCalledWith(
      '{"timestamp":"2024-05-01T12:00:00.000Z","level":"info","service":"test","message":"hello","rows":2}'
    );
  });
});

describe('formatDuration', () => {
  it.each([
    [250, '250ms'],
    [1500, '1.50s'],
    [90000, '1m 30.0s'],
  ])('%i -> %s', (ms, expected) => {
    expect(formatDuration(ms)).toBe(expected);
  });
});
