/**
 * BRAHMS Export Reader
 *
 * Streams a delimited export as raw rows. Bytes are decoded strictly: content
 * that does not match the declared encoding raises FileDecodeError instead
 * of producing replacement characters.
 *
 * USAGE:
 * ```typescript
 * const { header, encoding, rows } = await openExport({
 *   filePath: 'species_image_locations.csv',
 *   encodings: ['utf-8', 'utf-16le'],
 * });
 * for await (const row of rows) {
 *   // header already consumed
 * }
 * ```
 *
 * @module ingestion/export-reader
 */

import { createReadStream } from 'node:fs';
import type { Readable } from 'node:stream';
import { TextDecoder } from 'node:util';
import { FileDecodeError } from '../core/errors.js';
import type { Logger } from '../core/utils/logger.js';
import type { RawRow } from '../core/types.js';
import { DelimitedParser } from './delimited-parser.js';

export type ExportEncoding = 'utf-8' | 'utf-16le' | 'utf-16be' | 'latin1';

export const EXPORT_ENCODINGS: readonly ExportEncoding[] = ['utf-8', 'utf-16le', 'utf-16be', 'latin1'];

export function isExportEncoding(value: string): value is ExportEncoding {
  return EXPORT_ENCODINGS.some((encoding) => encoding === value);
}

export interface ExportReaderOptions {
  readonly filePath: string;
  /** Default: utf-8 */
  readonly encoding?: ExportEncoding;
  /** Default: | */
  readonly delimiter?: string;
  /** Byte stream factory (default: fs.createReadStream) */
  readonly openStream?: (filePath: string) => Readable;
}

export class ExportReader {
  readonly filePath: string;
  readonly encoding: ExportEncoding;
  readonly delimiter: string;
  private readonly openStream: (filePath: string) => Readable;

  constructor(options: ExportReaderOptions) {
    this.filePath = options.filePath;
    this.encoding = options.encoding ?? 'utf-8';
    this.delimiter = options.delimiter ?? '|';
    this.openStream = options.openStream ?? ((filePath) => createReadStream(filePath));
  }

  /**
   * Lazily yield every row, header included
   *
   * The file is opened on first iteration and closed when iteration ends,
   * is abandoned with `return()`, or fails.
   *
   * @throws {FileDecodeError} If the bytes are invalid for the encoding
   */
  async *rows(): AsyncGenerator<RawRow, void, undefined> {
    const decoder = new TextDecoder(this.encoding, { fatal: true });
    const parser = new DelimitedParser({ delimiter: this.delimiter });
    const stream = this.openStream(this.filePath);

    try {
      for await (const chunk of stream) {
        yield* parser.push(this.decode(decoder, chunk));
      }
      yield* parser.push(this.decode(decoder));
      yield* parser.flush();
    } finally {
      stream.destroy();
    }
  }

  private decode(decoder: TextDecoder, bytes?: Uint8Array): string {
    try {
      return bytes ? decoder.decode(bytes, { stream: true }) : decoder.decode();
    } catch (error) {
      // TextDecoder raises TypeError for invalid input in fatal mode
      if (error instanceof TypeError) {
        throw new FileDecodeError(this.filePath, this.encoding, error);
      }
      throw error;
    }
  }
}

export interface OpenExportOptions {
  readonly filePath: string;
  /** Tried in order until the header decodes */
  readonly encodings: readonly [ExportEncoding, ...ExportEncoding[]];
  readonly delimiter?: string;
  readonly logger?: Logger;
  readonly openStream?: (filePath: string) => Readable;
}

export interface OpenedExport {
  /** First row of the file, or [] for an empty file */
  readonly header: RawRow;
  readonly encoding: ExportEncoding;
  /** Remaining data rows */
  readonly rows: AsyncGenerator<RawRow, void, undefined>;
}

/**
 * Open an export, consuming its header row
 *
 * Falls back to the next encoding when the header cannot be decoded. A
 * decode failure later in the file propagates from `rows`.
 *
 * @throws {FileDecodeError} If no encoding decodes the header
 */
export async function openExport(options: OpenExportOptions): Promise<OpenedExport> {
  const [firstEncoding] = options.encodings;
  let lastError = new FileDecodeError(options.filePath, firstEncoding);

  for (const encoding of options.encodings) {
    const reader = new ExportReader({
      filePath: options.filePath,
      encoding,
      delimiter: options.delimiter,
      openStream: options.openStream,
    });
    const rows = reader.rows();

    try {
      const first = await rows.next();
      options.logger?.debug('Opened export', { filePath: options.filePath, encoding });
      return { header: first.done ? [] : first.value, encoding, rows };
    } catch (error) {
      if (!(error instanceof FileDecodeError)) {
        throw error;
      }
      lastError = error;
      options.logger?.info(`Could not decode ${options.filePath} as ${encoding}`, {
        filePath: options.filePath,
        encoding,
      });
    }
  }

  throw lastError;
}
