/**
 * Incremental parser for delimiter-separated export text
 *
 * Text arrives in arbitrary chunks; completed rows are returned as soon as
 * their line ends. Dialect:
 * - single-character delimiter (BRAHMS exports use `|`)
 * - `"` opens a quoted field only at the start of a field; `""` inside a
 *   quoted field is a literal quote; quoted fields may span lines
 * - lines end at \n, \r\n or \r; blank lines produce no row
 * - whitespace is preserved
 */

export interface DelimitedDialect {
  readonly delimiter: string;
  readonly quote: string;
}

export const DEFAULT_DIALECT: DelimitedDialect = {
  delimiter: '|',
  quote: '"',
};

export class DelimitedParser {
  private readonly dialect: DelimitedDialect;
  private row: string[] = [];
  private field = '';
  private fieldQuoted = false;
  private inQuotes = false;
  /** Quote seen inside a quoted field; either an escape or the closing quote */
  private quotePending = false;
  private afterCarriageReturn = false;

  constructor(dialect: Partial<DelimitedDialect> = {}) {
    this.dialect = { ...DEFAULT_DIALECT, ...dialect };

    if (this.dialect.delimiter.length !== 1) {
      throw new Error(`Delimiter must be a single character, got "${this.dialect.delimiter}"`);
    }
  }

  /**
   * Feed a chunk of decoded text, returning the rows it completes
   */
  push(text: string): string[][] {
    const rows: string[][] = [];
    const { delimiter, quote } = this.dialect;

    for (const char of text) {
      if (this.inQuotes) {
        if (this.quotePending) {
          this.quotePending = false;
          if (char === quote) {
            this.field += quote;
            continue;
          }
          this.inQuotes = false;
        } else {
          if (char === quote) {
            this.quotePending = true;
          } else {
            this.field += char;
          }
          continue;
        }
      }

      if (this.afterCarriageReturn) {
        this.afterCarriageReturn = false;
        if (char === '\n') continue;
      }

      if (char === delimiter) {
        this.endField();
      } else if (char === '\n' || char === '\r') {
        this.afterCarriageReturn = char === '\r';
        const row = this.endRow();
        if (row) rows.push(row);
      } else if (char === quote && this.field === '' && !this.fieldQuoted) {
        this.inQuotes = true;
        this.fieldQuoted = true;
      } else {
        this.field += char;
      }
    }

    return rows;
  }

  /**
   * Complete the final row when the text does not end with a line break
   */
  flush(): string[][] {
    this.inQuotes = false;
    this.quotePending = false;
    this.afterCarriageReturn = false;
    const row = this.endRow();
    return row ? [row] : [];
  }

  private endField(): void {
    this.row.push(this.field);
    this.field = '';
    this.fieldQuoted = false;
  }

  private endRow(): string[] | null {
    if (this.row.length === 0 && this.field === '' && !this.fieldQuoted) {
      return null;
    }
    this.endField();
    const row = this.row;
    this.row = [];
    return row;
  }
}

/**
 * Parse a complete text in one call
 */
export function parseDelimited(text: string, dialect: Partial<DelimitedDialect> = {}): string[][] {
  const parser = new DelimitedParser(dialect);
  return [...parser.push(text), ...parser.flush()];
}
