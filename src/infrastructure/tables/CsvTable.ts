import Papa from 'papaparse';
import type { Constraint } from '../../domain/model/Constraint.js';
import type { ProblemsView } from '../../ProblemsView.js';
import { validate } from '../../validate.js';

export interface CsvTableOptions {
  /** Field delimiter. Default: auto-detected by papaparse. */
  readonly delimiter?: string;
  /** Drop blank lines instead of reporting them as one-value rows. Default: `true`. */
  readonly skipEmptyLines?: boolean;
}

/**
 * Table over CSV text. The first line is the header.
 *
 * Values stay strings, so numeric checks should coerce (see `toNumber`).
 * Parsing happens on the first pass and the rows are reused afterwards.
 */
export class CsvTable implements Iterable<readonly string[]> {
  private readonly content: string;
  private readonly options: Required<Pick<CsvTableOptions, 'skipEmptyLines'>> & CsvTableOptions;
  private rows: readonly (readonly string[])[] | null = null;

  constructor(data: string | Buffer, options?: CsvTableOptions) {
    this.content = typeof data === 'string' ? data : data.toString('utf-8');
    this.options = {
      ...options,
      skipEmptyLines: options?.skipEmptyLines ?? true,
    };
  }

  /** Pick the delimiter that splits the first lines of `sample` into the most columns. */
  static detectDelimiter(sample: string | Buffer): string {
    const content = typeof sample === 'string' ? sample : sample.toString('utf-8');
    const firstLines = content.split('\n').slice(0, 5).join('\n');

    const delimiters = [',', ';', '\t', '|'];
    let bestDelimiter = ',';
    let maxColumns = 0;

    for (const delimiter of delimiters) {
      const result = Papa.parse<string[]>(firstLines, { delimiter, header: false });
      const firstRow = result.data[0];
      if (firstRow && firstRow.length > maxColumns) {
        maxColumns = firstRow.length;
        bestDelimiter = delimiter;
      }
    }

    return bestDelimiter;
  }

  *[Symbol.iterator](): Generator<readonly string[], void, undefined> {
    yield* this.parse();
  }

  validate(constraints?: readonly Constraint[] | null, header?: Iterable<unknown> | null): ProblemsView {
    return validate(this, constraints, header);
  }

  private parse(): readonly (readonly string[])[] {
    if (this.rows === null) {
      const result = Papa.parse<string[]>(this.content, {
        header: false,
        delimiter: this.options.delimiter || undefined,
        skipEmptyLines: this.options.skipEmptyLines,
        dynamicTyping: false,
      });
      this.rows = result.data;
    }
    return this.rows;
  }
}
