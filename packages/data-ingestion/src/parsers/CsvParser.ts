import { createReadStream } from 'fs';
import { open } from 'fs/promises';
import { pipeline } from 'stream';
import csv from 'csv-parser';
import { BaseParser } from './BaseParser';
import { FileFormat, SourceLayout, SourceRecord } from '../types';
import { SourceUnreadableError, getErrorMessage } from '../utils/errorUtils';

const CANDIDATE_DELIMITERS = [',', ';', '\t', '|'];
const HEAD_BYTES = 4096;

export interface CsvParserOptions {
  /** Skip delimiter detection and use this separator */
  separator?: string;
}

/**
 * Streams a delimited file with a declared header. Cells are passed through
 * as raw strings; a row whose cell count differs from the header is skipped.
 */
export class CsvParser extends BaseParser {
  private readonly options: CsvParserOptions;

  constructor(filePath: string, layout: SourceLayout, options: CsvParserOptions = {}) {
    super(filePath, layout, FileFormat.CSV);
    this.options = options;
  }

  async *read(): AsyncGenerator<SourceRecord> {
    this.resetStats();
    await this.assertReadable();

    const separator = this.options.separator ?? await this.detectDelimiter();
    const parser = csv({
      separator,
      strict: false,
      mapHeaders: ({ header }) => header.replace(/^\uFEFF/, '').trim()
    });

    const header: { names: string[] | null } = { names: null };
    parser.on('headers', (names: string[]) => {
      header.names = names;
    });

    const failure: { error?: Error } = {};
    pipeline(createReadStream(this.filePath), parser, error => {
      if (error) {
        failure.error = error;
      }
    });

    let rowId = 0;
    let headerChecked = false;
    try {
      for await (const chunk of parser) {
        if (!headerChecked) {
          this.checkHeader(header.names);
          headerChecked = true;
        }
        const currentId = rowId++;
        const row = this.toCells(chunk);
        const expected = header.names ?? [];

        if (!row || Object.keys(row).length !== expected.length) {
          const found = row ? Object.keys(row).length : 0;
          this.skipRow(currentId, `expected ${expected.length} cells, found ${found}`);
          continue;
        }

        const fields: Record<string, string> = {};
        for (const name of expected) {
          fields[name] = row[name] ?? '';
        }
        yield this.createRecord(currentId, fields);
      }
    } catch (error) {
      if (error instanceof SourceUnreadableError) {
        throw error;
      }
      throw new SourceUnreadableError(this.filePath, `CSV stream failed (${getErrorMessage(error)})`, error);
    }

    if (failure.error) {
      throw new SourceUnreadableError(this.filePath, `CSV stream failed (${failure.error.message})`, failure.error);
    }
    if (!headerChecked) {
      this.checkHeader(header.names);
    }

    this.logger.info('CSV source read', {
      source: this.layout.source,
      rows_read: this.getStats().rows_read,
      rows_skipped: this.getStats().rows_skipped
    });
  }

  /**
   * Pick the candidate delimiter that splits the header line into the most columns
   */
  async detectDelimiter(): Promise<string> {
    const handle = await open(this.filePath, 'r');
    try {
      const buffer = Buffer.alloc(HEAD_BYTES);
      const { bytesRead } = await handle.read(buffer, 0, HEAD_BYTES, 0);
      const firstLine = buffer.subarray(0, bytesRead).toString('utf8').split(/\r?\n/)[0] ?? '';

      let best = ',';
      let bestCount = 0;
      for (const delimiter of CANDIDATE_DELIMITERS) {
        const count = firstLine.split(delimiter).length - 1;
        if (count > bestCount) {
          best = delimiter;
          bestCount = count;
        }
      }
      return best;
    } finally {
      await handle.close();
    }
  }

  private checkHeader(headers: string[] | null): void {
    const names = headers ?? [];
    if (names.length === 0) {
      throw new SourceUnreadableError(this.filePath, 'missing header row');
    }
    const missing = this.declaredColumns.filter(column => !names.includes(column));
    if (missing.length > 0) {
      throw new SourceUnreadableError(this.filePath, `missing declared columns: ${missing.join(', ')}`);
    }
  }

  private toCells(chunk: unknown): Record<string, string> | null {
    if (!chunk || typeof chunk !== 'object' || Array.isArray(chunk)) {
      return null;
    }
    const cells: Record<string, string> = {};
    for (const [key, value] of Object.entries(chunk)) {
      cells[key] = typeof value === 'string' ? value : String(value);
    }
    return cells;
  }
}

export default CsvParser;
