import { EventEmitter } from 'events';
import { stat } from 'fs/promises';
import type { Logger } from 'winston';
import {
  FileFormat,
  RawValue,
  ReaderStats,
  SkippedRow,
  SourceLayout,
  SourceRecord
} from '../types';
import { componentLogger } from '../utils/logger';
import { SourceUnreadableError, getErrorMessage } from '../utils/errorUtils';

const PROGRESS_INTERVAL = 1000;

/**
 * Source Reader base. Subclasses turn one file into a lazy sequence of
 * SourceRecords in file order; rows that cannot be read at all are skipped
 * and counted, never cleaned.
 *
 * Events: `progress` ({ rows_read }), `rowSkipped` (SkippedRow).
 */
export abstract class BaseParser extends EventEmitter {
  protected readonly filePath: string;
  protected readonly layout: SourceLayout;
  protected readonly logger: Logger;
  protected detectedFormat: FileFormat;
  private rowsRead = 0;
  private skipped: SkippedRow[] = [];

  constructor(filePath: string, layout: SourceLayout, format: FileFormat) {
    super();
    this.filePath = filePath;
    this.layout = layout;
    this.detectedFormat = format;
    this.logger = componentLogger(this.constructor.name);
  }

  /**
   * Yield records lazily. Row ids are 0-based data row positions, so a
   * skipped row still consumes its id.
   */
  abstract read(): AsyncGenerator<SourceRecord>;

  get format(): FileFormat {
    return this.detectedFormat;
  }

  getStats(): ReaderStats {
    return {
      rows_read: this.rowsRead,
      rows_skipped: this.skipped.length,
      skipped: this.skipped.map(row => ({ ...row }))
    };
  }

  protected resetStats(): void {
    this.rowsRead = 0;
    this.skipped = [];
  }

  protected get declaredColumns(): string[] {
    return this.layout.columns.map(column => column.name);
  }

  /**
   * Fail fast when the file cannot be opened at all
   */
  protected async assertReadable(): Promise<void> {
    try {
      const info = await stat(this.filePath);
      if (!info.isFile()) {
        throw new SourceUnreadableError(this.filePath, 'not a regular file');
      }
    } catch (error) {
      if (error instanceof SourceUnreadableError) {
        throw error;
      }
      throw new SourceUnreadableError(this.filePath, `cannot open file (${getErrorMessage(error)})`, error);
    }
  }

  protected createRecord(sourceRowId: number, fields: Record<string, RawValue>): SourceRecord {
    this.rowsRead++;
    if (this.rowsRead % PROGRESS_INTERVAL === 0) {
      this.emit('progress', { rows_read: this.rowsRead });
    }

    return Object.freeze({
      source_name: this.layout.source,
      source_row_id: sourceRowId,
      fields: Object.freeze({ ...fields })
    });
  }

  protected skipRow(sourceRowId: number, reason: string): void {
    const skipped: SkippedRow = { source_row_id: sourceRowId, reason };
    this.skipped.push(skipped);
    this.logger.warn('Skipping malformed row', {
      source: this.layout.source,
      source_row_id: sourceRowId,
      reason
    });
    this.emit('rowSkipped', skipped);
  }
}

export default BaseParser;
