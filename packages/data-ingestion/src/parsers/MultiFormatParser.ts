import path from 'path';
import { BaseParser } from './BaseParser';
import { CsvParser, CsvParserOptions } from './CsvParser';
import { JsonParser } from './JsonParser';
import { FileFormat, SourceLayout, SourceReadResult, SourceRecord } from '../types';
import { FileDetectionService } from '../utils/fileDetection';
import { SourceUnreadableError } from '../utils/errorUtils';
import logger from '../utils/logger';

/**
 * Picks a Source Reader by file format and collects sources into memory
 */
export class MultiFormatParser {
  private readonly csvOptions: CsvParserOptions;

  constructor(csvOptions: CsvParserOptions = {}) {
    this.csvOptions = csvOptions;
  }

  createParser(filePath: string, layout: SourceLayout): BaseParser {
    const format = FileDetectionService.detectFileFormat(path.basename(filePath));

    switch (format) {
      case FileFormat.CSV:
        return new CsvParser(filePath, layout, this.csvOptions);
      case FileFormat.JSON:
      case FileFormat.JSONL:
        return new JsonParser(filePath, layout, format);
      default:
        throw new SourceUnreadableError(filePath, 'unsupported file format');
    }
  }

  /**
   * Read a whole source. Throws SourceUnreadableError when the file cannot
   * be read at all. `onProgress` receives the running row count every
   * thousand records.
   */
  async readAll(
    filePath: string,
    layout: SourceLayout,
    onProgress?: (rowsRead: number) => void
  ): Promise<SourceReadResult> {
    const parser = this.createParser(filePath, layout);
    const records: SourceRecord[] = [];
    if (onProgress) {
      parser.on('progress', (event: { rows_read: number }) => onProgress(event.rows_read));
    }

    for await (const record of parser.read()) {
      records.push(record);
    }

    const stats = parser.getStats();
    logger.info('Source loaded', {
      source: layout.source,
      file: filePath,
      format: parser.format,
      rows_read: stats.rows_read,
      rows_skipped: stats.rows_skipped
    });

    return {
      source: layout.source,
      format: parser.format,
      records,
      stats
    };
  }
}

export default MultiFormatParser;
