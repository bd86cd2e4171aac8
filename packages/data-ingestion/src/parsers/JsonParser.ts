import { readFile } from 'fs/promises';
import { z } from 'zod';
import { BaseParser } from './BaseParser';
import { FileFormat, RawValue, SourceLayout, SourceRecord } from '../types';
import { FileDetectionService } from '../utils/fileDetection';
import { SourceUnreadableError, getErrorMessage } from '../utils/errorUtils';

const entrySchema = z.record(z.string(), z.unknown());

type JsonEntry = z.infer<typeof entrySchema>;

/**
 * Reads semi-structured posts from a JSON array or JSON Lines file.
 * Nested objects are flattened one level (`engagement.likes` becomes
 * `engagement_likes`); arrays stay JSON text for the normalizer.
 */
export class JsonParser extends BaseParser {
  constructor(filePath: string, layout: SourceLayout, format: FileFormat = FileFormat.JSON) {
    super(filePath, layout, format);
  }

  async *read(): AsyncGenerator<SourceRecord> {
    this.resetStats();
    await this.assertReadable();

    let content: string;
    try {
      content = (await readFile(this.filePath, 'utf8')).replace(/^\uFEFF/, '');
    } catch (error) {
      throw new SourceUnreadableError(this.filePath, `cannot read file (${getErrorMessage(error)})`, error);
    }

    if (this.detectedFormat !== FileFormat.JSONL) {
      this.detectedFormat = FileDetectionService.sniffJsonLayout(content);
    }

    if (this.detectedFormat === FileFormat.JSONL) {
      yield* this.readLines(content);
    } else {
      yield* this.readArray(content);
    }

    this.logger.info('JSON source read', {
      source: this.layout.source,
      format: this.detectedFormat,
      rows_read: this.getStats().rows_read,
      rows_skipped: this.getStats().rows_skipped
    });
  }

  private *readArray(content: string): Generator<SourceRecord> {
    let parsed: unknown;
    try {
      parsed = JSON.parse(content);
    } catch (error) {
      throw new SourceUnreadableError(this.filePath, `invalid JSON (${getErrorMessage(error)})`, error);
    }

    if (!Array.isArray(parsed)) {
      throw new SourceUnreadableError(this.filePath, 'expected a JSON array of entries');
    }

    for (let index = 0; index < parsed.length; index++) {
      const entry = entrySchema.safeParse(parsed[index]);
      if (!entry.success) {
        this.skipRow(index, 'entry is not a JSON object');
        continue;
      }
      yield this.createRecord(index, flattenEntry(entry.data));
    }
  }

  private *readLines(content: string): Generator<SourceRecord> {
    const lines = content.split(/\r?\n/).filter(line => line.trim().length > 0);

    for (let index = 0; index < lines.length; index++) {
      let value: unknown;
      try {
        value = JSON.parse(lines[index]);
      } catch (error) {
        this.skipRow(index, `invalid JSON line (${getErrorMessage(error)})`);
        continue;
      }

      const entry = entrySchema.safeParse(value);
      if (!entry.success) {
        this.skipRow(index, 'entry is not a JSON object');
        continue;
      }
      yield this.createRecord(index, flattenEntry(entry.data));
    }
  }
}

function toRawValue(value: unknown): RawValue {
  if (value === null || value === undefined) {
    return null;
  }
  if (typeof value === 'string' || typeof value === 'number') {
    return value;
  }
  if (typeof value === 'boolean') {
    return String(value);
  }
  return JSON.stringify(value);
}

export function flattenEntry(entry: JsonEntry): Record<string, RawValue> {
  const fields: Record<string, RawValue> = {};

  for (const [key, value] of Object.entries(entry)) {
    const nested = entrySchema.safeParse(value);
    if (nested.success) {
      for (const [childKey, childValue] of Object.entries(nested.data)) {
        fields[`${key}_${childKey}`] = toRawValue(childValue);
      }
      continue;
    }
    fields[key] = toRawValue(value);
  }

  return fields;
}

export default JsonParser;
