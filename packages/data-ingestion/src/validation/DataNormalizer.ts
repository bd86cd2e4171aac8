import { format, isValid, parse } from 'date-fns';
import { UTCDate } from '@date-fns/utc';
import {
  Casing,
  DateRange,
  FieldType,
  FieldValue,
  NormalizedValue,
  NumericRange,
  RawValue
} from '../types';

// Fills date parts a pattern does not carry. Being a UTCDate, it also makes
// parse read zoneless patterns as UTC wall-clock time on any host.
const REFERENCE_DATE = new UTCDate(2000, 0, 1);

export interface DataNormalizerOptions {
  dateFormats: readonly string[];
  timestampFormats: readonly string[];
  currencyMap: Readonly<Record<string, string>>;
}

function valid<T>(normalized: T, original: RawValue): NormalizedValue<T> {
  return { isValid: true, normalized, original };
}

function invalid<T>(error: string, original: RawValue): NormalizedValue<T> {
  return { isValid: false, normalized: null, original, error };
}

/**
 * Field-level coercion for the ETL pipeline.
 * Every method returns a result object and never throws; callers decide
 * whether a failure drops the record or only nulls the field.
 */
export class DataNormalizer {
  private readonly dateFormats: readonly string[];
  private readonly timestampFormats: readonly string[];
  private readonly currencyMap: Map<string, string>;

  constructor(options: DataNormalizerOptions) {
    this.dateFormats = options.dateFormats;
    this.timestampFormats = options.timestampFormats;
    this.currencyMap = new Map(
      Object.entries(options.currencyMap).map(([symbol, code]) => [symbol.trim().toLowerCase(), code])
    );
  }

  /**
   * Missing, null and whitespace-only values all count as empty
   */
  static isEmpty(value: RawValue | undefined): boolean {
    return value === null || value === undefined || (typeof value === 'string' && value.trim() === '');
  }

  /**
   * Dispatch on the declared field type
   */
  normalizeField(value: RawValue, type: FieldType, casing: Casing = 'preserve'): NormalizedValue<FieldValue> {
    switch (type) {
      case FieldType.STRING:
        return this.normalizeText(value, casing);
      case FieldType.INTEGER:
        return this.normalizeInteger(value);
      case FieldType.DECIMAL:
        return this.normalizeDecimal(value);
      case FieldType.DATE:
        return this.normalizeDate(value);
      case FieldType.TIMESTAMP:
        return this.normalizeTimestamp(value);
      case FieldType.CURRENCY:
        return this.normalizeCurrency(value);
      case FieldType.STRING_LIST:
        return this.normalizeStringList(value, casing);
    }
  }

  /**
   * Trim, collapse inner whitespace and apply the column casing
   */
  normalizeText(value: RawValue, casing: Casing = 'preserve'): NormalizedValue<string> {
    if (DataNormalizer.isEmpty(value)) {
      return invalid('Empty value', value);
    }
    const text = String(value).replace(/\s+/g, ' ').trim();
    return valid(applyCasing(text, casing), value);
  }

  normalizeInteger(value: RawValue): NormalizedValue<number> {
    const decimal = this.normalizeDecimal(value);
    if (!decimal.isValid) {
      return invalid(DataNormalizer.isEmpty(value) ? 'Empty value' : `Not an integer: ${String(value).trim()}`, value);
    }
    if (!Number.isInteger(decimal.normalized)) {
      return invalid(`Not a whole number: ${String(value)}`, value);
    }
    return valid(decimal.normalized, value);
  }

  /**
   * Accepts plain decimals, a decimal comma ("12,50") and grouped
   * thousands in either convention ("1,234.50", "1.234,50")
   */
  normalizeDecimal(value: RawValue): NormalizedValue<number> {
    if (typeof value === 'number') {
      return Number.isFinite(value) ? valid(value, value) : invalid('Not a finite decimal', value);
    }
    if (DataNormalizer.isEmpty(value)) {
      return invalid('Empty value', value);
    }

    const text = String(value).replace(/\s+/g, '');
    let canonical: string | null = null;

    if (/^[+-]?\d+(\.\d+)?$/.test(text)) {
      canonical = text;
    } else if (/^[+-]?\d+,\d+$/.test(text)) {
      canonical = text.replace(',', '.');
    } else if (/^[+-]?\d{1,3}(,\d{3})+(\.\d+)?$/.test(text)) {
      canonical = text.replace(/,/g, '');
    } else if (/^[+-]?\d{1,3}(\.\d{3})+,\d+$/.test(text)) {
      canonical = text.replace(/\./g, '').replace(',', '.');
    }

    if (canonical === null) {
      return invalid(`Not a decimal: ${text}`, value);
    }
    return valid(Number(canonical), value);
  }

  /**
   * Normalize to a calendar date (yyyy-MM-dd)
   */
  normalizeDate(value: RawValue): NormalizedValue<string> {
    if (DataNormalizer.isEmpty(value)) {
      return invalid('Empty value', value);
    }

    const text = String(value).trim();
    const parsed = this.parseWithFormats(text, this.dateFormats) ?? this.parseWithFormats(text, this.timestampFormats);
    if (!parsed) {
      return invalid(`Unrecognized date format: ${text}`, value);
    }

    return valid(format(parsed, 'yyyy-MM-dd'), value);
  }

  /**
   * Normalize to an ISO-8601 UTC timestamp. Patterns without a zone token
   * are read as UTC wall-clock time; numbers are epoch seconds or millis.
   */
  normalizeTimestamp(value: RawValue): NormalizedValue<string> {
    if (typeof value === 'number') {
      const millis = Math.abs(value) < 10000000000 ? value * 1000 : value;
      const date = new Date(millis);
      return isValid(date) ? valid(date.toISOString(), value) : invalid('Invalid epoch timestamp', value);
    }
    if (DataNormalizer.isEmpty(value)) {
      return invalid('Empty value', value);
    }

    const text = String(value).trim();
    const parsed = this.parseWithFormats(text, this.timestampFormats);
    if (!parsed) {
      return invalid(`Unrecognized timestamp format: ${text}`, value);
    }

    return valid(parsed.toISOString(), value);
  }

  /**
   * Map symbols and spellings onto ISO codes. Unknown three-letter codes pass
   * through upper-cased; a code is never reinterpreted as another currency.
   */
  normalizeCurrency(value: RawValue): NormalizedValue<string> {
    if (DataNormalizer.isEmpty(value)) {
      return invalid('Empty value', value);
    }

    const text = String(value).trim();
    const mapped = this.currencyMap.get(text.toLowerCase());
    if (mapped) {
      return valid(mapped, value);
    }
    if (/^[A-Za-z]{3}$/.test(text)) {
      return valid(text.toUpperCase(), value);
    }
    return invalid(`Unknown currency: ${text}`, value);
  }

  /**
   * Accepts a JSON array of strings or a comma/semicolon separated list.
   * Items are trimmed, cased and de-duplicated in first-seen order.
   */
  normalizeStringList(value: RawValue, casing: Casing = 'preserve'): NormalizedValue<string[]> {
    if (DataNormalizer.isEmpty(value)) {
      return invalid('Empty value', value);
    }

    const text = String(value).trim();
    let items: string[];

    if (text.startsWith('[')) {
      let parsed: unknown;
      try {
        parsed = JSON.parse(text);
      } catch {
        return invalid(`Malformed list: ${text}`, value);
      }
      if (!Array.isArray(parsed)) {
        return invalid(`Malformed list: ${text}`, value);
      }
      items = parsed
        .filter(item => item !== null && item !== undefined)
        .map(item => (typeof item === 'string' ? item : JSON.stringify(item)));
    } else {
      items = text.split(/[;,]/);
    }

    const normalized: string[] = [];
    for (const item of items) {
      const cleaned = applyCasing(item.replace(/\s+/g, ' ').trim(), casing);
      if (cleaned && !normalized.includes(cleaned)) {
        normalized.push(cleaned);
      }
    }
    return valid(normalized, value);
  }

  private parseWithFormats(text: string, patterns: readonly string[]): Date | null {
    for (const pattern of patterns) {
      const date = parse(text, pattern, REFERENCE_DATE);
      if (isValid(date)) {
        return date;
      }
    }
    return null;
  }
}

function applyCasing(text: string, casing: Casing): string {
  switch (casing) {
    case 'lower':
      return text.toLowerCase();
    case 'upper':
      return text.toUpperCase();
    default:
      return text;
  }
}

/**
 * Returns a description of the bound a value violates, or null when it is
 * inside its declared range. Dates and timestamps compare on their
 * yyyy-MM-dd prefix.
 */
export function checkRange(
  value: FieldValue,
  bounds: { range?: NumericRange; dateRange?: DateRange }
): string | null {
  if (typeof value === 'number' && bounds.range) {
    const { min, max } = bounds.range;
    if (min !== undefined && value < min) {
      return `${value} is below minimum ${min}`;
    }
    if (max !== undefined && value > max) {
      return `${value} is above maximum ${max}`;
    }
  }

  if (typeof value === 'string' && bounds.dateRange) {
    const day = value.slice(0, 10);
    const { min, max } = bounds.dateRange;
    if (min !== undefined && day < min) {
      return `${day} is before ${min}`;
    }
    if (max !== undefined && day > max) {
      return `${day} is after ${max}`;
    }
  }

  return null;
}

export default DataNormalizer;
