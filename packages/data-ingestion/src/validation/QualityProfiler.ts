import {
  ColumnNullStats,
  FieldIssue,
  IssueKind,
  ReaderStats,
  SourceColumn,
  SourceLayout,
  SourceRecord,
  ValidationReport
} from '../types';
import { DataNormalizer, checkRange } from './DataNormalizer';
import { DeduplicationEngine } from './DeduplicationEngine';
import { compareIssues } from './issues';
import { InternalPipelineError } from '../utils/errorUtils';
import { componentLogger } from '../utils/logger';

const log = componentLogger('QualityProfiler');

export interface ProfileOptions {
  /** Canonical keys of the source the foreign key points at */
  referenceKeys?: ReadonlySet<string>;
  readerStats?: ReaderStats;
  generatedAt?: Date;
}

/**
 * Computes a ValidationReport for one source without changing any record
 */
export class QualityProfiler {
  private readonly normalizer: DataNormalizer;
  private readonly deduplication: DeduplicationEngine;
  private readonly nullRateWarning: number;

  constructor(
    normalizer: DataNormalizer,
    nullRateWarning: number,
    deduplication: DeduplicationEngine = new DeduplicationEngine()
  ) {
    this.normalizer = normalizer;
    this.nullRateWarning = nullRateWarning;
    this.deduplication = deduplication;
  }

  /**
   * Canonical natural keys present in a source, used as the reference set
   * for orphan detection in dependent sources
   */
  collectKeys(records: readonly SourceRecord[], layout: SourceLayout): Set<string> {
    const column = findColumn(layout, layout.naturalKey);
    const keys = new Set<string>();
    for (const record of records) {
      const key = this.canonicalKey(record, column);
      if (key !== null) keys.add(key);
    }
    return keys;
  }

  profile(
    records: readonly SourceRecord[],
    layout: SourceLayout,
    options: ProfileOptions = {}
  ): ValidationReport {
    const issues: FieldIssue[] = [];

    // Step 1: rows the reader could not turn into records
    for (const skipped of options.readerStats?.skipped ?? []) {
      issues.push({
        source_row_id: skipped.source_row_id,
        field: '*',
        issue_kind: IssueKind.MALFORMED_ROW,
        detail: skipped.reason
      });
    }

    // Step 2: per-column nulls, types and ranges
    const nullRates: Record<string, ColumnNullStats> = {};
    let typeViolations = 0;
    let rangeViolations = 0;
    const unparseableByColumn = new Map<string, number>();
    const outOfRangeByColumn = new Map<string, number>();

    for (const column of layout.columns) {
      let nullCount = 0;
      let emptyCount = 0;

      for (const record of records) {
        const raw = record.fields[column.name];

        if (raw === null || raw === undefined) {
          nullCount++;
          issues.push(issue(record, column.name, IssueKind.NULL, 'value missing'));
          continue;
        }
        if (typeof raw === 'string' && raw.trim() === '') {
          emptyCount++;
          issues.push(issue(record, column.name, IssueKind.EMPTY_STRING, 'empty string'));
          continue;
        }

        const result = this.normalizer.normalizeField(raw, column.type, column.casing);
        if (!result.isValid) {
          typeViolations++;
          increment(unparseableByColumn, column.name);
          issues.push(issue(record, column.name, IssueKind.UNPARSEABLE, result.error));
          continue;
        }

        const violation = checkRange(result.normalized, column);
        if (violation) {
          rangeViolations++;
          increment(outOfRangeByColumn, column.name);
          issues.push(issue(record, column.name, IssueKind.OUT_OF_RANGE, violation));
        }
      }

      nullRates[column.name] = {
        null_count: nullCount,
        empty_count: emptyCount,
        rate: records.length === 0 ? 0 : round((nullCount + emptyCount) / records.length, 4)
      };
    }

    // Step 3: exact duplicates
    const exact = this.deduplication.findExactDuplicates(records, layout.recordTimestampFields);
    for (const [rowId, firstId] of exact.firstOccurrence) {
      issues.push({
        source_row_id: rowId,
        field: '*',
        issue_kind: IssueKind.EXACT_DUPLICATE,
        detail: `identical to row ${firstId}`
      });
    }

    // Step 4: near duplicates sharing a natural key
    const nearIds = new Set<number>();
    let nearDuplicates = 0;
    if (layout.detectNearDuplicates) {
      const keyColumn = findColumn(layout, layout.naturalKey);
      const groups = this.deduplication.groupByKey(records, record => this.canonicalKey(record, keyColumn));

      for (const [key, group] of groups) {
        if (group.length < 2) continue;
        const [first, ...rest] = group;
        for (const record of rest) {
          const differing = this.deduplication.differingFields(first.fields, record.fields, layout.recordTimestampFields);
          if (differing.length === 0) continue;
          nearDuplicates++;
          nearIds.add(first.source_row_id);
          nearIds.add(record.source_row_id);
          issues.push(issue(
            record,
            layout.naturalKey,
            IssueKind.NEAR_DUPLICATE,
            `shares ${layout.naturalKey} ${key} with row ${first.source_row_id}; differs in ${differing.join(', ')}`
          ));
        }
      }
    }

    // Step 5: orphan foreign keys
    let orphans = 0;
    const orphanKeys = new Set<string>();
    if (layout.foreignKey && options.referenceKeys) {
      const { column: fkName, references } = layout.foreignKey;
      const fkColumn = findColumn(layout, fkName);
      for (const record of records) {
        const key = this.canonicalKey(record, fkColumn);
        if (key !== null && !options.referenceKeys.has(key)) {
          orphans++;
          orphanKeys.add(key);
          issues.push(issue(record, fkName, IssueKind.ORPHAN, `no ${references} record with key ${key}`));
        }
      }
    }

    issues.sort(compareIssues);

    const report: ValidationReport = {
      source: layout.source,
      generated_at: (options.generatedAt ?? new Date()).toISOString(),
      rows_loaded: records.length,
      rows_skipped: options.readerStats?.rows_skipped ?? 0,
      null_rates: nullRates,
      duplicates: exact.firstOccurrence.size,
      duplicate_row_ids: exact.groups.flat().sort((a, b) => a - b),
      near_duplicates: nearDuplicates,
      near_duplicate_row_ids: [...nearIds].sort((a, b) => a - b),
      orphans,
      orphan_keys: [...orphanKeys].sort(),
      type_violations: typeViolations,
      range_violations: rangeViolations,
      issues,
      recommendations: []
    };
    report.recommendations = this.recommend(report, layout, unparseableByColumn, outOfRangeByColumn);

    log.info('Source profiled', {
      source: layout.source,
      rows_loaded: report.rows_loaded,
      duplicates: report.duplicates,
      near_duplicates: report.near_duplicates,
      orphans: report.orphans,
      type_violations: report.type_violations,
      range_violations: report.range_violations
    });

    return report;
  }

  private canonicalKey(record: SourceRecord, column: SourceColumn): string | null {
    const result = this.normalizer.normalizeText(record.fields[column.name] ?? null, column.casing);
    return result.isValid ? result.normalized : null;
  }

  private recommend(
    report: ValidationReport,
    layout: SourceLayout,
    unparseable: Map<string, number>,
    outOfRange: Map<string, number>
  ): string[] {
    const recommendations: string[] = [];

    if (report.rows_skipped > 0) {
      recommendations.push(`${report.rows_skipped} malformed row(s) were skipped while reading; check the file export.`);
    }

    for (const column of layout.columns) {
      const stats = report.null_rates[column.name];
      if (stats.rate > this.nullRateWarning) {
        recommendations.push(
          `Column '${column.name}' is ${(stats.rate * 100).toFixed(1)}% null or empty; treat it as optional downstream.`
        );
      }
      const failed = unparseable.get(column.name);
      if (failed) {
        recommendations.push(`Column '${column.name}' has ${failed} unparseable value(s); they become null.`);
      }
      const outside = outOfRange.get(column.name);
      if (outside) {
        recommendations.push(`Column '${column.name}' has ${outside} value(s) outside the declared range.`);
      }
    }

    if (report.duplicates > 0) {
      recommendations.push(`Remove ${report.duplicates} exact duplicate row(s); the first occurrence is kept.`);
    }
    if (report.near_duplicates > 0) {
      recommendations.push(
        `Resolve ${report.near_duplicates} near-duplicate row(s) by ${layout.naturalKey}; the first occurrence wins and later rows only fill missing fields.`
      );
    }
    if (report.orphans > 0 && layout.foreignKey) {
      recommendations.push(
        `Drop ${report.orphans} row(s) whose ${layout.foreignKey.column} has no match in ${layout.foreignKey.references} (${report.orphan_keys.length} distinct key(s)).`
      );
    }

    if (recommendations.length === 0) {
      recommendations.push('No quality issues detected.');
    }
    return recommendations;
  }
}

function findColumn(layout: SourceLayout, name: string): SourceColumn {
  const column = layout.columns.find(candidate => candidate.name === name);
  if (!column) {
    throw new InternalPipelineError(`Layout for ${layout.source} does not declare column ${name}`);
  }
  return column;
}

function issue(record: SourceRecord, field: string, kind: IssueKind, detail: string): FieldIssue {
  return { source_row_id: record.source_row_id, field, issue_kind: kind, detail };
}

function increment(counts: Map<string, number>, key: string): void {
  counts.set(key, (counts.get(key) ?? 0) + 1);
}

function round(value: number, digits: number): number {
  const factor = 10 ** digits;
  return Math.round(value * factor) / factor;
}

export default QualityProfiler;
