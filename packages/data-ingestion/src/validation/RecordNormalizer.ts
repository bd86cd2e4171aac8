import {
  CleanRecord,
  FieldIssue,
  FieldValue,
  IssueKind,
  MergeConflict,
  NormalizedSource,
  SourceLayout,
  SourceRecord
} from '../types';
import { DataNormalizer } from './DataNormalizer';
import { DeduplicationEngine } from './DeduplicationEngine';
import { compareIssues } from './issues';
import { InternalPipelineError } from '../utils/errorUtils';
import { componentLogger } from '../utils/logger';

const log = componentLogger('RecordNormalizer');

export interface NormalizeOptions {
  /** Deduplicated keys of the dimension a fact source references */
  dimensionKeys?: ReadonlySet<string>;
}

interface TypedRecord {
  source_row_id: number;
  key: string;
  fields: Record<string, FieldValue>;
}

/**
 * Turns SourceRecords into CleanRecords: field coercion, key-based
 * deduplication with first-occurrence wins, and the orphan policy for facts
 */
export class RecordNormalizer {
  private readonly normalizer: DataNormalizer;
  private readonly deduplication: DeduplicationEngine;

  constructor(normalizer: DataNormalizer, deduplication: DeduplicationEngine = new DeduplicationEngine()) {
    this.normalizer = normalizer;
    this.deduplication = deduplication;
  }

  normalize(
    records: readonly SourceRecord[],
    layout: SourceLayout,
    options: NormalizeOptions = {}
  ): NormalizedSource {
    const issues: FieldIssue[] = [];
    const counters = { keysMissing: 0, coercionFailures: 0, nullsLogged: 0 };

    // Step 1: coerce every record; records without usable keys are dropped
    const typed: TypedRecord[] = [];
    for (const record of records) {
      const result = this.coerceRecord(record, layout, issues, counters);
      if (result) {
        typed.push(result);
      } else {
        counters.keysMissing++;
      }
    }

    // Step 2: collapse records sharing a natural key
    const keyTarget = targetOf(layout, layout.naturalKey);
    const groups = this.deduplication.groupByKey(typed, item => item.key);
    const conflicts: MergeConflict[] = [];
    let duplicatesCollapsed = 0;
    const merged: CleanRecord[] = [];

    for (const [key, group] of groups) {
      duplicatesCollapsed += group.length - 1;
      const result = this.deduplication.mergeGroup(key, group);
      conflicts.push(...result.conflicts);
      merged.push(Object.freeze({
        source: layout.source,
        key,
        fields: Object.freeze(result.fields),
        lineage: Object.freeze(result.lineage)
      }));
    }

    // Step 3: facts must reference a known dimension key
    let orphansDropped = 0;
    let survivors = merged;
    if (layout.foreignKey && options.dimensionKeys) {
      const dimensionKeys = options.dimensionKeys;
      const { column: fkColumn, references } = layout.foreignKey;
      const fkTarget = targetOf(layout, fkColumn);

      survivors = merged.filter(record => {
        const value = record.fields[fkTarget];
        if (typeof value === 'string' && dimensionKeys.has(value)) {
          return true;
        }
        orphansDropped++;
        for (const rowId of record.lineage) {
          issues.push({
            source_row_id: rowId,
            field: fkColumn,
            issue_kind: IssueKind.ORPHAN_DROP,
            detail: `${String(value)} has no ${references} record; excluded`
          });
        }
        return false;
      });
    }

    // Step 4: the natural key must now be unique
    const seen = new Set<string>();
    for (const record of survivors) {
      if (seen.has(record.key)) {
        throw new InternalPipelineError(`Duplicate ${keyTarget} ${record.key} after deduplication of ${layout.source}`);
      }
      seen.add(record.key);
    }

    issues.sort(compareIssues);

    const metrics = {
      records_in: records.length,
      records_out: survivors.length,
      duplicates_collapsed: duplicatesCollapsed,
      keys_missing: counters.keysMissing,
      orphans_dropped: orphansDropped,
      coercion_failures: counters.coercionFailures,
      nulls_logged: counters.nullsLogged,
      merge_conflicts: conflicts
    };

    log.info('Source normalized', {
      source: layout.source,
      records_in: metrics.records_in,
      records_out: metrics.records_out,
      duplicates_collapsed: metrics.duplicates_collapsed,
      orphans_dropped: metrics.orphans_dropped,
      merge_conflicts: conflicts.length
    });

    return { source: layout.source, records: survivors, issues, metrics };
  }

  private coerceRecord(
    record: SourceRecord,
    layout: SourceLayout,
    issues: FieldIssue[],
    counters: { coercionFailures: number; nullsLogged: number }
  ): TypedRecord | null {
    const fields: Record<string, FieldValue> = {};
    let key: string | null = null;
    let keep = true;

    for (const column of layout.columns) {
      const target = column.target ?? column.name;
      const raw = record.fields[column.name] ?? null;
      let value: FieldValue = null;

      if (DataNormalizer.isEmpty(raw)) {
        const detail = raw === null ? 'value missing' : 'empty string coerced to null';
        if (column.role) {
          issues.push(issueFor(record, column.name, IssueKind.KEY_MISSING, `${column.role} ${detail}; record excluded`));
          keep = false;
        } else if (column.fallback !== undefined) {
          value = column.fallback;
          counters.nullsLogged++;
          issues.push(issueFor(record, column.name, IssueKind.NULL, `${detail}; defaulted to '${column.fallback}'`));
        } else {
          counters.nullsLogged++;
          issues.push(issueFor(record, column.name, IssueKind.NULL, detail));
        }
      } else {
        const result = this.normalizer.normalizeField(raw, column.type, column.casing);
        if (result.isValid) {
          value = result.normalized;
        } else if (column.role) {
          issues.push(issueFor(record, column.name, IssueKind.KEY_MISSING, `${result.error}; record excluded`));
          keep = false;
        } else {
          counters.coercionFailures++;
          value = column.fallback ?? null;
          issues.push(issueFor(record, column.name, IssueKind.COERCION_FAILURE, `${result.error}; set to ${value === null ? 'null' : `'${value}'`}`));
        }
      }

      fields[target] = value;
      if (column.name === layout.naturalKey && typeof value === 'string') {
        key = value;
      }
    }

    if (!keep || key === null) {
      return null;
    }
    return { source_row_id: record.source_row_id, key, fields };
  }
}

function targetOf(layout: SourceLayout, columnName: string): string {
  const column = layout.columns.find(candidate => candidate.name === columnName);
  return column?.target ?? columnName;
}

function issueFor(record: SourceRecord, field: string, kind: IssueKind, detail: string): FieldIssue {
  return { source_row_id: record.source_row_id, field, issue_kind: kind, detail };
}

export default RecordNormalizer;
