import crypto from 'crypto';
import {
  CleanFields,
  FieldValue,
  MergeConflict,
  RawFields,
  RawValue,
  SourceRecord
} from '../types';
import { InternalPipelineError } from '../utils/errorUtils';

export interface DuplicateGroups {
  /** Groups of row ids with identical content, each sorted, only groups of two or more */
  groups: number[][];
  /** Redundant row id -> row id of the first occurrence it duplicates */
  firstOccurrence: Map<number, number>;
}

export interface MergeCandidate {
  source_row_id: number;
  fields: CleanFields;
}

export interface MergedRecord {
  fields: Record<string, FieldValue>;
  lineage: number[];
  conflicts: MergeConflict[];
}

/**
 * Duplicate detection and resolution for the ETL pipeline.
 * Exact duplicates are found by content fingerprint; records sharing a
 * natural key are merged with the first occurrence winning.
 */
export class DeduplicationEngine {
  /**
   * Stable fingerprint of a raw field set, independent of field order
   */
  fingerprint(fields: RawFields, ignore: readonly string[] = []): string {
    const components = Object.keys(fields)
      .filter(name => !ignore.includes(name))
      .sort()
      .map(name => `${name}=${JSON.stringify(fields[name])}`);
    return this.hashComponents(components);
  }

  /**
   * Find records whose field sets are identical
   */
  findExactDuplicates(records: readonly SourceRecord[], ignore: readonly string[] = []): DuplicateGroups {
    const byFingerprint = new Map<string, number[]>();

    for (const record of records) {
      const key = this.fingerprint(record.fields, ignore);
      const ids = byFingerprint.get(key);
      if (ids) {
        ids.push(record.source_row_id);
      } else {
        byFingerprint.set(key, [record.source_row_id]);
      }
    }

    const groups: number[][] = [];
    const firstOccurrence = new Map<number, number>();
    for (const ids of byFingerprint.values()) {
      if (ids.length < 2) continue;
      const sorted = [...ids].sort((a, b) => a - b);
      groups.push(sorted);
      for (const id of sorted.slice(1)) {
        firstOccurrence.set(id, sorted[0]);
      }
    }

    groups.sort((a, b) => a[0] - b[0]);
    return { groups, firstOccurrence };
  }

  /**
   * Group items by key in input order; items without a key are left out
   */
  groupByKey<T>(items: readonly T[], keyOf: (item: T) => string | null): Map<string, T[]> {
    const groups = new Map<string, T[]>();
    for (const item of items) {
      const key = keyOf(item);
      if (key === null) continue;
      const group = groups.get(key);
      if (group) {
        group.push(item);
      } else {
        groups.set(key, [item]);
      }
    }
    return groups;
  }

  /**
   * Names of fields whose raw values differ between two records
   */
  differingFields(left: RawFields, right: RawFields, ignore: readonly string[] = []): string[] {
    const names = new Set([...Object.keys(left), ...Object.keys(right)]);
    return [...names]
      .filter(name => !ignore.includes(name))
      .filter(name => normalizeForCompare(left[name]) !== normalizeForCompare(right[name]));
  }

  /**
   * Merge records sharing a natural key. The lowest source_row_id survives;
   * later rows only fill fields the survivor has as null. Conflicting
   * non-null values are reported, never combined.
   */
  mergeGroup(key: string, candidates: readonly MergeCandidate[]): MergedRecord {
    if (candidates.length === 0) {
      throw new InternalPipelineError(`Cannot merge an empty group for key ${key}`);
    }

    const ordered = [...candidates].sort((a, b) => a.source_row_id - b.source_row_id);
    const fields: Record<string, FieldValue> = { ...ordered[0].fields };
    const keptFrom = new Map<string, number>(
      Object.keys(fields).map(name => [name, ordered[0].source_row_id])
    );
    const conflicts: MergeConflict[] = [];

    for (const candidate of ordered.slice(1)) {
      for (const [name, value] of Object.entries(candidate.fields)) {
        const current = fields[name];
        if (current === null || current === undefined) {
          fields[name] = value;
          keptFrom.set(name, candidate.source_row_id);
          continue;
        }
        if (value !== null && !sameValue(current, value)) {
          conflicts.push({
            key,
            field: name,
            kept_row_id: keptFrom.get(name) ?? ordered[0].source_row_id,
            kept: current,
            discarded_row_id: candidate.source_row_id,
            discarded: value
          });
        }
      }
    }

    return {
      fields,
      lineage: ordered.map(candidate => candidate.source_row_id),
      conflicts
    };
  }

  private hashComponents(components: string[]): string {
    return crypto
      .createHash('sha256')
      .update(components.join('|'))
      .digest('hex');
  }
}

function normalizeForCompare(value: RawValue | undefined): string {
  return value === undefined || value === null ? '' : String(value);
}

function sameValue(left: FieldValue, right: FieldValue): boolean {
  if (Array.isArray(left) || Array.isArray(right)) {
    return JSON.stringify(left) === JSON.stringify(right);
  }
  return left === right;
}

export default DeduplicationEngine;
