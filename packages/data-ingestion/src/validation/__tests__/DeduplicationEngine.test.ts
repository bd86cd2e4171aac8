/**
 * DeduplicationEngine Tests
 * Exact duplicate detection and first-occurrence merging
 */

import { describe, it, expect } from '@jest/globals';
import { DeduplicationEngine } from '../DeduplicationEngine';
import { RawFields, SourceRecord } from '../../types';

const engine = new DeduplicationEngine();

function record(id: number, fields: RawFields): SourceRecord {
  return { source_name: 'transactions', source_row_id: id, fields };
}

describe('DeduplicationEngine', () => {
  describe('fingerprint', () => {
    it('ignores field order', () => {
      expect(engine.fingerprint({ a: '1', b: '2' })).toBe(engine.fingerprint({ b: '2', a: '1' }));
    });

    it('distinguishes values and ignored fields', () => {
      expect(engine.fingerprint({ a: '1' })).not.toBe(engine.fingerprint({ a: '2' }));
      expect(engine.fingerprint({ a: '1', seen: 'x' }, ['seen'])).toBe(engine.fingerprint({ a: '1', seen: 'y' }, ['seen']));
    });

    it('tells a number from its text', () => {
      expect(engine.fingerprint({ a: 1 })).not.toBe(engine.fingerprint({ a: '1' }));
    });
  });

  describe('findExactDuplicates', () => {
    it('groups identical rows and maps each repeat to its first occurrence', () => {
      const records = [
        record(0, { id: 'T1', amount: '10' }),
        record(1, { id: 'T2', amount: '20' }),
        record(2, { id: 'T1', amount: '10' }),
        record(3, { id: 'T2', amount: '20' }),
        record(4, { id: 'T1', amount: '10' }),
        record(5, { id: 'T3', amount: '30' })
      ];

      const { groups, firstOccurrence } = engine.findExactDuplicates(records);

      expect(groups).toEqual([[0, 2, 4], [1, 3]]);
      expect([...firstOccurrence.entries()].sort((a, b) => a[0] - b[0])).toEqual([[2, 0], [3, 1], [4, 0]]);
    });

    it('returns nothing for distinct rows', () => {
      const { groups, firstOccurrence } = engine.findExactDuplicates([
        record(0, { id: 'T1' }),
        record(1, { id: 'T2' })
      ]);
      expect(groups).toEqual([]);
      expect(firstOccurrence.size).toBe(0);
    });
  });

  describe('groupByKey', () => {
    it('keeps input order and leaves out keyless items', () => {
      const groups = engine.groupByKey(['a1', 'b1', 'a2', 'x'], item => (item === 'x' ? null : item[0]));
      expect([...groups.entries()]).toEqual([['a', ['a1', 'a2']], ['b', ['b1']]]);
    });
  });

  describe('differingFields', () => {
    it('treats missing and null alike', () => {
      expect(engine.differingFields(
        { id: 'C1', email: null, city: 'Lyon' },
        { id: 'C1', city: 'Paris', seen: '1' },
        ['seen']
      )).toEqual(['city']);
    });
  });

  describe('mergeGroup', () => {
    it('keeps the first occurrence, fills its nulls and records conflicts', () => {
      const merged = engine.mergeGroup('C-001', [
        { source_row_id: 7, fields: { customer_id: 'C-001', city: 'paris', email: 'late@example.com', age: 30 } },
        { source_row_id: 2, fields: { customer_id: 'C-001', city: 'lyon', email: null, age: 30 } }
      ]);

      expect(merged.fields).toEqual({ customer_id: 'C-001', city: 'lyon', email: 'late@example.com', age: 30 });
      expect(merged.lineage).toEqual([2, 7]);
      expect(merged.conflicts).toEqual([{
        key: 'C-001',
        field: 'city',
        kept_row_id: 2,
        kept: 'lyon',
        discarded_row_id: 7,
        discarded: 'paris'
      }]);
    });

    it('compares lists by content', () => {
      const merged = engine.mergeGroup('P1', [
        { source_row_id: 0, fields: { tags: ['a', 'b'] } },
        { source_row_id: 1, fields: { tags: ['a', 'b'] } }
      ]);
      expect(merged.conflicts).toEqual([]);
    });

    it('refuses an empty group', () => {
      expect(() => engine.mergeGroup('none', [])).toThrow('Cannot merge an empty group for key none');
    });
  });
});
