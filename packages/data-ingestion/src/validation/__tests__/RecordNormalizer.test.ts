/**
 * RecordNormalizer Tests
 * Coercion, key-based deduplication and the orphan policy
 */

import { describe, it, expect } from '@jest/globals';
import { RecordNormalizer } from '../RecordNormalizer';
import { DataNormalizer } from '../DataNormalizer';
import { buildSourceLayouts } from '../../config';
import { RawFields } from '../../types';
import { CUSTOMER_IDS, sourceRecord, testConfig, transactionExample } from '../../__tests__/fixtures';

const config = testConfig();
const layouts = buildSourceLayouts(config);
const recordNormalizer = new RecordNormalizer(new DataNormalizer(config));

function customer(id: number, fields: RawFields) {
  return sourceRecord('customers', id, {
    customer_id: 'C-001',
    name: 'Ana',
    email: 'ana@example.com',
    age: '34',
    gender: 'F',
    city: 'Madrid',
    country: 'Spain',
    favorite_team: 'Real Madrid',
    membership_tier: 'Gold',
    signup_date: '2021-05-10',
    ...fields
  });
}

describe('RecordNormalizer', () => {
  describe('field coercion', () => {
    it('maps every column onto its clean value', () => {
      const result = recordNormalizer.normalize([customer(0, {})], layouts.customers);

      expect(result.records).toEqual([{
        source: 'customers',
        key: 'C-001',
        fields: {
          customer_id: 'C-001',
          name: 'Ana',
          email: 'ana@example.com',
          age: 34,
          gender: 'f',
          city: 'madrid',
          country: 'Spain',
          favorite_team: 'real madrid',
          membership_tier: 'gold',
          signup_date: '2021-05-10'
        },
        lineage: [0]
      }]);
      expect(result.issues).toEqual([]);
    });

    it('turns an empty age into null, logs it and keeps the record', () => {
      const result = recordNormalizer.normalize([customer(0, { age: '' })], layouts.customers);

      expect(result.records).toHaveLength(1);
      expect(result.records[0].fields.age).toBeNull();
      expect(result.issues).toEqual([{
        source_row_id: 0,
        field: 'age',
        issue_kind: 'null',
        detail: 'empty string coerced to null'
      }]);
      expect(result.metrics.nulls_logged).toBe(1);
    });

    it('substitutes the fallback for a missing name', () => {
      const result = recordNormalizer.normalize([customer(3, { name: null })], layouts.customers);

      expect(result.records[0].fields.name).toBe('unknown');
      expect(result.issues).toEqual([{
        source_row_id: 3,
        field: 'name',
        issue_kind: 'null',
        detail: "value missing; defaulted to 'unknown'"
      }]);
    });

    it('nulls values that fail coercion', () => {
      const result = recordNormalizer.normalize([customer(0, { age: 'abc' })], layouts.customers);

      expect(result.records[0].fields.age).toBeNull();
      expect(result.issues).toEqual([{
        source_row_id: 0,
        field: 'age',
        issue_kind: 'coercion_failure',
        detail: 'Not an integer: abc; set to null'
      }]);
      expect(result.metrics.coercion_failures).toBe(1);
    });

    it('excludes records without a key', () => {
      const result = recordNormalizer.normalize(
        [customer(0, { customer_id: '' }), customer(1, { customer_id: 'C-002' })],
        layouts.customers
      );

      expect(result.records.map(record => record.key)).toEqual(['C-002']);
      expect(result.metrics.keys_missing).toBe(1);
      expect(result.issues).toEqual([{
        source_row_id: 0,
        field: 'customer_id',
        issue_kind: 'key_missing',
        detail: 'primary_key empty string coerced to null; record excluded'
      }]);
    });
  });

  describe('deduplication', () => {
    it('merges rows sharing a key with the first occurrence winning', () => {
      const result = recordNormalizer.normalize(
        [
          customer(0, { email: '' }),
          customer(1, { customer_id: 'C-002' }),
          customer(2, { customer_id: 'c-001', city: 'Barcelona', email: 'Ana.B@Example.com' })
        ],
        layouts.customers
      );

      expect(result.records.map(record => record.key)).toEqual(['C-001', 'C-002']);
      expect(result.records[0].lineage).toEqual([0, 2]);
      expect(result.records[0].fields.city).toBe('madrid');
      expect(result.records[0].fields.email).toBe('ana.b@example.com');
      expect(result.metrics.duplicates_collapsed).toBe(1);
      expect(result.metrics.merge_conflicts).toEqual([{
        key: 'C-001',
        field: 'city',
        kept_row_id: 0,
        kept: 'madrid',
        discarded_row_id: 2,
        discarded: 'barcelona'
      }]);
    });
  });

  describe('transactions', () => {
    const result = recordNormalizer.normalize(transactionExample(), layouts.transactions, {
      dimensionKeys: new Set(CUSTOMER_IDS)
    });

    it('keeps at most one row per transaction and drops orphans', () => {
      expect(result.records).toHaveLength(2500);
      expect(result.metrics).toEqual({
        records_in: 2510,
        records_out: 2500,
        duplicates_collapsed: 5,
        keys_missing: 0,
        orphans_dropped: 5,
        coercion_failures: 0,
        nulls_logged: 0,
        merge_conflicts: []
      });
    });

    it('records the lineage of collapsed duplicates', () => {
      expect(result.records[0]).toEqual({
        source: 'transactions',
        key: 'T00001',
        fields: {
          transaction_id: 'T00001',
          customer_id: 'C-001',
          transaction_date: '2025-03-01T10:00:00.000Z',
          amount: 25,
          currency: 'EUR',
          category: 'merchandise',
          merchant: 'Club Store',
          description: 'Scarf'
        },
        lineage: [0, 2500]
      });
    });

    it('logs one orphan_drop per dropped source row', () => {
      expect(result.issues.map(issue => issue.source_row_id)).toEqual([2505, 2506, 2507, 2508, 2509]);
      expect(result.issues[0]).toEqual({
        source_row_id: 2505,
        field: 'customer_id',
        issue_kind: 'orphan_drop',
        detail: 'C-999 has no customers record; excluded'
      });
    });
  });
});
