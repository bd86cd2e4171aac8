/**
 * SchemaValidator Tests
 * Per-record contract checks and set-level failures
 */

import { describe, it, expect } from '@jest/globals';
import { SchemaValidator } from '../SchemaValidator';
import { buildTableContracts } from '../../config';
import { CleanRecord, FieldValue } from '../../types';
import { testConfig } from '../../__tests__/fixtures';

const contracts = buildTableContracts(testConfig({
  minRows: { dim_customers: 2, fact_transactions: 1 }
}));

function customer(key: string, lineage: number[], fields: Record<string, FieldValue> = {}): CleanRecord {
  return {
    source: 'customers',
    key,
    lineage,
    fields: {
      customer_id: key,
      name: 'Ana',
      email: null,
      age: 34,
      gender: null,
      city: 'madrid',
      country: 'Spain',
      favorite_team: null,
      membership_tier: 'gold',
      signup_date: '2021-05-10',
      ...fields
    }
  };
}

function transaction(key: string, customerId: string, lineage: number[]): CleanRecord {
  return {
    source: 'transactions',
    key,
    lineage,
    fields: {
      transaction_id: key,
      customer_id: customerId,
      transaction_date: '2025-03-01T10:00:00.000Z',
      amount: 25,
      currency: 'EUR',
      category: null,
      merchant: null,
      description: null
    }
  };
}

describe('SchemaValidator', () => {
  const validator = new SchemaValidator();

  it('caches one compiled schema per table', () => {
    expect(validator.compile(contracts.dim_customers)).toBe(validator.compile(contracts.dim_customers));
  });

  it('accepts conforming records', () => {
    const result = validator.enforce([customer('C-001', [0]), customer('C-002', [1])], contracts.dim_customers);

    expect(result.passed).toBe(true);
    expect(result.accepted.map(record => record.key)).toEqual(['C-001', 'C-002']);
    expect(result.excluded).toEqual([]);
    expect(result.set_failures).toEqual([]);
  });

  it('excludes a record with every reason and logs one issue per source row', () => {
    const result = validator.enforce(
      [
        customer('C-001', [0]),
        customer('C-002', [1]),
        customer('C-003', [2, 5], { age: 200, name: null })
      ],
      contracts.dim_customers
    );

    expect(result.passed).toBe(true);
    expect(result.excluded).toEqual([{
      key: 'C-003',
      lineage: [2, 5],
      reasons: ['name: Expected string, received null', 'age: 200 is above maximum 150']
    }]);
    expect(result.issues).toEqual([
      {
        source_row_id: 2,
        field: 'age',
        issue_kind: 'contract_violation',
        detail: '200 is above maximum 150; excluded from dim_customers'
      },
      {
        source_row_id: 2,
        field: 'name',
        issue_kind: 'contract_violation',
        detail: 'Expected string, received null; excluded from dim_customers'
      },
      {
        source_row_id: 5,
        field: 'age',
        issue_kind: 'contract_violation',
        detail: '200 is above maximum 150; excluded from dim_customers'
      },
      {
        source_row_id: 5,
        field: 'name',
        issue_kind: 'contract_violation',
        detail: 'Expected string, received null; excluded from dim_customers'
      }
    ]);
  });

  it('rejects dates outside the configured window', () => {
    const result = validator.enforce(
      [customer('C-001', [0]), customer('C-002', [1], { signup_date: '2019-06-01' })],
      contracts.dim_customers
    );

    expect(result.excluded[0].reasons).toEqual(['signup_date: 2019-06-01 is before 2020-01-01']);
  });

  it('fails the set when too few rows survive', () => {
    const result = validator.enforce(
      [customer('C-001', [0]), customer('C-002', [1], { age: -4 })],
      contracts.dim_customers
    );

    expect(result.passed).toBe(false);
    expect(result.set_failures).toEqual(['row count 1 below minimum 2']);
  });

  it('fails the set on a repeated primary key', () => {
    const result = validator.enforce(
      [customer('C-001', [0]), customer('C-001', [1])],
      contracts.dim_customers
    );

    expect(result.passed).toBe(false);
    expect(result.set_failures).toEqual(['primary key customer_id not unique: C-001']);
  });

  it('excludes facts whose foreign key does not resolve', () => {
    const result = validator.enforce(
      [transaction('T1', 'C-001', [0]), transaction('T2', 'C-404', [1])],
      contracts.fact_transactions,
      { referenceKeys: new Set(['C-001']) }
    );

    expect(result.passed).toBe(true);
    expect(result.accepted.map(record => record.key)).toEqual(['T1']);
    expect(result.excluded).toEqual([{
      key: 'T2',
      lineage: [1],
      reasons: ['customer_id: does not resolve to dim_customers']
    }]);
  });

  it('keeps transactions whose amount could not be read', () => {
    const withoutAmount: CleanRecord = {
      ...transaction('T3', 'C-001', [3]),
      fields: { ...transaction('T3', 'C-001', [3]).fields, amount: null }
    };
    const result = validator.enforce([transaction('T1', 'C-001', [0]), withoutAmount], contracts.fact_transactions);

    expect(result.accepted.map(record => record.key)).toEqual(['T1', 'T3']);
    expect(result.excluded).toEqual([]);
  });

  it('still rejects amounts outside the configured range', () => {
    const tooLarge: CleanRecord = {
      ...transaction('T4', 'C-001', [4]),
      fields: { ...transaction('T4', 'C-001', [4]).fields, amount: 60000 }
    };
    const result = validator.enforce([transaction('T1', 'C-001', [0]), tooLarge], contracts.fact_transactions);

    expect(result.excluded.map(excluded => excluded.key)).toEqual(['T4']);
  });
});
