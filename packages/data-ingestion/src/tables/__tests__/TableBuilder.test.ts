/**
 * TableBuilder Tests
 * Typed rows, derived columns and cross-table verification
 */

import { describe, it, expect } from '@jest/globals';
import { TableRows } from '@fanpulse/types';
import { TableBuilder } from '../TableBuilder';
import { CustomerProfileBuilder } from '../CustomerProfileBuilder';
import { ContractSetFailureError, InternalPipelineError } from '../../utils/errorUtils';
import { cleanCustomer, cleanPost, cleanTransaction, testConfig } from '../../__tests__/fixtures';

const config = testConfig();
const builder = new TableBuilder(new CustomerProfileBuilder(config));

describe('TableBuilder', () => {
  const tables = builder.build({
    customers: [cleanCustomer('C-002', [1]), cleanCustomer('C-001', [0, 3])],
    transactions: [
      cleanTransaction('T2', 'C-001', [5]),
      cleanTransaction('T1', 'C-001', [4], { currency: 'USD', amount: 12.5 })
    ],
    sentiment: [
      cleanPost('P2', [1], { engagement_shares: null }),
      cleanPost('P1', [0], { engagement_likes: null, engagement_shares: null, engagement_comments: null, tags: null })
    ]
  });

  it('sorts every table by its key', () => {
    expect(tables.dim_customers.map(row => row.customer_id)).toEqual(['C-001', 'C-002']);
    expect(tables.fact_transactions.map(row => row.transaction_id)).toEqual(['T1', 'T2']);
    expect(tables.fact_sentiment.map(row => row.post_id)).toEqual(['P1', 'P2']);
    expect(tables.customer_profile.map(row => row.customer_id)).toEqual(['C-001', 'C-002']);
  });

  it('maps clean fields onto typed rows with lineage', () => {
    expect(tables.dim_customers[0]).toEqual({
      customer_id: 'C-001',
      name: 'Ana',
      email: null,
      age: 34,
      gender: null,
      city: 'madrid',
      country: 'Spain',
      favorite_team: 'real madrid',
      membership_tier: 'gold',
      signup_date: '2021-05-10',
      _source: 'customers',
      _lineage: [0, 3]
    });
    expect(tables.fact_transactions[0]).toEqual({
      transaction_id: 'T1',
      customer_id: 'C-001',
      transaction_date: '2025-03-01T10:00:00.000Z',
      amount: 12.5,
      currency: 'USD',
      category: 'merchandise',
      merchant: 'Club Store',
      description: null,
      _source: 'transactions',
      _lineage: [4]
    });
  });

  it('derives the engagement total from the parts present', () => {
    expect(tables.fact_sentiment[1].engagement).toBe(11);
    expect(tables.fact_sentiment[0].engagement).toBeNull();
    expect(tables.fact_sentiment[0].tags).toEqual([]);
  });

  it('folds profiles over the built facts', () => {
    expect(tables.customer_profile[0].txn_count).toBe(2);
    expect(tables.customer_profile[0].total_spend).toBe(25);
    expect(tables.customer_profile[0].foreign_currency_txn_count).toBe(1);
    expect(tables.customer_profile[0]._fact_lineage).toEqual([4, 5]);
    expect(tables.customer_profile[1].txn_count).toBe(0);
  });

  it('refuses records whose fields do not match the row type', () => {
    expect(() => builder.build({
      customers: [cleanCustomer('C-001', [0], { age: 'old' })],
      transactions: [],
      sentiment: []
    })).toThrow(InternalPipelineError);
  });

  describe('verify', () => {
    function broken(): TableRows {
      return {
        dim_customers: tables.dim_customers.map(row => ({ ...row })),
        fact_transactions: [
          ...tables.fact_transactions,
          { ...tables.fact_transactions[0], transaction_id: 'T9', customer_id: 'C-404', _lineage: [] }
        ],
        fact_sentiment: tables.fact_sentiment,
        customer_profile: tables.customer_profile.slice(0, 1)
      };
    }

    it('accepts the set it built', () => {
      expect(() => builder.verify(tables)).not.toThrow();
    });

    it('reports every broken invariant at once', () => {
      let caught: unknown;
      try {
        builder.verify(broken());
      } catch (error) {
        caught = error;
      }

      expect(caught).toBeInstanceOf(ContractSetFailureError);
      if (!(caught instanceof ContractSetFailureError)) return;
      expect(caught.kind).toBe('ContractSetFailure');
      expect(caught.table).toBe('fact_transactions');
      expect(caught.failures).toEqual([
        'fact_transactions: 1 row(s) reference unknown customers',
        'customer_profile: profile rows do not cover every customer exactly once',
        'fact_transactions: 1 row(s) without lineage'
      ]);
    });
  });
});
