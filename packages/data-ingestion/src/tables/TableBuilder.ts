import {
  DimCustomer,
  FactSentiment,
  FactTransaction,
  TABLES,
  TableName,
  TableRows
} from '@fanpulse/types';
import { CleanRecord } from '../types';
import { CustomerProfileBuilder } from './CustomerProfileBuilder';
import { ContractSetFailureError, InternalPipelineError } from '../utils/errorUtils';
import { sortBy } from '../utils/sorting';
import { componentLogger } from '../utils/logger';

const log = componentLogger('TableBuilder');

export interface TableBuildInput {
  customers: readonly CleanRecord[];
  transactions: readonly CleanRecord[];
  sentiment: readonly CleanRecord[];
}

/**
 * Maps contract-checked records onto typed table rows and folds the
 * customer profile. The whole set is rebuilt on every call.
 */
export class TableBuilder {
  private readonly profileBuilder: CustomerProfileBuilder;

  constructor(profileBuilder: CustomerProfileBuilder) {
    this.profileBuilder = profileBuilder;
  }

  build(input: TableBuildInput): TableRows {
    const dimCustomers = sortBy(input.customers.map(toDimCustomer), row => row.customer_id);
    const factTransactions = sortBy(input.transactions.map(toFactTransaction), row => row.transaction_id);
    const factSentiment = sortBy(input.sentiment.map(toFactSentiment), row => row.post_id);

    const tables: TableRows = {
      dim_customers: dimCustomers,
      fact_transactions: factTransactions,
      fact_sentiment: factSentiment,
      customer_profile: this.profileBuilder.build(dimCustomers, factTransactions)
    };

    this.verify(tables);

    log.info('Tables built', {
      dim_customers: tables.dim_customers.length,
      fact_transactions: tables.fact_transactions.length,
      fact_sentiment: tables.fact_sentiment.length,
      customer_profile: tables.customer_profile.length
    });

    return tables;
  }

  /**
   * Re-check the cross-table invariants on the finished set
   */
  verify(tables: TableRows): void {
    const failures: { table: TableName; message: string }[] = [];
    const fail = (table: TableName, message: string) => {
      failures.push({ table, message });
    };

    const customerIds = new Set(tables.dim_customers.map(row => row.customer_id));
    if (customerIds.size !== tables.dim_customers.length) {
      fail(TABLES.DIM_CUSTOMERS, 'customer_id is not unique');
    }
    if (new Set(tables.fact_transactions.map(row => row.transaction_id)).size !== tables.fact_transactions.length) {
      fail(TABLES.FACT_TRANSACTIONS, 'transaction_id is not unique');
    }
    if (new Set(tables.fact_sentiment.map(row => row.post_id)).size !== tables.fact_sentiment.length) {
      fail(TABLES.FACT_SENTIMENT, 'post_id is not unique');
    }

    const orphans = tables.fact_transactions.filter(row => !customerIds.has(row.customer_id));
    if (orphans.length > 0) {
      fail(TABLES.FACT_TRANSACTIONS, `${orphans.length} row(s) reference unknown customers`);
    }

    const profiled = new Set(tables.customer_profile.map(row => row.customer_id));
    if (profiled.size !== customerIds.size || [...customerIds].some(id => !profiled.has(id))) {
      fail(TABLES.CUSTOMER_PROFILE, 'profile rows do not cover every customer exactly once');
    }

    const tableNames: TableName[] = [
      TABLES.DIM_CUSTOMERS,
      TABLES.FACT_TRANSACTIONS,
      TABLES.FACT_SENTIMENT,
      TABLES.CUSTOMER_PROFILE
    ];
    for (const table of tableNames) {
      const rows: readonly { _lineage: number[] }[] = tables[table];
      const missing = rows.filter(row => row._lineage.length === 0).length;
      if (missing > 0) {
        fail(table, `${missing} row(s) without lineage`);
      }
    }

    if (failures.length > 0) {
      throw new ContractSetFailureError(
        failures[0].table,
        failures.map(failure => `${failure.table}: ${failure.message}`)
      );
    }
  }
}

function toDimCustomer(record: CleanRecord): DimCustomer {
  return {
    customer_id: requiredText(record, 'customer_id'),
    name: requiredText(record, 'name'),
    email: text(record, 'email'),
    age: numeric(record, 'age'),
    gender: text(record, 'gender'),
    city: text(record, 'city'),
    country: text(record, 'country'),
    favorite_team: text(record, 'favorite_team'),
    membership_tier: text(record, 'membership_tier'),
    signup_date: text(record, 'signup_date'),
    _source: record.source,
    _lineage: [...record.lineage]
  };
}

function toFactTransaction(record: CleanRecord): FactTransaction {
  return {
    transaction_id: requiredText(record, 'transaction_id'),
    customer_id: requiredText(record, 'customer_id'),
    transaction_date: requiredText(record, 'transaction_date'),
    amount: numeric(record, 'amount'),
    currency: requiredText(record, 'currency'),
    category: text(record, 'category'),
    merchant: text(record, 'merchant'),
    description: text(record, 'description'),
    _source: record.source,
    _lineage: [...record.lineage]
  };
}

function toFactSentiment(record: CleanRecord): FactSentiment {
  const likes = numeric(record, 'engagement_likes');
  const shares = numeric(record, 'engagement_shares');
  const comments = numeric(record, 'engagement_comments');
  const parts = [likes, shares, comments].filter((part): part is number => part !== null);

  return {
    post_id: requiredText(record, 'post_id'),
    user_name: text(record, 'user_name'),
    channel: text(record, 'channel'),
    text: text(record, 'text'),
    published_at: text(record, 'published_at'),
    topic: text(record, 'topic'),
    tags: list(record, 'tags'),
    sentiment_score: numeric(record, 'sentiment_score'),
    engagement_likes: likes,
    engagement_shares: shares,
    engagement_comments: comments,
    engagement: parts.length > 0 ? parts.reduce((sum, part) => sum + part, 0) : null,
    _source: record.source,
    _lineage: [...record.lineage]
  };
}

function text(record: CleanRecord, field: string): string | null {
  const value = record.fields[field];
  if (value === null || value === undefined) {
    return null;
  }
  if (typeof value !== 'string') {
    throw new InternalPipelineError(`${record.source} ${record.key}: ${field} is not text`);
  }
  return value;
}

function requiredText(record: CleanRecord, field: string): string {
  const value = text(record, field);
  if (value === null) {
    throw new InternalPipelineError(`${record.source} ${record.key}: ${field} is missing`);
  }
  return value;
}

function numeric(record: CleanRecord, field: string): number | null {
  const value = record.fields[field];
  if (value === null || value === undefined) {
    return null;
  }
  if (typeof value !== 'number') {
    throw new InternalPipelineError(`${record.source} ${record.key}: ${field} is not numeric`);
  }
  return value;
}

function list(record: CleanRecord, field: string): string[] {
  const value = record.fields[field];
  if (value === null || value === undefined) {
    return [];
  }
  if (!Array.isArray(value)) {
    throw new InternalPipelineError(`${record.source} ${record.key}: ${field} is not a list`);
  }
  return [...value];
}

export default TableBuilder;
