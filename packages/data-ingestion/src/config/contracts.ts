import { TABLES, TableName } from '@fanpulse/types';
import { SchemaContract } from '../types';
import type { PipelineConfig } from './index';

/** Tables checked by the contract enforcer; the profile table is derived and self-verified */
export type ContractTable = Exclude<TableName, 'customer_profile'>;

export function buildTableContracts(config: PipelineConfig): Record<ContractTable, SchemaContract> {
  const dateRange = { min: config.dateRange.min, max: config.dateRange.max };

  return {
    dim_customers: {
      table: TABLES.DIM_CUSTOMERS,
      source: 'customers',
      primaryKey: 'customer_id',
      minRows: config.minRows.dim_customers,
      columns: [
        { name: 'customer_id', type: 'string', nullable: false },
        { name: 'name', type: 'string', nullable: false },
        { name: 'email', type: 'string', nullable: true },
        { name: 'age', type: 'integer', nullable: true, range: { min: 0, max: 150 } },
        { name: 'gender', type: 'string', nullable: true },
        { name: 'city', type: 'string', nullable: true },
        { name: 'country', type: 'string', nullable: true },
        { name: 'favorite_team', type: 'string', nullable: true },
        { name: 'membership_tier', type: 'string', nullable: true },
        { name: 'signup_date', type: 'date', nullable: true, dateRange }
      ]
    },
    fact_transactions: {
      table: TABLES.FACT_TRANSACTIONS,
      source: 'transactions',
      primaryKey: 'transaction_id',
      foreignKey: { column: 'customer_id', references: TABLES.DIM_CUSTOMERS },
      minRows: config.minRows.fact_transactions,
      columns: [
        { name: 'transaction_id', type: 'string', nullable: false },
        { name: 'customer_id', type: 'string', nullable: false },
        { name: 'transaction_date', type: 'timestamp', nullable: false, dateRange },
        { name: 'amount', type: 'decimal', nullable: true, range: { min: config.amountRange.min, max: config.amountRange.max } },
        { name: 'currency', type: 'string', nullable: false },
        { name: 'category', type: 'string', nullable: true },
        { name: 'merchant', type: 'string', nullable: true },
        { name: 'description', type: 'string', nullable: true }
      ]
    },
    fact_sentiment: {
      table: TABLES.FACT_SENTIMENT,
      source: 'sentiment',
      primaryKey: 'post_id',
      minRows: config.minRows.fact_sentiment,
      columns: [
        { name: 'post_id', type: 'string', nullable: false },
        { name: 'user_name', type: 'string', nullable: true },
        { name: 'channel', type: 'string', nullable: true },
        { name: 'text', type: 'string', nullable: true },
        { name: 'published_at', type: 'timestamp', nullable: true, dateRange },
        { name: 'topic', type: 'string', nullable: true },
        { name: 'tags', type: 'string_list', nullable: true },
        { name: 'sentiment_score', type: 'decimal', nullable: true, range: { min: -1, max: 1 } },
        { name: 'engagement_likes', type: 'integer', nullable: true, range: { min: 0 } },
        { name: 'engagement_shares', type: 'integer', nullable: true, range: { min: 0 } },
        { name: 'engagement_comments', type: 'integer', nullable: true, range: { min: 0 } }
      ]
    }
  };
}
