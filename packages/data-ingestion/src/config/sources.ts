import { SOURCES, SourceName, TABLES } from '@fanpulse/types';
import { SourceLayout } from '../types';
import type { PipelineConfig } from './index';

/**
 * Declared column layout of each raw source. The reader requires these
 * columns, the profiler checks them and the normalizer maps them onto
 * clean field names.
 */
export function buildSourceLayouts(config: PipelineConfig): Record<SourceName, SourceLayout> {
  const dateRange = { min: config.dateRange.min, max: config.dateRange.max };

  return {
    customers: {
      source: SOURCES.CUSTOMERS,
      file: config.files.customers,
      table: TABLES.DIM_CUSTOMERS,
      naturalKey: 'customer_id',
      detectNearDuplicates: true,
      recordTimestampFields: [],
      columns: [
        { name: 'customer_id', type: 'string', role: 'primary_key', casing: 'upper' },
        { name: 'name', type: 'string', casing: 'preserve', fallback: 'unknown' },
        { name: 'email', type: 'string', casing: 'lower' },
        { name: 'age', type: 'integer', range: { min: 0, max: 150 } },
        { name: 'gender', type: 'string', casing: 'lower' },
        { name: 'city', type: 'string', casing: 'lower' },
        { name: 'country', type: 'string', casing: 'preserve' },
        { name: 'favorite_team', type: 'string', casing: 'lower' },
        { name: 'membership_tier', type: 'string', casing: 'lower' },
        { name: 'signup_date', type: 'date', dateRange }
      ]
    },
    transactions: {
      source: SOURCES.TRANSACTIONS,
      file: config.files.transactions,
      table: TABLES.FACT_TRANSACTIONS,
      naturalKey: 'transaction_id',
      foreignKey: { column: 'customer_id', references: SOURCES.CUSTOMERS },
      detectNearDuplicates: false,
      recordTimestampFields: [],
      columns: [
        { name: 'transaction_id', type: 'string', role: 'primary_key', casing: 'upper' },
        { name: 'customer_id', type: 'string', role: 'foreign_key', casing: 'upper' },
        { name: 'timestamp', target: 'transaction_date', type: 'timestamp', dateRange },
        { name: 'amount', type: 'decimal', range: { min: config.amountRange.min, max: config.amountRange.max } },
        { name: 'currency', type: 'currency' },
        { name: 'category', type: 'string', casing: 'lower' },
        { name: 'merchant', type: 'string', casing: 'preserve' },
        { name: 'description', type: 'string', casing: 'preserve' }
      ]
    },
    sentiment: {
      source: SOURCES.SENTIMENT,
      file: config.files.sentiment,
      table: TABLES.FACT_SENTIMENT,
      naturalKey: 'id',
      detectNearDuplicates: false,
      recordTimestampFields: [],
      columns: [
        { name: 'id', target: 'post_id', type: 'string', role: 'primary_key', casing: 'preserve' },
        { name: 'user', target: 'user_name', type: 'string', casing: 'lower' },
        { name: 'source', target: 'channel', type: 'string', casing: 'lower' },
        { name: 'text', type: 'string', casing: 'preserve' },
        { name: 'published_at', type: 'timestamp', dateRange },
        { name: 'topic', type: 'string', casing: 'lower' },
        { name: 'tags', type: 'string_list', casing: 'lower' },
        { name: 'sentiment_score', type: 'decimal', range: { min: -1, max: 1 } },
        { name: 'engagement_likes', type: 'integer', range: { min: 0 } },
        { name: 'engagement_shares', type: 'integer', range: { min: 0 } },
        { name: 'engagement_comments', type: 'integer', range: { min: 0 } }
      ]
    }
  };
}
