import { z } from 'zod';
import {
  CustomerProfile,
  DimCustomer,
  FactSentiment,
  FactTransaction,
  TableName,
  TableRows
} from '@fanpulse/types';

const sourceName = z.enum(['customers', 'transactions', 'sentiment']);
const lineage = z.array(z.number().int().nonnegative()).min(1);
const nullableText = z.string().nullable();
const nullableNumber = z.number().nullable();

export const dimCustomerSchema: z.ZodType<DimCustomer> = z.object({
  customer_id: z.string(),
  name: z.string(),
  email: nullableText,
  age: nullableNumber,
  gender: nullableText,
  city: nullableText,
  country: nullableText,
  favorite_team: nullableText,
  membership_tier: nullableText,
  signup_date: nullableText,
  _source: sourceName,
  _lineage: lineage
});

export const factTransactionSchema: z.ZodType<FactTransaction> = z.object({
  transaction_id: z.string(),
  customer_id: z.string(),
  transaction_date: z.string(),
  amount: nullableNumber,
  currency: z.string(),
  category: nullableText,
  merchant: nullableText,
  description: nullableText,
  _source: sourceName,
  _lineage: lineage
});

export const factSentimentSchema: z.ZodType<FactSentiment> = z.object({
  post_id: z.string(),
  user_name: nullableText,
  channel: nullableText,
  text: nullableText,
  published_at: nullableText,
  topic: nullableText,
  tags: z.array(z.string()),
  sentiment_score: nullableNumber,
  engagement_likes: nullableNumber,
  engagement_shares: nullableNumber,
  engagement_comments: nullableNumber,
  engagement: nullableNumber,
  _source: sourceName,
  _lineage: lineage
});

export const customerProfileSchema: z.ZodType<CustomerProfile> = z.object({
  customer_id: z.string(),
  txn_count: z.number().int(),
  total_spend: z.number(),
  avg_txn: nullableNumber,
  foreign_currency_txn_count: z.number().int(),
  first_txn_date: nullableText,
  last_txn_date: nullableText,
  match_ticket_count: z.number().int(),
  sports_affinity_ratio: nullableNumber,
  avg_days_between_txns: nullableNumber,
  _source: sourceName,
  _lineage: lineage,
  _fact_lineage: z.array(z.number().int().nonnegative())
});

/** Schemas used to read published tables back */
export const tableSchemas: { [T in TableName]: z.ZodType<TableRows[T]> } = {
  dim_customers: z.array(dimCustomerSchema),
  fact_transactions: z.array(factTransactionSchema),
  fact_sentiment: z.array(factSentimentSchema),
  customer_profile: z.array(customerProfileSchema)
};

export const manifestSchema = z.object({
  snapshot_id: z.string(),
  run_id: z.string(),
  published_at: z.string(),
  tables: z.record(z.string(), z.object({ file: z.string(), rows: z.number().int().nonnegative() })),
  validation: z.array(z.string())
});

export type SnapshotManifest = z.infer<typeof manifestSchema>;
