// Source and table identifiers
export const SOURCES = {
  CUSTOMERS: 'customers',
  TRANSACTIONS: 'transactions',
  SENTIMENT: 'sentiment',
} as const;

export type SourceName = typeof SOURCES[keyof typeof SOURCES];

export const TABLES = {
  DIM_CUSTOMERS: 'dim_customers',
  FACT_TRANSACTIONS: 'fact_transactions',
  FACT_SENTIMENT: 'fact_sentiment',
  CUSTOMER_PROFILE: 'customer_profile',
} as const;

export type TableName = typeof TABLES[keyof typeof TABLES];

// Every published row points back at the source rows it was built from
export interface LineageColumns {
  _source: SourceName;
  _lineage: number[];
}

export interface DimCustomer extends LineageColumns {
  customer_id: string;
  name: string;
  email: string | null;
  age: number | null;
  gender: string | null;
  city: string | null;
  country: string | null;
  favorite_team: string | null;
  membership_tier: string | null;
  signup_date: string | null;
}

export interface FactTransaction extends LineageColumns {
  transaction_id: string;
  customer_id: string;
  transaction_date: string;
  /** Null when the source amount was missing or unparseable */
  amount: number | null;
  currency: string;
  category: string | null;
  merchant: string | null;
  description: string | null;
}

export interface FactSentiment extends LineageColumns {
  post_id: string;
  user_name: string | null;
  channel: string | null;
  text: string | null;
  published_at: string | null;
  topic: string | null;
  tags: string[];
  sentiment_score: number | null;
  engagement_likes: number | null;
  engagement_shares: number | null;
  engagement_comments: number | null;
  engagement: number | null;
}

// One row per customer, zero-filled when the customer has no transactions
export interface CustomerProfile extends LineageColumns {
  customer_id: string;
  txn_count: number;
  total_spend: number;
  avg_txn: number | null;
  foreign_currency_txn_count: number;
  first_txn_date: string | null;
  last_txn_date: string | null;
  match_ticket_count: number;
  sports_affinity_ratio: number | null;
  avg_days_between_txns: number | null;
  _fact_lineage: number[];
}

export interface TableRowTypes {
  dim_customers: DimCustomer;
  fact_transactions: FactTransaction;
  fact_sentiment: FactSentiment;
  customer_profile: CustomerProfile;
}

export type TableRow<T extends TableName> = TableRowTypes[T];

export type TableRows = { [T in TableName]: TableRowTypes[T][] };

export const TABLE_KEYS = {
  dim_customers: 'customer_id',
  fact_transactions: 'transaction_id',
  fact_sentiment: 'post_id',
  customer_profile: 'customer_id',
} as const satisfies { [T in TableName]: keyof TableRowTypes[T] };
