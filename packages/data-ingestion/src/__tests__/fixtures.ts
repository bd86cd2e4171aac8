import { SourceName } from '@fanpulse/types';
import { PipelineConfig, PipelineConfigInput, loadPipelineConfig } from '../config';
import { CleanFields, CleanRecord, FieldValue, RawFields, SourceRecord } from '../types';

export const CUSTOMER_IDS = Array.from({ length: 10 }, (_, index) => `C-${String(index + 1).padStart(3, '0')}`);

/**
 * Configuration with defaults only; the process environment is ignored
 */
export function testConfig(overrides: PipelineConfigInput = {}): PipelineConfig {
  return loadPipelineConfig(overrides, {});
}

export function sourceRecord(source: SourceName, id: number, fields: RawFields): SourceRecord {
  return { source_name: source, source_row_id: id, fields };
}

export function transactionFields(index: number, customerId: string = CUSTOMER_IDS[index % CUSTOMER_IDS.length]): RawFields {
  return {
    transaction_id: `T${String(index + 1).padStart(5, '0')}`,
    customer_id: customerId,
    timestamp: '2025-03-01 10:00:00',
    amount: '25.00',
    currency: 'EUR',
    category: 'merchandise',
    merchant: 'Club Store',
    description: 'Scarf'
  };
}

/**
 * 2,510 transaction rows: 2,500 distinct transactions over CUSTOMER_IDS,
 * then exact copies of rows 0-4 (ids 2500-2504), then five rows for the
 * unknown customer C-999 (ids 2505-2509)
 */
export function transactionExample(): SourceRecord[] {
  const records: SourceRecord[] = [];
  for (let index = 0; index < 2500; index++) {
    records.push(sourceRecord('transactions', index, transactionFields(index)));
  }
  for (let index = 0; index < 5; index++) {
    records.push(sourceRecord('transactions', 2500 + index, transactionFields(index)));
  }
  for (let index = 0; index < 5; index++) {
    records.push(sourceRecord('transactions', 2505 + index, transactionFields(9000 + index, 'C-999')));
  }
  return records;
}

export function cleanRecord(source: SourceName, key: string, lineage: number[], fields: CleanFields): CleanRecord {
  return { source, key, lineage, fields };
}

export function cleanCustomer(customerId: string, lineage: number[], fields: Record<string, FieldValue> = {}): CleanRecord {
  return cleanRecord('customers', customerId, lineage, {
    customer_id: customerId,
    name: 'Ana',
    email: null,
    age: 34,
    gender: null,
    city: 'madrid',
    country: 'Spain',
    favorite_team: 'real madrid',
    membership_tier: 'gold',
    signup_date: '2021-05-10',
    ...fields
  });
}

export function cleanTransaction(
  transactionId: string,
  customerId: string,
  lineage: number[],
  fields: Record<string, FieldValue> = {}
): CleanRecord {
  return cleanRecord('transactions', transactionId, lineage, {
    transaction_id: transactionId,
    customer_id: customerId,
    transaction_date: '2025-03-01T10:00:00.000Z',
    amount: 25,
    currency: 'EUR',
    category: 'merchandise',
    merchant: 'Club Store',
    description: null,
    ...fields
  });
}

export function cleanPost(postId: string, lineage: number[], fields: Record<string, FieldValue> = {}): CleanRecord {
  return cleanRecord('sentiment', postId, lineage, {
    post_id: postId,
    user_name: 'fan_1',
    channel: 'twitter',
    text: 'Great match',
    published_at: '2025-08-01T14:30:00.000Z',
    topic: 'match',
    tags: ['derby'],
    sentiment_score: 0.8,
    engagement_likes: 10,
    engagement_shares: 2,
    engagement_comments: 1,
    ...fields
  });
}
