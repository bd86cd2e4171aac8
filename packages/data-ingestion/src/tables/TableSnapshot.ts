import {
  CustomerProfile,
  DimCustomer,
  FactTransaction,
  TABLE_KEYS,
  TableName,
  TableRow,
  TableRows
} from '@fanpulse/types';
import { SnapshotStore } from './SnapshotStore';

type TableIndexes = { [T in TableName]: Map<string, TableRow<T>> };

function indexBy<T>(rows: readonly T[], keyOf: (row: T) => string): Map<string, T> {
  return new Map(rows.map(row => [keyOf(row), row]));
}

/**
 * Read-only, key-addressable view over one published snapshot
 */
export class TableSnapshot {
  readonly snapshotId: string;
  private readonly tables: TableRows;
  private readonly indexes: TableIndexes;
  private readonly transactionsByCustomer: Map<string, FactTransaction[]>;

  constructor(snapshotId: string, tables: TableRows) {
    this.snapshotId = snapshotId;
    this.tables = tables;
    this.indexes = {
      dim_customers: indexBy(tables.dim_customers, row => row[TABLE_KEYS.dim_customers]),
      fact_transactions: indexBy(tables.fact_transactions, row => row[TABLE_KEYS.fact_transactions]),
      fact_sentiment: indexBy(tables.fact_sentiment, row => row[TABLE_KEYS.fact_sentiment]),
      customer_profile: indexBy(tables.customer_profile, row => row[TABLE_KEYS.customer_profile])
    };

    this.transactionsByCustomer = new Map();
    for (const transaction of tables.fact_transactions) {
      const bucket = this.transactionsByCustomer.get(transaction.customer_id);
      if (bucket) {
        bucket.push(transaction);
      } else {
        this.transactionsByCustomer.set(transaction.customer_id, [transaction]);
      }
    }
  }

  /**
   * Load whatever the store currently publishes, or null before the first run
   */
  static async loadCurrent(store: SnapshotStore): Promise<TableSnapshot | null> {
    const loaded = await store.loadCurrent();
    return loaded ? new TableSnapshot(loaded.manifest.snapshot_id, loaded.tables) : null;
  }

  rows<T extends TableName>(table: T): readonly TableRow<T>[] {
    return this.tables[table];
  }

  count(table: TableName): number {
    return this.tables[table].length;
  }

  findByKey<T extends TableName>(table: T, key: string): TableRow<T> | undefined {
    return this.indexes[table].get(key);
  }

  customer(customerId: string): DimCustomer | undefined {
    return this.indexes.dim_customers.get(customerId);
  }

  profileFor(customerId: string): CustomerProfile | undefined {
    return this.indexes.customer_profile.get(customerId);
  }

  transactionsFor(customerId: string): readonly FactTransaction[] {
    return this.transactionsByCustomer.get(customerId) ?? [];
  }
}

export default TableSnapshot;
