import { z } from 'zod';
import { TableName } from '@fanpulse/types';
import {
  CleanRecord,
  ContractColumn,
  ContractResult,
  ExcludedRecord,
  FieldIssue,
  FieldValue,
  IssueKind,
  SchemaContract
} from '../types';
import { checkRange } from './DataNormalizer';
import { compareIssues } from './issues';
import { componentLogger } from '../utils/logger';

const log = componentLogger('SchemaValidator');

export interface EnforceOptions {
  /** Keys of the table the contract's foreign key references */
  referenceKeys?: ReadonlySet<string>;
}

/**
 * Schema contract enforcement for the ETL pipeline.
 * Each contract is compiled once into a zod object schema; records failing it
 * are excluded with every reason, set-level failures fail the contract.
 */
export class SchemaValidator {
  private readonly schemas = new Map<TableName, z.ZodTypeAny>();

  /**
   * Compile (and cache) the record schema for a contract
   */
  compile(contract: SchemaContract): z.ZodTypeAny {
    const cached = this.schemas.get(contract.table);
    if (cached) {
      return cached;
    }

    const shape: Record<string, z.ZodTypeAny> = {};
    for (const column of contract.columns) {
      shape[column.name] = columnSchema(column);
    }
    const schema = z.object(shape);
    this.schemas.set(contract.table, schema);
    return schema;
  }

  enforce(
    records: readonly CleanRecord[],
    contract: SchemaContract,
    options: EnforceOptions = {}
  ): ContractResult {
    const schema = this.compile(contract);
    const accepted: CleanRecord[] = [];
    const excluded: ExcludedRecord[] = [];
    const issues: FieldIssue[] = [];

    // Step 1: per-record presence, type, nullability and range
    for (const record of records) {
      const reasons: { field: string; message: string }[] = [];

      const result = schema.safeParse(record.fields);
      if (!result.success) {
        for (const issue of result.error.issues) {
          reasons.push({ field: issue.path.join('.') || '*', message: issue.message });
        }
      }

      // Step 2: foreign keys must resolve
      if (contract.foreignKey && options.referenceKeys) {
        const value = record.fields[contract.foreignKey.column];
        if (typeof value !== 'string' || !options.referenceKeys.has(value)) {
          reasons.push({
            field: contract.foreignKey.column,
            message: `does not resolve to ${contract.foreignKey.references}`
          });
        }
      }

      if (reasons.length === 0) {
        accepted.push(record);
        continue;
      }

      excluded.push({
        key: record.key,
        lineage: [...record.lineage],
        reasons: reasons.map(reason => `${reason.field}: ${reason.message}`)
      });
      for (const rowId of record.lineage) {
        for (const reason of reasons) {
          issues.push({
            source_row_id: rowId,
            field: reason.field,
            issue_kind: IssueKind.CONTRACT_VIOLATION,
            detail: `${reason.message}; excluded from ${contract.table}`
          });
        }
      }
    }

    // Step 3: set-level checks
    const setFailures: string[] = [];
    const seen = new Set<string>();
    const duplicated = new Set<string>();
    for (const record of accepted) {
      const key = String(record.fields[contract.primaryKey]);
      if (seen.has(key)) {
        duplicated.add(key);
      }
      seen.add(key);
    }
    if (duplicated.size > 0) {
      setFailures.push(`primary key ${contract.primaryKey} not unique: ${[...duplicated].sort().join(', ')}`);
    }
    if (accepted.length < contract.minRows) {
      setFailures.push(`row count ${accepted.length} below minimum ${contract.minRows}`);
    }

    issues.sort(compareIssues);

    const passed = setFailures.length === 0;
    const logMeta = {
      table: contract.table,
      accepted: accepted.length,
      excluded: excluded.length,
      set_failures: setFailures
    };
    if (passed) {
      log.info('Contract passed', logMeta);
    } else {
      log.error('Contract failed', logMeta);
    }

    return {
      table: contract.table,
      passed,
      accepted,
      excluded,
      set_failures: setFailures,
      issues
    };
  }
}

function columnSchema(column: ContractColumn): z.ZodTypeAny {
  const bounded = <T extends FieldValue>(schema: z.ZodType<T>): z.ZodTypeAny => {
    if (!column.range && !column.dateRange) {
      return schema;
    }
    return schema.superRefine((value, ctx) => {
      const violation = checkRange(value, column);
      if (violation) {
        ctx.addIssue({ code: z.ZodIssueCode.custom, message: violation });
      }
    });
  };

  const schema = baseSchema(column, bounded);
  return column.nullable ? schema.nullable() : schema;
}

function baseSchema(
  column: ContractColumn,
  bounded: <T extends FieldValue>(schema: z.ZodType<T>) => z.ZodTypeAny
): z.ZodTypeAny {
  switch (column.type) {
    case 'string':
      return z.string().min(1);
    case 'integer':
      return bounded(z.number().int());
    case 'decimal':
      return bounded(z.number().finite());
    case 'date':
      return bounded(z.string().regex(/^\d{4}-\d{2}-\d{2}$/, 'expected yyyy-MM-dd'));
    case 'timestamp':
      return bounded(z.string().datetime({ message: 'expected ISO-8601 UTC timestamp' }));
    case 'string_list':
      return z.array(z.string());
  }
}

export default SchemaValidator;
