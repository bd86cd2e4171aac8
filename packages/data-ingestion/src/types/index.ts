import { SourceName, TableName } from '@fanpulse/types';

// Raw source types
export type RawValue = string | number | null;
export type RawFields = Readonly<Record<string, RawValue>>;

export interface SourceRecord {
  readonly source_name: SourceName;
  readonly source_row_id: number;
  readonly fields: RawFields;
}

export const FileFormat = {
  CSV: 'csv' as const,
  JSON: 'json' as const,
  JSONL: 'jsonl' as const,
  UNKNOWN: 'unknown' as const
} as const;

export type FileFormat = typeof FileFormat[keyof typeof FileFormat];

export interface SkippedRow {
  source_row_id: number;
  reason: string;
}

export interface ReaderStats {
  rows_read: number;
  rows_skipped: number;
  skipped: SkippedRow[];
}

export interface SourceReadResult {
  source: SourceName;
  format: FileFormat;
  records: SourceRecord[];
  stats: ReaderStats;
}

// Field typing shared by source layouts and table contracts
export const FieldType = {
  STRING: 'string' as const,
  INTEGER: 'integer' as const,
  DECIMAL: 'decimal' as const,
  DATE: 'date' as const,
  TIMESTAMP: 'timestamp' as const,
  CURRENCY: 'currency' as const,
  STRING_LIST: 'string_list' as const
} as const;

export type FieldType = typeof FieldType[keyof typeof FieldType];

export type Casing = 'lower' | 'upper' | 'preserve';

export type KeyRole = 'primary_key' | 'foreign_key';

export interface NumericRange {
  min?: number;
  max?: number;
}

/** Inclusive bounds as yyyy-MM-dd strings */
export interface DateRange {
  min?: string;
  max?: string;
}

export interface SourceColumn {
  /** Raw field name as it appears in the source */
  name: string;
  /** Clean field name, defaults to `name` */
  target?: string;
  type: FieldType;
  casing?: Casing;
  role?: KeyRole;
  range?: NumericRange;
  dateRange?: DateRange;
  /** Substituted when the value is missing; the substitution is still logged */
  fallback?: string;
}

export interface SourceLayout {
  source: SourceName;
  file: string;
  table: TableName;
  columns: SourceColumn[];
  naturalKey: string;
  foreignKey?: {
    column: string;
    references: SourceName;
  };
  detectNearDuplicates: boolean;
  /** Record-level timestamps ignored when comparing rows for exact duplicates */
  recordTimestampFields: string[];
}

// Issues and reports
export const IssueKind = {
  NULL: 'null' as const,
  EMPTY_STRING: 'empty_string' as const,
  UNPARSEABLE: 'unparseable' as const,
  OUT_OF_RANGE: 'out_of_range' as const,
  EXACT_DUPLICATE: 'exact_duplicate' as const,
  NEAR_DUPLICATE: 'near_duplicate' as const,
  ORPHAN: 'orphan' as const,
  COERCION_FAILURE: 'coercion_failure' as const,
  ORPHAN_DROP: 'orphan_drop' as const,
  MALFORMED_ROW: 'malformed_row' as const,
  KEY_MISSING: 'key_missing' as const,
  CONTRACT_VIOLATION: 'contract_violation' as const
} as const;

export type IssueKind = typeof IssueKind[keyof typeof IssueKind];

export const ErrorCategory = {
  PARSE_FAILURE: 'ParseFailure' as const,
  QUALITY_ISSUE: 'QualityIssue' as const,
  CONTRACT_VIOLATION: 'ContractViolation' as const
} as const;

export type ErrorCategory = typeof ErrorCategory[keyof typeof ErrorCategory];

export type IssueSeverity = 'info' | 'warning' | 'error';

export interface FieldIssue {
  source_row_id: number;
  field: string;
  issue_kind: IssueKind;
  detail: string;
}

/** Issue as written to `issues/<source>.json` */
export interface ClassifiedIssue extends FieldIssue {
  category: ErrorCategory;
  severity: IssueSeverity;
}

export interface ColumnNullStats {
  null_count: number;
  empty_count: number;
  rate: number;
}

export interface ValidationReport {
  source: SourceName;
  generated_at: string;
  rows_loaded: number;
  rows_skipped: number;
  null_rates: Record<string, ColumnNullStats>;
  duplicates: number;
  duplicate_row_ids: number[];
  near_duplicates: number;
  near_duplicate_row_ids: number[];
  orphans: number;
  orphan_keys: string[];
  type_violations: number;
  range_violations: number;
  issues: FieldIssue[];
  recommendations: string[];
}

// Normalized records
export type FieldValue = string | number | string[] | null;
export type CleanFields = Readonly<Record<string, FieldValue>>;

export interface CleanRecord {
  readonly source: SourceName;
  readonly key: string;
  readonly fields: CleanFields;
  /** Sorted source_row_ids of every raw row merged into this record */
  readonly lineage: readonly number[];
}

export type NormalizedValue<T> =
  | { isValid: true; normalized: T; original: RawValue }
  | { isValid: false; normalized: null; original: RawValue; error: string };

export interface MergeConflict {
  key: string;
  field: string;
  kept_row_id: number;
  kept: FieldValue;
  discarded_row_id: number;
  discarded: FieldValue;
}

export interface NormalizationMetrics {
  records_in: number;
  records_out: number;
  duplicates_collapsed: number;
  keys_missing: number;
  orphans_dropped: number;
  coercion_failures: number;
  nulls_logged: number;
  merge_conflicts: MergeConflict[];
}

export interface NormalizedSource {
  source: SourceName;
  records: CleanRecord[];
  issues: FieldIssue[];
  metrics: NormalizationMetrics;
}

// Schema contracts
export type ContractColumnType = Exclude<FieldType, 'currency'>;

export interface ContractColumn {
  name: string;
  type: ContractColumnType;
  nullable: boolean;
  range?: NumericRange;
  dateRange?: DateRange;
}

export interface SchemaContract {
  table: TableName;
  source: SourceName;
  primaryKey: string;
  foreignKey?: {
    column: string;
    references: TableName;
  };
  columns: ContractColumn[];
  minRows: number;
}

export interface ExcludedRecord {
  key: string;
  lineage: number[];
  reasons: string[];
}

export interface ContractResult {
  table: TableName;
  passed: boolean;
  accepted: CleanRecord[];
  excluded: ExcludedRecord[];
  set_failures: string[];
  issues: FieldIssue[];
}

// Orchestration
export const PipelineState = {
  IDLE: 'Idle' as const,
  READING: 'Reading' as const,
  PROFILING: 'Profiling' as const,
  NORMALIZING: 'Normalizing' as const,
  CONTRACT_CHECKING: 'ContractChecking' as const,
  BUILDING: 'Building' as const,
  REPORTING: 'Reporting' as const,
  DONE: 'Done' as const,
  FAILED: 'Failed' as const
} as const;

export type PipelineState = typeof PipelineState[keyof typeof PipelineState];

export type FatalKind = 'SourceUnreadable' | 'ContractSetFailure' | 'InternalError';

export interface StageCounts {
  rows_in: number;
  rows_out: number;
}

export interface StageReport extends StageCounts {
  stage: PipelineState;
  status: 'completed' | 'failed';
  by_source: Record<string, StageCounts>;
  started_at: string;
  finished_at: string;
  duration_ms: number;
}

export interface ContractSummary {
  passed: boolean;
  accepted: number;
  excluded: number;
  set_failures: string[];
}

export interface RunReport {
  run_id: string;
  started_at: string;
  finished_at: string;
  status: 'Done' | 'Failed';
  fatal: {
    kind: FatalKind;
    stage: PipelineState;
    message: string;
  } | null;
  stages: StageReport[];
  sources: Partial<Record<SourceName, ReaderStats>>;
  contracts: Partial<Record<TableName, ContractSummary>>;
  tables: Partial<Record<TableName, number>>;
  snapshot_id: string | null;
}
