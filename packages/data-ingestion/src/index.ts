// Main exports for the data-ingestion package

// Types
export * from './types';

// Configuration
export {
  DEFAULT_CURRENCY_MAP,
  DEFAULT_DATE_FORMATS,
  DEFAULT_SPORTS_CATEGORIES,
  DEFAULT_TIMESTAMP_FORMATS,
  buildSourceLayouts,
  buildTableContracts,
  loadPipelineConfig,
  pipelineConfigSchema
} from './config';
export type { ContractTable, PipelineConfig, PipelineConfigInput } from './config';

// Source readers
export { FileDetectionService } from './utils/fileDetection';
export { BaseParser } from './parsers/BaseParser';
export { CsvParser } from './parsers/CsvParser';
export type { CsvParserOptions } from './parsers/CsvParser';
export { JsonParser, flattenEntry } from './parsers/JsonParser';
export { MultiFormatParser } from './parsers/MultiFormatParser';

// Profiling, normalization and contracts
export { DataNormalizer, checkRange } from './validation/DataNormalizer';
export { DeduplicationEngine } from './validation/DeduplicationEngine';
export { QualityProfiler } from './validation/QualityProfiler';
export { RecordNormalizer } from './validation/RecordNormalizer';
export { SchemaValidator } from './validation/SchemaValidator';
export { categorizeIssue, classifyIssue, compareIssues, countIssues, getIssueSeverity } from './validation/issues';

// Tables and snapshots
export { CustomerProfileBuilder } from './tables/CustomerProfileBuilder';
export { TableBuilder } from './tables/TableBuilder';
export { FileSnapshotStore, InMemorySnapshotStore } from './tables/SnapshotStore';
export type { LoadedSnapshot, SnapshotContent, SnapshotStore } from './tables/SnapshotStore';
export { TableSnapshot } from './tables/TableSnapshot';
export { manifestSchema, tableSchemas } from './tables/rowSchemas';
export type { SnapshotManifest } from './tables/rowSchemas';

// Orchestration
export { RunTracker } from './workers/RunTracker';
export { PipelineOrchestrator, createRunId, runPipeline } from './workers/PipelineOrchestrator';
export type { PipelineDependencies, PipelineResult } from './workers/PipelineOrchestrator';

// Errors and logging
export {
  ContractSetFailureError,
  InternalPipelineError,
  PipelineError,
  SourceUnreadableError,
  getErrorMessage,
  isPipelineError
} from './utils/errorUtils';
export { componentLogger, setLogLevel } from './utils/logger';
export type { LogLevel } from './utils/logger';
