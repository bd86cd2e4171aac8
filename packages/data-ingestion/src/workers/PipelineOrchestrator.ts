import path from 'path';
import { EventEmitter } from 'events';
import { format } from 'date-fns';
import { v4 as uuidv4 } from 'uuid';
import { SOURCES, SourceName, TableRows } from '@fanpulse/types';
import {
  ContractResult,
  FieldIssue,
  NormalizedSource,
  PipelineState,
  RunReport,
  SourceLayout,
  SourceReadResult,
  StageCounts,
  StageReport,
  ValidationReport
} from '../types';
import {
  PipelineConfig,
  PipelineConfigInput,
  buildSourceLayouts,
  buildTableContracts,
  loadPipelineConfig
} from '../config';
import { MultiFormatParser } from '../parsers/MultiFormatParser';
import { DataNormalizer } from '../validation/DataNormalizer';
import { DeduplicationEngine } from '../validation/DeduplicationEngine';
import { QualityProfiler } from '../validation/QualityProfiler';
import { RecordNormalizer } from '../validation/RecordNormalizer';
import { SchemaValidator } from '../validation/SchemaValidator';
import { compareIssues } from '../validation/issues';
import { CustomerProfileBuilder } from '../tables/CustomerProfileBuilder';
import { TableBuilder } from '../tables/TableBuilder';
import { FileSnapshotStore, SnapshotStore } from '../tables/SnapshotStore';
import { TableSnapshot } from '../tables/TableSnapshot';
import { RunTracker } from './RunTracker';
import { ContractSetFailureError, createError, getErrorMessage, toPipelineError } from '../utils/errorUtils';
import { componentLogger, setLogLevel } from '../utils/logger';

const log = componentLogger('PipelineOrchestrator');

const SOURCE_ORDER: SourceName[] = [SOURCES.CUSTOMERS, SOURCES.TRANSACTIONS, SOURCES.SENTIMENT];

const TRANSITIONS: Record<PipelineState, readonly PipelineState[]> = {
  Idle: [PipelineState.READING, PipelineState.FAILED],
  Reading: [PipelineState.PROFILING, PipelineState.FAILED],
  Profiling: [PipelineState.NORMALIZING, PipelineState.FAILED],
  Normalizing: [PipelineState.CONTRACT_CHECKING, PipelineState.FAILED],
  ContractChecking: [PipelineState.BUILDING, PipelineState.FAILED],
  Building: [PipelineState.REPORTING, PipelineState.FAILED],
  Reporting: [PipelineState.DONE, PipelineState.FAILED],
  Done: [],
  Failed: []
};

type PerSource<T> = Record<SourceName, T>;

export interface PipelineDependencies {
  store?: SnapshotStore;
  parser?: MultiFormatParser;
  clock?: () => Date;
  createRunId?: (startedAt: Date) => string;
}

export interface PipelineResult {
  report: RunReport;
  /** The snapshot this run published; null when the run failed */
  snapshot: TableSnapshot | null;
  validation: Partial<Record<SourceName, ValidationReport>>;
}

export function createRunId(startedAt: Date): string {
  return `run-${format(startedAt, 'yyyyMMdd-HHmmss')}-${uuidv4().slice(0, 8)}`;
}

function mapSources<T>(build: (source: SourceName) => T): PerSource<T> {
  return {
    customers: build(SOURCES.CUSTOMERS),
    transactions: build(SOURCES.TRANSACTIONS),
    sentiment: build(SOURCES.SENTIMENT)
  };
}

/**
 * Drives one run through
 * Idle -> Reading -> Profiling -> Normalizing -> ContractChecking -> Building -> Reporting -> Done.
 * Any fatal error moves the run to Failed; the previously published snapshot
 * stays current because publishing is the last step before Done.
 *
 * Events: `stateChanged` ({ from, to }), `readProgress` ({ source, rows_read }),
 * `stageCompleted` (StageReport), `completed` (RunReport).
 */
export class PipelineOrchestrator extends EventEmitter {
  private readonly config: PipelineConfig;
  private readonly layouts: PerSource<SourceLayout>;
  private readonly contracts: ReturnType<typeof buildTableContracts>;
  private readonly parser: MultiFormatParser;
  private readonly profiler: QualityProfiler;
  private readonly recordNormalizer: RecordNormalizer;
  private readonly validator: SchemaValidator;
  private readonly tableBuilder: TableBuilder;
  private readonly store: SnapshotStore;
  private readonly clock: () => Date;
  private readonly runIdFactory: (startedAt: Date) => string;
  private state: PipelineState = PipelineState.IDLE;

  constructor(config: PipelineConfig, dependencies: PipelineDependencies = {}) {
    super();
    this.config = config;
    setLogLevel(config.logLevel);

    this.layouts = buildSourceLayouts(config);
    this.contracts = buildTableContracts(config);

    const normalizer = new DataNormalizer({
      dateFormats: config.dateFormats,
      timestampFormats: config.timestampFormats,
      currencyMap: config.currencyMap
    });
    const deduplication = new DeduplicationEngine();

    this.parser = dependencies.parser ?? new MultiFormatParser();
    this.profiler = new QualityProfiler(normalizer, config.nullRateWarning, deduplication);
    this.recordNormalizer = new RecordNormalizer(normalizer, deduplication);
    this.validator = new SchemaValidator();
    this.tableBuilder = new TableBuilder(new CustomerProfileBuilder({
      baseCurrency: config.baseCurrency,
      sportsCategories: config.sportsCategories,
      matchTicketCategory: config.matchTicketCategory
    }));
    this.store = dependencies.store ?? new FileSnapshotStore(config.outputDir, config.snapshotRetention);
    this.clock = dependencies.clock ?? (() => new Date());
    this.runIdFactory = dependencies.createRunId ?? createRunId;
  }

  get currentState(): PipelineState {
    return this.state;
  }

  /**
   * Execute the run. Fatal errors do not reject: they end the run in Failed
   * and are described by `report.fatal`.
   */
  async run(): Promise<PipelineResult> {
    if (this.state !== PipelineState.IDLE) {
      throw createError(`Pipeline already ran (state ${this.state}); create a new orchestrator per run`);
    }

    const startedAt = this.clock();
    const runId = this.runIdFactory(startedAt);
    const tracker = new RunTracker(runId, this.clock);
    tracker.on('stageCompleted', (stage: StageReport) => this.emit('stageCompleted', stage));

    let validation: Partial<Record<SourceName, ValidationReport>> = {};
    let published: TableSnapshot | null = null;
    let fatal: RunReport['fatal'] = null;

    log.info('Pipeline run started', { run_id: runId, data_dir: this.config.dataDir });

    try {
      // Step 1: read every source
      const reads = await this.runStage(tracker, PipelineState.READING, async () => {
        const [customers, transactions, sentiment] = await Promise.all([
          this.readSource(SOURCES.CUSTOMERS),
          this.readSource(SOURCES.TRANSACTIONS),
          this.readSource(SOURCES.SENTIMENT)
        ]);
        const bySource: PerSource<SourceReadResult> = { customers, transactions, sentiment };
        for (const source of SOURCE_ORDER) {
          tracker.recordSource(source, bySource[source].stats);
        }
        return {
          value: bySource,
          counts: mapSources(source => ({
            rows_in: bySource[source].stats.rows_read + bySource[source].stats.rows_skipped,
            rows_out: bySource[source].records.length
          }))
        };
      });

      // Step 2: profile the raw records; nothing is changed here
      validation = await this.runStage(tracker, PipelineState.PROFILING, async () => {
        const reports = this.profileSources(reads, startedAt);
        return {
          value: reports,
          counts: mapSources(source => ({
            rows_in: reads[source].records.length,
            rows_out: reads[source].records.length
          }))
        };
      });

      // Step 3: coerce, deduplicate and drop orphans; dimensions go first
      const normalized = await this.runStage(tracker, PipelineState.NORMALIZING, async () => {
        const customers = this.recordNormalizer.normalize(reads.customers.records, this.layouts.customers);
        const dimensionKeys = new Set(customers.records.map(record => record.key));
        const sources: PerSource<NormalizedSource> = {
          customers,
          transactions: this.recordNormalizer.normalize(
            reads.transactions.records,
            this.layouts.transactions,
            { dimensionKeys }
          ),
          sentiment: this.recordNormalizer.normalize(reads.sentiment.records, this.layouts.sentiment)
        };
        return {
          value: sources,
          counts: mapSources(source => ({
            rows_in: reads[source].records.length,
            rows_out: sources[source].records.length
          }))
        };
      });

      // Step 4: enforce the table contracts
      const contracts = await this.runStage(tracker, PipelineState.CONTRACT_CHECKING, async () => {
        const results = this.enforceContracts(normalized);
        for (const source of SOURCE_ORDER) {
          tracker.recordContract(results[source]);
        }
        const failed = SOURCE_ORDER.map(source => results[source]).find(result => !result.passed);
        if (failed) {
          throw new ContractSetFailureError(failed.table, failed.set_failures);
        }
        return {
          value: results,
          counts: mapSources(source => ({
            rows_in: normalized[source].records.length,
            rows_out: results[source].accepted.length
          }))
        };
      });

      // Step 5: build the tables in memory
      const tables = await this.runStage(tracker, PipelineState.BUILDING, async () => {
        const built = this.tableBuilder.build({
          customers: contracts.customers.accepted,
          transactions: contracts.transactions.accepted,
          sentiment: contracts.sentiment.accepted
        });
        tracker.recordTables(built);
        return {
          value: built,
          counts: {
            dim_customers: { rows_in: contracts.customers.accepted.length, rows_out: built.dim_customers.length },
            fact_transactions: { rows_in: contracts.transactions.accepted.length, rows_out: built.fact_transactions.length },
            fact_sentiment: { rows_in: contracts.sentiment.accepted.length, rows_out: built.fact_sentiment.length },
            customer_profile: { rows_in: built.dim_customers.length, rows_out: built.customer_profile.length }
          }
        };
      });

      // Step 6: publish tables and quality reports together
      published = await this.runStage(tracker, PipelineState.REPORTING, async () => {
        await this.store.publish({
          snapshot_id: runId,
          run_id: runId,
          published_at: this.clock().toISOString(),
          tables,
          validation,
          issues: mapSources(source => collectStageIssues(normalized[source], contracts[source]))
        });
        return {
          value: new TableSnapshot(runId, tables),
          counts: tableCounts(tables)
        };
      });

      this.transition(PipelineState.DONE);
    } catch (error) {
      const failure = toPipelineError(error);
      const stage = this.state;
      fatal = { kind: failure.kind, stage, message: failure.message };
      published = null;

      log.error('Pipeline run failed', { run_id: runId, stage, kind: failure.kind, error: failure.message });
      this.transition(PipelineState.FAILED);
    }

    const report = tracker.buildReport(
      fatal ? 'Failed' : 'Done',
      fatal,
      published ? published.snapshotId : null
    );
    try {
      await this.store.writeRunReport(report);
    } catch (error) {
      // The report is still returned to the caller
      log.error('Run report could not be written', {
        run_id: runId,
        status: report.status,
        error: getErrorMessage(error)
      });
    }

    log.info('Pipeline run finished', { run_id: runId, status: report.status, snapshot_id: report.snapshot_id });
    this.emit('completed', report);

    return { report, snapshot: published, validation };
  }

  private async readSource(source: SourceName): Promise<SourceReadResult> {
    const layout = this.layouts[source];
    return this.parser.readAll(
      path.join(this.config.dataDir, layout.file),
      layout,
      rowsRead => this.emit('readProgress', { source, rows_read: rowsRead })
    );
  }

  private profileSources(
    reads: PerSource<SourceReadResult>,
    generatedAt: Date
  ): PerSource<ValidationReport> {
    return mapSources(source => {
      const layout = this.layouts[source];
      const references = layout.foreignKey?.references;
      const referenceKeys = references
        ? this.profiler.collectKeys(reads[references].records, this.layouts[references])
        : undefined;

      return this.profiler.profile(reads[source].records, layout, {
        referenceKeys,
        readerStats: reads[source].stats,
        generatedAt
      });
    });
  }

  private enforceContracts(normalized: PerSource<NormalizedSource>): PerSource<ContractResult> {
    const customers = this.validator.enforce(normalized.customers.records, this.contracts.dim_customers);
    const acceptedCustomers = new Set(customers.accepted.map(record => record.key));

    return {
      customers,
      transactions: this.validator.enforce(
        normalized.transactions.records,
        this.contracts.fact_transactions,
        { referenceKeys: acceptedCustomers }
      ),
      sentiment: this.validator.enforce(normalized.sentiment.records, this.contracts.fact_sentiment)
    };
  }

  /**
   * Wraps a stage: state transition, timing and per-source counts. A stage
   * that throws is closed as failed and the error propagates.
   */
  private async runStage<T>(
    tracker: RunTracker,
    stage: PipelineState,
    body: () => Promise<{ value: T; counts: Record<string, StageCounts> }>
  ): Promise<T> {
    this.transition(stage);
    tracker.startStage(stage);
    try {
      const { value, counts } = await body();
      tracker.completeStage(stage, counts);
      return value;
    } catch (error) {
      tracker.failStage(stage);
      throw error;
    }
  }

  private transition(next: PipelineState): void {
    const from = this.state;
    if (!TRANSITIONS[from].includes(next)) {
      throw createError(`Illegal pipeline transition ${from} -> ${next}`);
    }
    this.state = next;
    log.debug('State changed', { from, to: next });
    this.emit('stateChanged', { from, to: next });
  }
}

function collectStageIssues(normalized: NormalizedSource, contract: ContractResult): FieldIssue[] {
  return [...normalized.issues, ...contract.issues].sort(compareIssues);
}

function tableCounts(tables: TableRows): Record<string, StageCounts> {
  return {
    dim_customers: { rows_in: tables.dim_customers.length, rows_out: tables.dim_customers.length },
    fact_transactions: { rows_in: tables.fact_transactions.length, rows_out: tables.fact_transactions.length },
    fact_sentiment: { rows_in: tables.fact_sentiment.length, rows_out: tables.fact_sentiment.length },
    customer_profile: { rows_in: tables.customer_profile.length, rows_out: tables.customer_profile.length }
  };
}

/**
 * Load configuration (overrides, then environment, then defaults) and run once
 */
export async function runPipeline(
  overrides: PipelineConfigInput = {},
  dependencies: PipelineDependencies = {}
): Promise<PipelineResult> {
  const orchestrator = new PipelineOrchestrator(loadPipelineConfig(overrides), dependencies);
  return orchestrator.run();
}

export default PipelineOrchestrator;
