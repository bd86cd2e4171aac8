import { EventEmitter } from 'events';
import { SourceName, TableName, TableRows } from '@fanpulse/types';
import {
  ContractResult,
  PipelineState,
  ReaderStats,
  RunReport,
  StageCounts,
  StageReport
} from '../types';

/**
 * Stage bookkeeping for one run; produces the RunReport.
 *
 * Events: `stageStarted` (stage), `stageCompleted` (StageReport).
 */
export class RunTracker extends EventEmitter {
  readonly runId: string;
  private readonly clock: () => Date;
  private readonly startedAt: Date;
  private readonly stages: StageReport[] = [];
  private readonly openStages = new Map<PipelineState, Date>();
  private sources: Partial<Record<SourceName, ReaderStats>> = {};
  private contracts: RunReport['contracts'] = {};
  private tables: Partial<Record<TableName, number>> = {};

  constructor(runId: string, clock: () => Date = () => new Date()) {
    super();
    this.runId = runId;
    this.clock = clock;
    this.startedAt = clock();
  }

  startStage(stage: PipelineState): void {
    this.openStages.set(stage, this.clock());
    this.emit('stageStarted', stage);
  }

  completeStage(stage: PipelineState, bySource: Record<string, StageCounts> = {}): StageReport {
    return this.closeStage(stage, 'completed', bySource);
  }

  failStage(stage: PipelineState, bySource: Record<string, StageCounts> = {}): StageReport {
    return this.closeStage(stage, 'failed', bySource);
  }

  recordSource(source: SourceName, stats: ReaderStats): void {
    this.sources[source] = stats;
  }

  recordContract(result: ContractResult): void {
    this.contracts[result.table] = {
      passed: result.passed,
      accepted: result.accepted.length,
      excluded: result.excluded.length,
      set_failures: [...result.set_failures]
    };
  }

  recordTables(tables: TableRows): void {
    this.tables = {
      dim_customers: tables.dim_customers.length,
      fact_transactions: tables.fact_transactions.length,
      fact_sentiment: tables.fact_sentiment.length,
      customer_profile: tables.customer_profile.length
    };
  }

  isOpen(stage: PipelineState): boolean {
    return this.openStages.has(stage);
  }

  buildReport(
    status: RunReport['status'],
    fatal: RunReport['fatal'],
    snapshotId: string | null
  ): RunReport {
    return {
      run_id: this.runId,
      started_at: this.startedAt.toISOString(),
      finished_at: this.clock().toISOString(),
      status,
      fatal,
      stages: this.stages.map(stage => ({ ...stage, by_source: { ...stage.by_source } })),
      sources: { ...this.sources },
      contracts: { ...this.contracts },
      tables: { ...this.tables },
      snapshot_id: snapshotId
    };
  }

  private closeStage(
    stage: PipelineState,
    status: StageReport['status'],
    bySource: Record<string, StageCounts>
  ): StageReport {
    const finishedAt = this.clock();
    const startedAt = this.openStages.get(stage) ?? finishedAt;
    this.openStages.delete(stage);

    const counts = Object.values(bySource);
    const report: StageReport = {
      stage,
      status,
      rows_in: counts.reduce((sum, entry) => sum + entry.rows_in, 0),
      rows_out: counts.reduce((sum, entry) => sum + entry.rows_out, 0),
      by_source: bySource,
      started_at: startedAt.toISOString(),
      finished_at: finishedAt.toISOString(),
      duration_ms: finishedAt.getTime() - startedAt.getTime()
    };

    this.stages.push(report);
    this.emit('stageCompleted', report);
    return report;
  }
}

export default RunTracker;
