import { describe, it, expect } from '@jest/globals';
import { RunTracker } from '../RunTracker';
import { StageReport } from '../../types';

function steppingClock(start: string, stepMs: number): () => Date {
  let current = new Date(start).getTime() - stepMs;
  return () => {
    current += stepMs;
    return new Date(current);
  };
}

describe('RunTracker', () => {
  it('times stages and sums their per-source counts', () => {
    const tracker = new RunTracker('run-1', steppingClock('2025-08-01T00:00:00Z', 100));
    const completed: StageReport[] = [];
    tracker.on('stageCompleted', (stage: StageReport) => completed.push(stage));

    tracker.startStage('Reading');
    const report = tracker.completeStage('Reading', {
      customers: { rows_in: 5, rows_out: 4 },
      transactions: { rows_in: 7, rows_out: 7 }
    });

    expect(report).toEqual({
      stage: 'Reading',
      status: 'completed',
      rows_in: 12,
      rows_out: 11,
      by_source: {
        customers: { rows_in: 5, rows_out: 4 },
        transactions: { rows_in: 7, rows_out: 7 }
      },
      started_at: '2025-08-01T00:00:00.100Z',
      finished_at: '2025-08-01T00:00:00.200Z',
      duration_ms: 100
    });
    expect(completed).toEqual([report]);
    expect(tracker.isOpen('Reading')).toBe(false);
  });

  it('assembles the run report', () => {
    const tracker = new RunTracker('run-2', () => new Date('2025-08-01T00:00:00Z'));
    tracker.startStage('Reading');
    tracker.failStage('Reading');
    tracker.recordSource('customers', { rows_read: 3, rows_skipped: 0, skipped: [] });

    const report = tracker.buildReport('Failed', { kind: 'SourceUnreadable', stage: 'Reading', message: 'missing' }, null);

    expect(report.run_id).toBe('run-2');
    expect(report.status).toBe('Failed');
    expect(report.snapshot_id).toBeNull();
    expect(report.stages.map(stage => [stage.stage, stage.status])).toEqual([['Reading', 'failed']]);
    expect(report.sources).toEqual({ customers: { rows_read: 3, rows_skipped: 0, skipped: [] } });
    expect(report.contracts).toEqual({});
    expect(report.tables).toEqual({});
  });
});
