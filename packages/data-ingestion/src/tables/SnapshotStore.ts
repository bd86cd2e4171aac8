import path from 'path';
import { mkdir, readFile, readdir, readlink, rename, rm, symlink, writeFile } from 'fs/promises';
import { SourceName, TABLES, TableName, TableRows } from '@fanpulse/types';
import { FieldIssue, RunReport, ValidationReport } from '../types';
import { SnapshotManifest, manifestSchema, tableSchemas } from './rowSchemas';
import { classifyIssue } from '../validation/issues';
import { createError, getErrorMessage } from '../utils/errorUtils';
import { compareText } from '../utils/sorting';
import { componentLogger } from '../utils/logger';

const log = componentLogger('SnapshotStore');

const TABLE_NAMES: TableName[] = [
  TABLES.DIM_CUSTOMERS,
  TABLES.FACT_TRANSACTIONS,
  TABLES.FACT_SENTIMENT,
  TABLES.CUSTOMER_PROFILE
];

export interface SnapshotContent {
  snapshot_id: string;
  run_id: string;
  published_at: string;
  tables: TableRows;
  validation: Partial<Record<SourceName, ValidationReport>>;
  /** Issues raised after profiling: coercions, merges, orphan drops, contract exclusions */
  issues: Partial<Record<SourceName, FieldIssue[]>>;
}

export interface LoadedSnapshot {
  manifest: SnapshotManifest;
  tables: TableRows;
}

/**
 * Where snapshots are published. A publish is all-or-nothing: readers see
 * either the previous snapshot or the complete new one.
 */
export interface SnapshotStore {
  publish(content: SnapshotContent): Promise<void>;
  loadCurrent(): Promise<LoadedSnapshot | null>;
  writeRunReport(report: RunReport): Promise<void>;
}

function toJson(value: unknown): string {
  return `${JSON.stringify(value, null, 2)}\n`;
}

function isMissing(error: unknown): boolean {
  return typeof error === 'object' && error !== null && 'code' in error && error.code === 'ENOENT';
}

function manifestFor(content: SnapshotContent): SnapshotManifest {
  const tables: SnapshotManifest['tables'] = {};
  for (const table of TABLE_NAMES) {
    tables[table] = { file: `${table}.json`, rows: content.tables[table].length };
  }
  return {
    snapshot_id: content.snapshot_id,
    run_id: content.run_id,
    published_at: content.published_at,
    tables,
    validation: Object.keys(content.validation).sort()
  };
}

/**
 * Publishes into `<outputDir>/snapshots/<id>/` and then repoints the
 * `<outputDir>/current` symlink with a single rename
 */
export class FileSnapshotStore implements SnapshotStore {
  private readonly outputDir: string;
  private readonly retention: number;

  constructor(outputDir: string, retention = 3) {
    this.outputDir = path.resolve(outputDir);
    this.retention = retention;
  }

  get currentLink(): string {
    return path.join(this.outputDir, 'current');
  }

  private get snapshotsDir(): string {
    return path.join(this.outputDir, 'snapshots');
  }

  async publish(content: SnapshotContent): Promise<void> {
    const finalDir = path.join(this.snapshotsDir, content.snapshot_id);
    const stagingDir = path.join(this.snapshotsDir, `.staging-${content.snapshot_id}`);
    const tempLink = path.join(this.outputDir, `.current-${content.snapshot_id}`);

    try {
      // Step 1: write everything into a staging directory
      await mkdir(path.join(stagingDir, 'validation'), { recursive: true });
      await mkdir(path.join(stagingDir, 'issues'), { recursive: true });
      for (const table of TABLE_NAMES) {
        await writeFile(path.join(stagingDir, `${table}.json`), toJson(content.tables[table]), 'utf8');
      }
      for (const [source, report] of Object.entries(content.validation)) {
        await writeFile(path.join(stagingDir, 'validation', `${source}.json`), toJson(report), 'utf8');
      }
      for (const [source, issues] of Object.entries(content.issues)) {
        await writeFile(path.join(stagingDir, 'issues', `${source}.json`), toJson(issues.map(classifyIssue)), 'utf8');
      }
      await writeFile(path.join(stagingDir, 'manifest.json'), toJson(manifestFor(content)), 'utf8');

      // Step 2: seal the snapshot directory
      await rename(stagingDir, finalDir);

      // Step 3: swap the current pointer atomically
      await symlink(path.join('snapshots', content.snapshot_id), tempLink, 'dir');
      await rename(tempLink, this.currentLink);
    } catch (error) {
      await rm(stagingDir, { recursive: true, force: true });
      await rm(tempLink, { force: true });
      throw createError(`Failed to publish snapshot ${content.snapshot_id}: ${getErrorMessage(error)}`, error);
    }

    log.info('Snapshot published', { snapshot_id: content.snapshot_id, path: finalDir });

    // The new snapshot is already current; a failed prune only leaves extra snapshots behind
    try {
      await this.prune(content.snapshot_id);
    } catch (error) {
      log.warn('Snapshot pruning failed', { snapshot_id: content.snapshot_id, error: getErrorMessage(error) });
    }
  }

  async loadCurrent(): Promise<LoadedSnapshot | null> {
    let manifestText: string;
    try {
      manifestText = await readFile(path.join(this.currentLink, 'manifest.json'), 'utf8');
    } catch (error) {
      if (isMissing(error)) {
        return null;
      }
      throw error;
    }

    const manifest = manifestSchema.parse(JSON.parse(manifestText));
    const tables: TableRows = {
      dim_customers: await this.readTable(TABLES.DIM_CUSTOMERS),
      fact_transactions: await this.readTable(TABLES.FACT_TRANSACTIONS),
      fact_sentiment: await this.readTable(TABLES.FACT_SENTIMENT),
      customer_profile: await this.readTable(TABLES.CUSTOMER_PROFILE)
    };
    return { manifest, tables };
  }

  async writeRunReport(report: RunReport): Promise<void> {
    const runsDir = path.join(this.outputDir, 'runs');
    await mkdir(runsDir, { recursive: true });

    const body = toJson(report);
    await writeFile(path.join(runsDir, `${report.run_id}.json`), body, 'utf8');

    const tempLatest = path.join(runsDir, `.latest-${report.run_id}.json`);
    await writeFile(tempLatest, body, 'utf8');
    await rename(tempLatest, path.join(runsDir, 'latest.json'));
  }

  private async readPublishedAt(snapshotId: string): Promise<string> {
    const text = await readFile(path.join(this.snapshotsDir, snapshotId, 'manifest.json'), 'utf8');
    return manifestSchema.parse(JSON.parse(text)).published_at;
  }

  private async readTable<T extends TableName>(table: T): Promise<TableRows[T]> {
    const text = await readFile(path.join(this.currentLink, `${table}.json`), 'utf8');
    return tableSchemas[table].parse(JSON.parse(text));
  }

  /**
   * Keep the most recently published snapshots, ordered by their manifests
   */
  protected async prune(currentId: string): Promise<void> {
    const entries = await readdir(this.snapshotsDir);
    const snapshots: { id: string; publishedAt: string }[] = [];
    for (const id of entries.filter(entry => !entry.startsWith('.'))) {
      snapshots.push({ id, publishedAt: await this.readPublishedAt(id) });
    }
    snapshots.sort((left, right) => compareText(left.publishedAt, right.publishedAt) || compareText(left.id, right.id));

    const current = path.basename(await readlink(this.currentLink));
    const stale = snapshots
      .slice(0, Math.max(0, snapshots.length - this.retention))
      .map(snapshot => snapshot.id)
      .filter(id => id !== current && id !== currentId);

    for (const id of stale) {
      await rm(path.join(this.snapshotsDir, id), { recursive: true, force: true });
      log.debug('Pruned snapshot', { snapshot_id: id });
    }
  }
}

/**
 * Keeps the published snapshot in memory; useful for embedding and tests
 */
export class InMemorySnapshotStore implements SnapshotStore {
  private current: SnapshotContent | null = null;
  readonly runReports: RunReport[] = [];
  readonly published: string[] = [];

  async publish(content: SnapshotContent): Promise<void> {
    this.current = structuredClone(content);
    this.published.push(content.snapshot_id);
  }

  async loadCurrent(): Promise<LoadedSnapshot | null> {
    if (!this.current) {
      return null;
    }
    return {
      manifest: manifestFor(this.current),
      tables: structuredClone(this.current.tables)
    };
  }

  async writeRunReport(report: RunReport): Promise<void> {
    this.runReports.push(structuredClone(report));
  }
}
