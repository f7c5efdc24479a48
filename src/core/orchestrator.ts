import path from 'path';
import { defaultSchema, EngineFactory, type EngineProvider, ScopedDefinitionProvider, withInspector } from '../engines/factory.js';
import type { ComparisonResult } from '../types/comparison.js';
import type { DatabaseTarget, RunConfig, SnapshotResult } from '../types/index.js';
import { SchemaExporter } from '../utils/exporter.js';
import { logger } from '../utils/logger.js';
import { summarizeDifferences, summarizeRetrieval } from '../utils/reporter.js';
import { SyncScriptWriter } from '../writer/writer.js';
import { SchemaComparator } from './comparator.js';
import { describeError } from './errors.js';
import { captureSnapshot, emptySnapshot, failedSnapshot } from './snapshot.js';
import { SyncScriptGenerator } from './syncGenerator.js';

export const MASTER_LABEL = 'DB_1';
export const TARGET_LABEL = 'DB_2';

export interface DatabaseOutcome {
  label: string;
  ok: boolean;
  tableCount: number;
  error?: string;
}

export interface RunSummary {
  databases: DatabaseOutcome[];
  comparison?: ComparisonResult;
  sync?: { path: string; generated: number; failed: number };
  reportPath?: string;
}

export type Output = (line: string) => void;

export class Orchestrator {
  private comparator = new SchemaComparator();

  constructor(
    private config: RunConfig,
    private engines: EngineProvider = EngineFactory,
    private print: Output = line => console.log(line)
  ) {}

  async run(): Promise<RunSummary> {
    const [master, target] = await Promise.all([
      this.capture(this.config.master, MASTER_LABEL),
      this.capture(this.config.target, TARGET_LABEL),
    ]);

    const summary: RunSummary = { databases: [toOutcome(master), toOutcome(target)] };
    this.print(summarizeRetrieval(master));
    this.print(summarizeRetrieval(target));

    if (master.snapshot.columns.length === 0 && target.snapshot.columns.length === 0) {
      logger.warn('No data retrieved from either database.');
      return summary;
    }

    if (master.snapshot.columns.length === 0) {
      logger.warn(`${MASTER_LABEL} returned no structure; there is nothing to compare against.`);
    }

    const comparison = this.comparator.compare(master.snapshot, target.snapshot);
    summary.comparison = comparison;
    this.print(summarizeDifferences(comparison.diffs));

    if (comparison.diffs.length > 0 && this.config.master && this.config.sync) {
      summary.sync = await this.generateSync(this.config.master, comparison);
    }

    summary.reportPath = await this.exportReport(master, target, comparison);
    return summary;
  }

  private async capture(target: DatabaseTarget | undefined, label: string): Promise<SnapshotResult> {
    if (!target) {
      const envName = label === MASTER_LABEL ? 'DATABASE_URL1' : 'DATABASE_URL2';
      logger.warn(`${envName} not set; ${label} skipped`);
      return { snapshot: emptySnapshot(label), ok: false, tableCount: 0, error: 'no connection string' };
    }

    logger.info(`Processing ${label}...`);
    try {
      return await withInspector(this.engines, target, inspector =>
        captureSnapshot(inspector, label, defaultSchema(target))
      );
    } catch (error) {
      return failedSnapshot(label, error);
    }
  }

  private async generateSync(master: DatabaseTarget, comparison: ComparisonResult): Promise<RunSummary['sync']> {
    logger.info('Generating synchronization SQL script...');
    const generator = new SyncScriptGenerator(
      new ScopedDefinitionProvider(this.engines, master),
      this.engines.createGenerator(master.type),
      defaultSchema(master)
    );

    const script = await generator.generate(comparison.diffs);
    const failed = script.blocks.filter(b => b.status === 'failed').length;
    const writer = new SyncScriptWriter(this.config.outputDir, this.config.sqlFile);

    try {
      await writer.write(script, MASTER_LABEL, TARGET_LABEL);
    } catch (error) {
      logger.error({ error }, `Error writing SQL script: ${describeError(error)}`);
      return undefined;
    }

    return { path: writer.getFilePath(), generated: script.blocks.length - failed, failed };
  }

  private async exportReport(master: SnapshotResult, target: SnapshotResult, comparison: ComparisonResult) {
    const outputPath = path.isAbsolute(this.config.reportFile)
      ? this.config.reportFile
      : path.join(this.config.outputDir, this.config.reportFile);

    try {
      await SchemaExporter.exportToSheet({ master: master.snapshot, target: target.snapshot, diffs: comparison.diffs }, outputPath);
      return outputPath;
    } catch (error) {
      logger.error({ error }, `Error writing report: ${describeError(error)}`);
      return undefined;
    }
  }
}

function toOutcome(result: SnapshotResult): DatabaseOutcome {
  return {
    label: result.snapshot.source,
    ok: result.ok,
    tableCount: result.tableCount,
    error: result.error,
  };
}
