// ──────────────────────────────────────────
// Harmonization: Run job (on demand or scheduled)
// ──────────────────────────────────────────

import { v4 as uuidv4 } from 'uuid';
import { StagingContract, TableSink } from '../../shared/contracts';
import { RunSummary } from '../../shared/types';
import { IntegrityError, errorMessage } from '../../shared/errors';
import { rowCounts } from '../warehouse/table-columns';
import { HarmonizationPipeline } from './pipeline';

export class HarmonizationJob {
  private history: RunSummary[] = [];
  private inFlight: Promise<RunSummary> | null = null;

  constructor(
    private staging: StagingContract,
    private pipeline: HarmonizationPipeline,
    private sinks: TableSink[],
    private historyLimit = 50
  ) {}

  /** Joins the current run instead of starting a second one. */
  run(): Promise<RunSummary> {
    if (!this.inFlight) {
      this.inFlight = this.execute().finally(() => {
        this.inFlight = null;
      });
    }
    return this.inFlight;
  }

  get isRunning(): boolean {
    return this.inFlight !== null;
  }

  listRuns(limit = this.historyLimit): RunSummary[] {
    return this.history.slice(0, limit);
  }

  getRun(id: string): RunSummary | null {
    return this.history.find((run) => run.id === id) ?? null;
  }

  private async execute(): Promise<RunSummary> {
    const summary: RunSummary = {
      id: uuidv4(),
      status: 'running',
      started_at: new Date(),
      completed_at: null,
      row_counts: {},
      sinks: [],
      warnings: [],
      error: null,
      violations: [],
    };
    this.record(summary);
    console.log(`[HarmonizationJob] Run ${summary.id} started`);

    try {
      const staged = await this.staging.loadAll();
      const { tables, warnings } = this.pipeline.run(staged);
      summary.warnings = warnings;
      summary.row_counts = rowCounts(tables);

      for (const sink of this.sinks) {
        await sink.write(tables);
        summary.sinks.push(sink.name);
      }

      summary.status = 'completed';
      console.log(
        `[HarmonizationJob] Run ${summary.id} completed: ${tables.fact_orders.length} facts, ${warnings.length} warnings`
      );
    } catch (err) {
      summary.status = 'failed';
      summary.error = errorMessage(err);
      if (err instanceof IntegrityError) summary.violations = err.violations;
      console.error(`[HarmonizationJob] Run ${summary.id} failed:`, summary.error);
    }

    summary.completed_at = new Date();
    return summary;
  }

  private record(summary: RunSummary): void {
    this.history.unshift(summary);
    if (this.history.length > this.historyLimit) this.history.length = this.historyLimit;
  }
}
