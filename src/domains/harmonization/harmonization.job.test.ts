import { describe, it, expect } from 'vitest';
import { HarmonizationJob } from './harmonization.job';
import { HarmonizationPipeline } from './pipeline';
import { stagedFixture } from './test-fixtures';
import { StagingContract, TableSink } from '../../shared/contracts';
import { CollectionStatus, StagedCollections, WarehouseTables } from '../../shared/types';
import { StagingError } from '../../shared/errors';

class FakeStaging implements StagingContract {
  loads = 0;

  constructor(private staged: () => StagedCollections) {}

  async loadAll(): Promise<StagedCollections> {
    this.loads++;
    return this.staged();
  }

  async describe(): Promise<CollectionStatus[]> {
    return [];
  }
}

class RecordingSink implements TableSink {
  written: WarehouseTables[] = [];

  constructor(readonly name: string, private failWith: Error | null = null) {}

  async write(tables: WarehouseTables): Promise<void> {
    if (this.failWith) throw this.failWith;
    this.written.push(tables);
  }
}

const pipeline = new HarmonizationPipeline({ timeRange: null, utcOffsetMinutes: 480 });

describe('HarmonizationJob', () => {
  it('runs the pipeline and writes to every sink', async () => {
    const csv = new RecordingSink('csv');
    const postgres = new RecordingSink('postgres');
    const job = new HarmonizationJob(new FakeStaging(stagedFixture), pipeline, [csv, postgres]);

    const summary = await job.run();

    expect(summary.status).toBe('completed');
    expect(summary.id).toMatch(/^[0-9a-f]{8}-[0-9a-f]{4}-4[0-9a-f]{3}-[89ab][0-9a-f]{3}-[0-9a-f]{12}$/);
    expect(summary.sinks).toEqual(['csv', 'postgres']);
    expect(summary.row_counts).toEqual({
      dim_time: 61,
      dim_customer: 4,
      dim_product: 3,
      dim_product_variant: 4,
      dim_order: 4,
      fact_orders: 6,
      fact_sales_aggregate: 4,
      fact_traffic: 2,
    });
    expect(summary.warnings).toHaveLength(1);
    expect(summary.error).toBeNull();
    expect(summary.completed_at).not.toBeNull();
    expect(csv.written).toHaveLength(1);
    expect(postgres.written[0]).toBe(csv.written[0]);
  });

  it('records a failed run without touching later sinks', async () => {
    const broken = new RecordingSink('csv', new Error('disk full'));
    const postgres = new RecordingSink('postgres');
    const job = new HarmonizationJob(new FakeStaging(stagedFixture), pipeline, [broken, postgres]);

    const summary = await job.run();

    expect(summary.status).toBe('failed');
    expect(summary.error).toBe('disk full');
    expect(summary.sinks).toEqual([]);
    expect(postgres.written).toEqual([]);
  });

  it('records staging failures', async () => {
    const staging: StagingContract = {
      loadAll: async () => {
        throw new StagingError('lazada_orders_raw.json is not valid JSON');
      },
      describe: async () => [],
    };
    const summary = await new HarmonizationJob(staging, pipeline, []).run();
    expect(summary).toMatchObject({ status: 'failed', error: 'lazada_orders_raw.json is not valid JSON' });
  });

  it('joins a run already in flight', async () => {
    const staging = new FakeStaging(stagedFixture);
    const job = new HarmonizationJob(staging, pipeline, []);

    const [first, second] = await Promise.all([job.run(), job.run()]);

    expect(second).toBe(first);
    expect(staging.loads).toBe(1);
    expect(job.isRunning).toBe(false);
  });

  it('keeps the newest runs first up to the history limit', async () => {
    const job = new HarmonizationJob(new FakeStaging(stagedFixture), pipeline, [], 2);
    const a = await job.run();
    const b = await job.run();
    const c = await job.run();

    expect(job.listRuns().map((r) => r.id)).toEqual([c.id, b.id]);
    expect(job.listRuns(1).map((r) => r.id)).toEqual([c.id]);
    expect(job.getRun(b.id)).toBe(b);
    expect(job.getRun(a.id)).toBeNull();
  });
});
