// ──────────────────────────────────────────
// Domain contracts: typed interfaces between domains
// ──────────────────────────────────────────

import { CollectionStatus, StagedCollections, WarehouseTables } from './types';

/**
 * Staging contract: exposed to the harmonization job.
 * The job pulls every raw collection once per run.
 */
export interface StagingContract {
  loadAll(): Promise<StagedCollections>;
  describe(): Promise<CollectionStatus[]>;
}

/**
 * Warehouse sink contract: anything that can persist a complete set of
 * harmonized tables. Writes are all-or-nothing per sink.
 */
export interface TableSink {
  readonly name: string;
  write(tables: WarehouseTables): Promise<void>;
}
