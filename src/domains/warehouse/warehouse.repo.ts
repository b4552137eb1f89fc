// ──────────────────────────────────────────
// Warehouse: Postgres loader (replace-all inside one transaction)
// ──────────────────────────────────────────

import { Knex } from 'knex';
import { TableSink } from '../../shared/contracts';
import { WarehouseTables } from '../../shared/types';
import { projectTables } from './table-columns';

export class WarehouseRepo implements TableSink {
  readonly name = 'postgres';

  constructor(
    private db: Knex,
    private chunkSize = 500
  ) {}

  async write(tables: WarehouseTables): Promise<void> {
    await this.db.transaction(async (trx) => {
      for (const statement of this.statements(trx, tables)) {
        await statement;
      }
    });
    console.log('[WarehouseRepo] Replaced warehouse tables');
  }

  /**
   * Deletes in reverse load order (facts first), then inserts dimensions
   * before facts in chunks.
   */
  statements(db: Knex, tables: WarehouseTables): Knex.QueryBuilder[] {
    const projected = projectTables(tables);
    const statements: Knex.QueryBuilder[] = [...projected].reverse().map((table) => db(table.name).del());

    for (const table of projected) {
      const records = table.rows.map((row) => Object.fromEntries(table.columns.map((column, i) => [column, row[i]])));
      for (let start = 0; start < records.length; start += this.chunkSize) {
        statements.push(db(table.name).insert(records.slice(start, start + this.chunkSize)));
      }
    }

    return statements;
  }
}
