// ──────────────────────────────────────────
// Warehouse: CSV table writer
// ──────────────────────────────────────────

import fs from 'fs/promises';
import path from 'path';
import { TableSink } from '../../shared/contracts';
import { WarehouseTables } from '../../shared/types';
import { formatMoney } from '../../shared/money';
import { MONEY_COLUMNS, ProjectedTable, projectTables } from './table-columns';

export function formatCell(column: string, value: unknown): string {
  if (value === null || value === undefined) return '';
  if (typeof value === 'boolean') return value ? 'true' : 'false';
  if (typeof value === 'number') return MONEY_COLUMNS.has(column) ? formatMoney(value) : String(value);
  return escapeCsvCell(String(value));
}

export function escapeCsvCell(value: string): string {
  if (/[",\r\n]/.test(value)) return `"${value.replace(/"/g, '""')}"`;
  return value;
}

export function toCsv(table: ProjectedTable): string {
  const lines = [table.columns.join(',')];
  for (const row of table.rows) {
    lines.push(row.map((value, i) => formatCell(table.columns[i], value)).join(','));
  }
  return `${lines.join('\n')}\n`;
}

export class CsvTableWriter implements TableSink {
  readonly name = 'csv';

  constructor(private outputDir: string) {}

  async write(tables: WarehouseTables): Promise<void> {
    const files = projectTables(tables).map((table) => ({
      file: path.join(this.outputDir, `${table.name}.csv`),
      content: toCsv(table),
    }));

    await fs.mkdir(this.outputDir, { recursive: true });
    for (const { file, content } of files) {
      await fs.writeFile(file, content, 'utf-8');
    }
    console.log(`[CsvTableWriter] Wrote ${files.length} tables to ${this.outputDir}`);
  }
}
