/**
 * CSV Table
 *
 * Flat tabular output with a fixed column order. Rows are keyed by the
 * first column and upserted against whatever the file already holds, so
 * re-running a batch never duplicates a row.
 */

import { promises as fs } from 'fs';
import * as path from 'path';
import { formatCsvRow, parseCsv } from './csv.js';

export type CsvRow<C extends string> = Record<C, string>;

export interface CsvWriteResult {
  path: string;
  inserted: number;
  updated: number;
  total: number;
}

export class CsvTable<C extends string> {
  private writeChain: Promise<unknown> = Promise.resolve();

  constructor(
    readonly filePath: string,
    readonly columns: readonly C[]
  ) {
    if (columns.length === 0) {
      throw new Error('CsvTable requires at least one column');
    }
  }

  get keyColumn(): C {
    return this.columns[0];
  }

  /**
   * Read existing rows. Missing file means an empty table. Columns that no
   * longer exist are dropped; new columns read as empty strings.
   */
  async read(): Promise<Array<CsvRow<C>>> {
    let text: string;
    try {
      text = await fs.readFile(this.filePath, 'utf-8');
    } catch (error) {
      if (isNotFound(error)) {
        return [];
      }
      throw error;
    }

    const rows = parseCsv(text);
    if (rows.length === 0) {
      return [];
    }

    const header = rows[0];
    return rows.slice(1).map((cells) => {
      const row = this.emptyRow();
      for (const column of this.columns) {
        const index = header.indexOf(column);
        if (index >= 0) {
          row[column] = cells[index] ?? '';
        }
      }
      return row;
    });
  }

  /**
   * Upsert rows by key and rewrite the file. Writes are serialized through
   * a single chain and land via rename, so readers never see a torn file.
   */
  upsert(rows: Array<CsvRow<C>>): Promise<CsvWriteResult> {
    const next = this.writeChain.then(() => this.upsertNow(rows));
    this.writeChain = next.catch(() => undefined);
    return next;
  }

  private async upsertNow(rows: Array<CsvRow<C>>): Promise<CsvWriteResult> {
    const existing = await this.read();
    const byKey = new Map<string, CsvRow<C>>();
    for (const row of existing) {
      byKey.set(row[this.keyColumn], row);
    }

    let inserted = 0;
    let updated = 0;
    for (const row of rows) {
      const key = row[this.keyColumn];
      if (byKey.has(key)) {
        updated++;
      } else {
        inserted++;
      }
      byKey.set(key, row);
    }

    const lines = [formatCsvRow([...this.columns])];
    for (const row of byKey.values()) {
      lines.push(formatCsvRow(this.columns.map((column) => row[column])));
    }

    await fs.mkdir(path.dirname(this.filePath), { recursive: true });
    const tempPath = `${this.filePath}.${process.pid}.tmp`;
    await fs.writeFile(tempPath, lines.join('\n') + '\n', 'utf-8');
    await fs.rename(tempPath, this.filePath);

    return { path: this.filePath, inserted, updated, total: byKey.size };
  }

  private emptyRow(): CsvRow<C> {
    const row = {} as CsvRow<C>;
    for (const column of this.columns) {
      row[column] = '';
    }
    return row;
  }
}

export function isNotFound(error: unknown): boolean {
  return (
    typeof error === 'object' &&
    error !== null &&
    'code' in error &&
    error.code === 'ENOENT'
  );
}
