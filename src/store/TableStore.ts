import type { RawRow } from "../adapters/DatasetAdapter.js";

export type Table = {
  columns: string[];
  rows: RawRow[];
};

export interface TableStore {
  load(): Promise<Table>;
  // Persists the whole table; called after every processed row.
  save(table: Table): Promise<void>;
}

export function ensureColumns(table: Table, columns: string[]): void {
  for (const c of columns) {
    if (!table.columns.includes(c)) table.columns.push(c);
  }
  for (const row of table.rows) {
    for (const c of table.columns) {
      if (row[c] === undefined) row[c] = "";
    }
  }
}
