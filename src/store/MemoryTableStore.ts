import type { Table, TableStore } from "./TableStore.js";

function copy(table: Table): Table {
  return { columns: [...table.columns], rows: table.rows.map(r => ({ ...r })) };
}

/** Keeps every saved snapshot in memory instead of writing a file (`--dry-run`). */
export class MemoryTableStore implements TableStore {
  readonly snapshots: Table[] = [];

  constructor(private readonly source: Table | (() => Promise<Table>)) {}

  async load(): Promise<Table> {
    const table = typeof this.source === "function" ? await this.source() : this.source;
    return copy(table);
  }

  async save(table: Table): Promise<void> {
    this.snapshots.push(copy(table));
  }

  latest(): Table | undefined {
    return this.snapshots[this.snapshots.length - 1];
  }
}
