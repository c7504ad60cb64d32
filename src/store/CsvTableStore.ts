import fs from "fs";
import path from "path";
import csv from "csv-parser";
import type { RawRow } from "../adapters/DatasetAdapter.js";
import type { Table, TableStore } from "./TableStore.js";

export function escapeCsvField(v: string): string {
  return `"${String(v).replace(/"/g, '""')}"`;
}

export function toCsv(table: Table): string {
  const lines: string[] = [table.columns.map(escapeCsvField).join(",")];
  for (const row of table.rows) {
    lines.push(table.columns.map(c => escapeCsvField(row[c] ?? "")).join(","));
  }
  return lines.join("\n") + "\n";
}

export function readCsv(filePath: string): Promise<Table> {
  return new Promise<Table>((resolve, reject) => {
    let columns: string[] = [];
    const rows: RawRow[] = [];

    fs.createReadStream(path.resolve(filePath))
      .on("error", reject)
      // Spreadsheet exports often start with a byte-order mark.
      .pipe(csv({ mapHeaders: ({ header }) => header.replace(/^\uFEFF/, "") }))
      .on("headers", (headers: string[]) => {
        columns = headers;
      })
      .on("data", (row: RawRow) => rows.push(row))
      .on("end", () => resolve({ columns, rows }))
      .on("error", reject);
  });
}

/**
 * Reads the input CSV once and rewrites the output CSV in full on every save.
 * When the output already exists it is loaded instead of the input, so an
 * interrupted run picks up the rows it already annotated. Each save goes to a
 * temp file renamed over the output, so the output is always a complete table.
 */
export class CsvTableStore implements TableStore {
  constructor(
    readonly inputPath: string,
    readonly outputPath: string
  ) {}

  sourcePath(): string | undefined {
    if (fs.existsSync(this.outputPath)) return this.outputPath;
    if (fs.existsSync(this.inputPath)) return this.inputPath;
    return undefined;
  }

  async load(): Promise<Table> {
    const src = this.sourcePath();
    if (!src) throw new Error(`Input file '${this.inputPath}' not found`);
    return readCsv(src);
  }

  async save(table: Table): Promise<void> {
    fs.mkdirSync(path.dirname(path.resolve(this.outputPath)), { recursive: true });
    const tmp = `${this.outputPath}.tmp`;
    fs.writeFileSync(tmp, toCsv(table), "utf8");
    fs.renameSync(tmp, this.outputPath);
  }
}
