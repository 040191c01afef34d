import Papa from "papaparse";
import { existsSync, mkdirSync } from "node:fs";
import { writeFile } from "node:fs/promises";
import { join, resolve } from "node:path";
import { reportTotals } from "../core/aggregate.js";
import type { Report } from "../parsers/types.js";
import { buildTables, type SheetTable } from "./layout.js";
import type { ExportResult } from "./types.js";

export interface CsvOptions {
  prefix?: string;    // "gnatprove" → gnatprove-summary.csv, ...
}

/** "Suppressed Messages" → "suppressed-messages.csv" */
export function csvFileName(table: SheetTable, prefix?: string): string {
  const slug = table.name.toLowerCase().replace(/\s+/g, "-");
  return prefix ? `${prefix}-${slug}.csv` : `${slug}.csv`;
}

/** Render one table as CSV text. Empty cells become empty fields; ratios stay as numbers (0.4). */
export function tableToCsv(table: SheetTable): string {
  return Papa.unparse({
    fields: table.columns.map((c) => c.header),
    data: table.rows.map((row) => row.map((cell) => cell ?? "")),
  });
}

/** Write the three tables as CSV files into outDir (created if missing) */
export async function exportCsv(
  report: Report,
  outDir: string,
  options: CsvOptions = {}
): Promise<ExportResult> {
  const dir = resolve(outDir);
  if (!existsSync(dir)) mkdirSync(dir, { recursive: true });

  const files: string[] = [];
  for (const table of buildTables(report)) {
    const dest = join(dir, csvFileName(table, options.prefix));
    await writeFile(dest, tableToCsv(table), "utf-8");
    files.push(dest);
  }

  const totals = reportTotals(report);
  return {
    format: "csv",
    files,
    units: totals.units,
    items: totals.items,
    suppressions: totals.suppressions,
  };
}
