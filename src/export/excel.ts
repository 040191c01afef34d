import ExcelJS from "exceljs";
import { resolve } from "node:path";
import { reportTotals } from "../core/aggregate.js";
import type { Report } from "../parsers/types.js";
import { buildTables } from "./layout.js";
import type { ExportResult } from "./types.js";

export interface WorkbookOptions {
  percentFormat?: string;   // Excel number format for ratio cells, e.g. "0%" or "0.0%"
}

export const DEFAULT_PERCENT_FORMAT = "0%";

/** Build the Summary / Details / Suppressed Messages workbook in memory */
export function buildWorkbook(report: Report, options: WorkbookOptions = {}): ExcelJS.Workbook {
  const percentFormat = options.percentFormat ?? DEFAULT_PERCENT_FORMAT;
  const workbook = new ExcelJS.Workbook();

  for (const table of buildTables(report)) {
    const sheet = workbook.addWorksheet(table.name);
    sheet.columns = table.columns.map((c) => ({ header: c.header, width: c.width }));
    sheet.getRow(1).font = { bold: true };

    for (const values of table.rows) {
      const row = sheet.addRow(values);
      table.columns.forEach((col, i) => {
        if (col.percent && values[i] !== null) {
          row.getCell(i + 1).numFmt = percentFormat;
        }
      });
    }
  }

  return workbook;
}

export async function exportWorkbook(
  report: Report,
  outputPath: string,
  options: WorkbookOptions = {}
): Promise<ExportResult> {
  const workbook = buildWorkbook(report, options);
  const dest = resolve(outputPath);

  try {
    await workbook.xlsx.writeFile(dest);
  } catch (err) {
    throw new Error(`Excel export failed: ${err instanceof Error ? err.message : String(err)}`);
  }

  const totals = reportTotals(report);
  return {
    format: "xlsx",
    files: [dest],
    units: totals.units,
    items: totals.items,
    suppressions: totals.suppressions,
  };
}
