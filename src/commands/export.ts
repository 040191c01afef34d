import { basename, extname, resolve } from "node:path";
import { parseReportFile } from "../parsers/gnatprove.js";
import { reportTotals } from "../core/aggregate.js";
import { loadConfig, resolveFormat, type OutputFormat } from "../core/config.js";
import { exportWorkbook } from "../export/excel.js";
import { exportCsv } from "../export/csv.js";
import type { ExportResult } from "../export/types.js";
import type { Report } from "../parsers/types.js";

const DIM = "\x1b[2m";
const RESET = "\x1b[0m";

export interface ExportCliOptions {
  out?: string;       // .xlsx file, or a directory for csv
  format?: string;    // overrides config
}

export function plural(n: number, word: string): string {
  return `${n} ${word}${n !== 1 ? "s" : ""}`;
}

/** "2 units, 5 items, 1 suppressed message" */
export function describeReport(report: Report): string {
  const t = reportTotals(report);
  return [
    plural(t.units, "unit"),
    plural(t.items, "item"),
    plural(t.suppressions, "suppressed message"),
  ].join(", ");
}

function describeResult(result: ExportResult): string[] {
  if (result.format === "xlsx") return [`Wrote: ${result.files[0]}`];
  return [`Wrote: ${result.files.length} CSV files`, ...result.files.map((f) => `  ${f}`)];
}

/** Load a report for a command, or print the error and exit 1 */
export async function loadReportOrExit(source: string): Promise<Report> {
  try {
    return await parseReportFile(resolve(source));
  } catch (err) {
    console.error(`Error: ${err instanceof Error ? err.message : String(err)}`);
    process.exit(1);
  }
}

export async function exportCommand(source: string, opts: ExportCliOptions = {}): Promise<void> {
  const config = loadConfig();

  let format: OutputFormat;
  try {
    format = resolveFormat(opts.format, config);
  } catch (err) {
    console.error(`Error: ${err instanceof Error ? err.message : String(err)}`);
    process.exit(1);
  }

  console.log(`Parsing: ${source}`);
  const report = await loadReportOrExit(source);
  console.log(describeReport(report));

  if (!opts.out) {
    console.log(`${DIM}No --out given, nothing written.${RESET}`);
    return;
  }

  try {
    const result =
      format === "csv"
        ? await exportCsv(report, opts.out, { prefix: basename(source, extname(source)) })
        : await exportWorkbook(report, opts.out, { percentFormat: config.percentFormat });
    for (const line of describeResult(result)) {
      console.log(line);
    }
  } catch (err) {
    console.error(`Error: ${err instanceof Error ? err.message : String(err)}`);
    process.exit(1);
  }
}
