import {
  analysisKind,
  analysisLabel,
  proofRatio,
  unitTotals,
} from "../core/aggregate.js";
import type { Report } from "../parsers/types.js";

/** null = leave the cell empty */
export type Cell = string | number | null;

export interface SheetColumn {
  header: string;
  width: number;
  percent?: boolean;    // value is a 0..1 ratio
}

export interface SheetTable {
  name: string;
  columns: SheetColumn[];
  rows: Cell[][];
}

// ── Column layouts ──

const SUMMARY_COLUMNS: SheetColumn[] = [
  { header: "Unit Name", width: 32 },
  { header: "Analyzed", width: 12 },
  { header: "Flow Errors", width: 12 },
  { header: "Flow Warnings", width: 14 },
  { header: "Checks", width: 10 },
  { header: "Proved Checks", width: 14 },
  { header: "% Proved", width: 10, percent: true },
  { header: "Suppressions", width: 13 },
];

const DETAILS_COLUMNS: SheetColumn[] = [
  { header: "Name", width: 40 },
  { header: "File", width: 24 },
  { header: "Line", width: 8 },
  { header: "Analysis", width: 14 },
  { header: "Flow Errors", width: 12 },
  { header: "Flow Warnings", width: 14 },
  { header: "Checks", width: 10 },
  { header: "Proved Checks", width: 14 },
  { header: "% Proved", width: 10, percent: true },
];

const SUPPRESSION_COLUMNS: SheetColumn[] = [
  { header: "Name", width: 40 },
  { header: "File", width: 24 },
  { header: "Line", width: 8 },
  { header: "Column", width: 8 },
  { header: "Reason", width: 60 },
];

/** One row per unit. % Proved stays empty for units without checks. */
export function summaryTable(report: Report): SheetTable {
  const rows = report.units.map((unit): Cell[] => {
    const t = unitTotals(unit);
    return [
      unit.name,
      `${unit.numAnalyzed}/${unit.numTotal}`,
      t.flowErrors,
      t.flowWarnings,
      t.checks,
      t.provedChecks,
      t.checks > 0 ? proofRatio(t.provedChecks, t.checks) : null,
      t.suppressions,
    ];
  });
  return { name: "Summary", columns: SUMMARY_COLUMNS, rows };
}

/** One row per item; flow cells only when flow-analyzed, check cells only when proved */
export function detailsTable(report: Report): SheetTable {
  const rows: Cell[][] = [];
  for (const unit of report.units) {
    for (const item of unit.items) {
      const flow = item.flowAnalyzed;
      const proof = item.proved;
      rows.push([
        item.name,
        item.fileName,
        item.lineNumber,
        analysisLabel(analysisKind(item)),
        flow ? item.numFlowErrors : null,
        flow ? item.numFlowWarnings : null,
        proof ? item.numChecks : null,
        proof ? item.numProvedChecks : null,
        proof && item.numChecks > 0 ? proofRatio(item.numProvedChecks, item.numChecks) : null,
      ]);
    }
  }
  return { name: "Details", columns: DETAILS_COLUMNS, rows };
}

export function suppressionsTable(report: Report): SheetTable {
  const rows: Cell[][] = [];
  for (const unit of report.units) {
    for (const item of unit.items) {
      for (const s of item.suppressions) {
        rows.push([item.name, s.fileName, s.lineNumber, s.column, s.message]);
      }
    }
  }
  return { name: "Suppressed Messages", columns: SUPPRESSION_COLUMNS, rows };
}

/** All three tables, in sheet order */
export function buildTables(report: Report): SheetTable[] {
  return [summaryTable(report), detailsTable(report), suppressionsTable(report)];
}
