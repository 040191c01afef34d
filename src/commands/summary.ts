import { proofRatio, reportTotals, unitTotals } from "../core/aggregate.js";
import type { Report } from "../parsers/types.js";
import { describeReport, loadReportOrExit, plural } from "./export.js";

const BOLD = "\x1b[1m";
const RESET = "\x1b[0m";

/** "75%" for 3 of 4; "-" when there are no checks */
export function formatRatio(provedChecks: number, checks: number): string {
  if (checks === 0) return "-";
  return `${Math.round(proofRatio(provedChecks, checks) * 100)}%`;
}

/** Per-unit totals as fixed-width console lines, header first */
export function summaryLines(report: Report): string[] {
  const width = Math.max(4, ...report.units.map((u) => u.name.length)) + 2;
  const row = (cells: string[]) =>
    `  ${cells[0].padEnd(width)}${cells.slice(1).map((c) => c.padEnd(10)).join("")}`.trimEnd();

  const lines = [row(["Unit", "Analyzed", "Errors", "Warnings", "Checks", "Proved", "Suppr"])];
  for (const unit of report.units) {
    const t = unitTotals(unit);
    lines.push(
      row([
        unit.name,
        `${unit.numAnalyzed}/${unit.numTotal}`,
        String(t.flowErrors),
        String(t.flowWarnings),
        `${t.provedChecks}/${t.checks}`,
        formatRatio(t.provedChecks, t.checks),
        String(t.suppressions),
      ])
    );
  }
  return lines;
}

export async function summaryCommand(source: string): Promise<void> {
  const report = await loadReportOrExit(source);
  const totals = reportTotals(report);

  console.log(`${BOLD}${source}${RESET}`);
  if (report.numUnitsAnalyzed !== null) {
    console.log(`Analyzed ${report.numUnitsAnalyzed} units (${totals.units} listed)`);
  }
  console.log(describeReport(report));
  console.log();

  if (report.units.length === 0) {
    console.log("No units found in report.");
    return;
  }

  for (const line of summaryLines(report)) {
    console.log(line);
  }
  console.log();
  console.log(
    `Total: ${plural(totals.flowErrors, "flow error")}, ${plural(totals.flowWarnings, "flow warning")}, ` +
      `${totals.provedChecks}/${totals.checks} checks proved (${formatRatio(totals.provedChecks, totals.checks)})`
  );
}
