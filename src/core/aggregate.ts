import type { Item, Report, Unit } from "../parsers/types.js";

export type AnalysisKind = "flow+proof" | "flow-only" | "proof-only" | "not-analyzed";

export interface UnitTotals {
  flowErrors: number;
  flowWarnings: number;
  checks: number;
  provedChecks: number;
  suppressions: number;
}

export interface ReportTotals extends UnitTotals {
  units: number;
  items: number;
}

/** Which analyses ran on an item, from its flowAnalyzed/proved flags alone */
export function analysisKind(item: Item): AnalysisKind {
  if (item.flowAnalyzed) {
    return item.proved ? "flow+proof" : "flow-only";
  }
  return item.proved ? "proof-only" : "not-analyzed";
}

/** Label written to the Analysis column */
export function analysisLabel(kind: AnalysisKind): string {
  const labels: Record<AnalysisKind, string> = {
    "flow+proof": "flow + proof",
    "flow-only": "flow only",
    "proof-only": "proof only",
    "not-analyzed": "not analyzed",
  };
  return labels[kind];
}

/** Fraction of checks proved. Zero checks is vacuously fully proved: 1. */
export function proofRatio(provedChecks: number, checks: number): number {
  if (checks === 0) return 1;
  return provedChecks / checks;
}

function emptyTotals(): UnitTotals {
  return { flowErrors: 0, flowWarnings: 0, checks: 0, provedChecks: 0, suppressions: 0 };
}

export function unitTotals(unit: Unit): UnitTotals {
  const totals = emptyTotals();
  for (const item of unit.items) {
    totals.flowErrors += item.numFlowErrors;
    totals.flowWarnings += item.numFlowWarnings;
    totals.checks += item.numChecks;
    totals.provedChecks += item.numProvedChecks;
    totals.suppressions += item.suppressions.length;
  }
  return totals;
}

/** Unit totals summed over the whole report, plus unit and item counts */
export function reportTotals(report: Report): ReportTotals {
  const totals: ReportTotals = { ...emptyTotals(), units: report.units.length, items: 0 };
  for (const unit of report.units) {
    const t = unitTotals(unit);
    totals.flowErrors += t.flowErrors;
    totals.flowWarnings += t.flowWarnings;
    totals.checks += t.checks;
    totals.provedChecks += t.provedChecks;
    totals.suppressions += t.suppressions;
    totals.items += unit.items.length;
  }
  return totals;
}
