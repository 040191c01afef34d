import { describe, it, expect } from "vitest";
import {
  analysisKind,
  analysisLabel,
  proofRatio,
  reportTotals,
  unitTotals,
} from "../../src/core/aggregate.js";
import { parseReportFile } from "../../src/parsers/gnatprove.js";
import { FIXTURE, makeItem } from "./helpers.js";

describe("Aggregator", () => {
  it("classifies items by their flow and proof flags", () => {
    expect(analysisKind(makeItem({ flowAnalyzed: true, proved: true }))).toBe("flow+proof");
    expect(analysisKind(makeItem({ flowAnalyzed: true }))).toBe("flow-only");
    expect(analysisKind(makeItem({ proved: true }))).toBe("proof-only");
    expect(analysisKind(makeItem())).toBe("not-analyzed");
  });

  it("labels each classification", () => {
    expect(analysisLabel("flow+proof")).toBe("flow + proof");
    expect(analysisLabel("flow-only")).toBe("flow only");
    expect(analysisLabel("proof-only")).toBe("proof only");
    expect(analysisLabel("not-analyzed")).toBe("not analyzed");
  });

  it("proof ratio is 1 with no checks, proved/checks otherwise", () => {
    expect(proofRatio(0, 0)).toBe(1);
    expect(proofRatio(2, 5)).toBe(0.4);
    expect(proofRatio(3, 3)).toBe(1);
    expect(proofRatio(0, 4)).toBe(0);
  });

  it("unit totals of an empty unit are all zero", () => {
    expect(unitTotals({ name: "Empty", numAnalyzed: 0, numTotal: 0, items: [] })).toEqual({
      flowErrors: 0,
      flowWarnings: 0,
      checks: 0,
      provedChecks: 0,
      suppressions: 0,
    });
  });

  it("unit totals sum every item", () => {
    const suppression = { fileName: "p.adb", lineNumber: 1, column: 1, message: "ok" };
    const totals = unitTotals({
      name: "U",
      numAnalyzed: 2,
      numTotal: 2,
      items: [
        makeItem({ flowAnalyzed: true, numFlowErrors: 1, numFlowWarnings: 2, suppressions: [suppression] }),
        makeItem({ proved: true, numChecks: 5, numProvedChecks: 3, suppressions: [suppression, suppression] }),
      ],
    });

    expect(totals).toEqual({
      flowErrors: 1,
      flowWarnings: 2,
      checks: 5,
      provedChecks: 3,
      suppressions: 3,
    });
  });

  it("report totals cover every unit of the sample report", async () => {
    const report = await parseReportFile(FIXTURE);

    expect(reportTotals(report)).toEqual({
      units: 3,
      items: 6,
      flowErrors: 1,
      flowWarnings: 3,
      checks: 15,
      provedChecks: 13,
      suppressions: 3,
    });
  });
});
