import { describe, it, expect, beforeAll, afterAll } from "vitest";
import Papa from "papaparse";
import { readFileSync, rmSync } from "node:fs";
import { join } from "node:path";
import { parseReportFile } from "../../src/parsers/gnatprove.js";
import { csvFileName, exportCsv, tableToCsv } from "../../src/export/csv.js";
import { suppressionsTable } from "../../src/export/layout.js";
import type { ExportResult } from "../../src/export/types.js";
import type { Report } from "../../src/parsers/types.js";
import { FIXTURE, makeTempDir } from "./helpers.js";

function readCsv(path: string): string[][] {
  const parsed = Papa.parse<string[]>(readFileSync(path, "utf-8"), { skipEmptyLines: true });
  return parsed.data;
}

describe("CSV export", () => {
  const dir = makeTempDir("csv");
  const outDir = join(dir, "sheets");
  let report: Report;
  let result: ExportResult;

  beforeAll(async () => {
    report = await parseReportFile(FIXTURE);
    result = await exportCsv(report, outDir, { prefix: "gnatprove" });
  });

  afterAll(() => rmSync(dir, { recursive: true, force: true }));

  it("writes one file per sheet into a new directory", () => {
    expect(result.format).toBe("csv");
    expect(result.files).toEqual([
      join(outDir, "gnatprove-summary.csv"),
      join(outDir, "gnatprove-details.csv"),
      join(outDir, "gnatprove-suppressed-messages.csv"),
    ]);
    expect(result.units).toBe(3);
    expect(result.items).toBe(6);
    expect(result.suppressions).toBe(3);
  });

  it("summary.csv has headers and per-unit totals, ratio as a number", () => {
    const lines = readFileSync(result.files[0], "utf-8").split("\r\n");

    expect(lines[0]).toBe(
      "Unit Name,Analyzed,Flow Errors,Flow Warnings,Checks,Proved Checks,% Proved,Suppressions"
    );
    expect(lines[1]).toBe("Counters,2/2,0,1,4,4,1,1");
    expect(lines[2]).toBe(`Buffers,3/4,1,2,11,9,${9 / 11},2`);
    expect(lines[3]).toBe("Main,1/1,0,0,0,0,,0");
    expect(lines).toHaveLength(4);
  });

  it("details.csv leaves cells empty for analyses that did not run", () => {
    const rows = readCsv(result.files[1]);

    expect(rows).toHaveLength(7);
    expect(rows[3]).toEqual(["Buffers.Put", "buffers.adb", "12", "flow + proof", "1", "2", "5", "3", "0.6"]);
    expect(rows[6]).toEqual(["Main", "main.adb", "3", "not analyzed", "", "", "", "", ""]);
  });

  it("suppressed-messages.csv quotes messages containing commas and quotes", () => {
    const text = readFileSync(result.files[2], "utf-8");
    expect(text.split("\r\n")[1]).toBe(
      'Counters.Increment,counters.adb,9,7,"info: overflow check justified, ""bounded by caller"""'
    );

    const rows = readCsv(result.files[2]);
    expect(rows[2]).toEqual([
      "Buffers.Get",
      "buffers.adb",
      "34",
      "10",
      'precondition might fail, "checked at call sites"',
    ]);
  });

  it("names files without a prefix", () => {
    const table = suppressionsTable(report);
    expect(csvFileName(table)).toBe("suppressed-messages.csv");
    expect(csvFileName(table, "run1")).toBe("run1-suppressed-messages.csv");
  });

  it("tableToCsv renders null cells as empty fields", () => {
    const csv = tableToCsv({
      name: "T",
      columns: [
        { header: "A", width: 1 },
        { header: "B", width: 1 },
      ],
      rows: [["x", null], [1, 0.5]],
    });
    expect(csv).toBe("A,B\r\nx,\r\n1,0.5");
  });
});
