/**
 * Parser for GNATprove analysis reports (gnatprove.out).
 *
 * The report has no delimiters: a unit header opens a unit, item lines
 * belong to the last header, and suppression lines belong to the last item.
 * Each line is offered to REPORT_RULES in order; the first rule whose
 * pattern matches handles it and the rest are skipped. Lines no rule
 * matches (narrative text, blank lines) are ignored.
 */

import { open, type FileHandle } from "node:fs/promises";
import { ReportError } from "../core/errors.js";
import type { Item, Report, Suppression, Unit } from "./types.js";

// ── Line patterns ──

const SUMMARY_RE = /^Analyzed (\d+) units?$/;
const UNIT_RE = /^in unit (.+), (\d+) subprograms and packages out of (\d+) analyzed$/;
// Item names start right after two spaces; suppression lines are indented four.
const GENERIC_ITEM_RE = /^  (\S.*) at (.+):(\d+), instantiated at (.+):(\d+)/;
const ITEM_RE = /^  (\S.*) at (.+):(\d+)/;
const SUPPRESSION_RE = /^    (.+):(\d+):(\d+): (.+)$/;

// Trailing clauses, searched anywhere in an item line
const FLOW_RE = /flow analyzed \((\d+) errors and (\d+) warnings\)/;
const PROVED_RE = /proved \((\d+) checks\)$/;
const NOT_PROVED_RE = /not proved, (\d+) checks out of (\d+) proved$/;

/** What a rule may do to the report under construction. */
export interface ParseContext {
  readonly lineNumber: number;
  setUnitsAnalyzed(count: number): void;
  startUnit(unit: Unit): void;
  addItem(item: Item): void;
  addSuppression(suppression: Suppression): void;
}

export interface ReportRule {
  name: string;
  pattern: RegExp;
  apply(match: RegExpMatchArray, line: string, ctx: ParseContext): void;
}

/** Parse a captured digit run. Anything past Number.MAX_SAFE_INTEGER is a format error. */
export function toCount(text: string, field: string, lineNumber?: number): number {
  const value = /^\d+$/.test(text) ? Number(text) : NaN;
  if (!Number.isSafeInteger(value)) {
    throw new ReportError(`Invalid ${field}: "${text}"`, "format", lineNumber);
  }
  return value;
}

/** Build an item from its location, then apply whichever trailing clause the line carries. */
function makeItem(
  line: string,
  ctx: ParseContext,
  name: string,
  fileName: string,
  lineNumber: string,
  inst?: { fileName: string; lineNumber: string }
): Item {
  const n = ctx.lineNumber;
  const item: Item = {
    name,
    fileName,
    lineNumber: toCount(lineNumber, "line number", n),
    instFileName: inst ? inst.fileName : null,
    instLineNumber: inst ? toCount(inst.lineNumber, "instantiation line number", n) : null,
    flowAnalyzed: false,
    numFlowErrors: 0,
    numFlowWarnings: 0,
    proved: false,
    numChecks: 0,
    numProvedChecks: 0,
    suppressions: [],
  };

  const flow = line.match(FLOW_RE);
  if (flow) {
    item.flowAnalyzed = true;
    item.numFlowErrors = toCount(flow[1], "flow error count", n);
    item.numFlowWarnings = toCount(flow[2], "flow warning count", n);
  }

  const proved = line.match(PROVED_RE);
  if (proved) {
    item.proved = true;
    item.numChecks = toCount(proved[1], "check count", n);
    item.numProvedChecks = item.numChecks;
  }

  const notProved = line.match(NOT_PROVED_RE);
  if (notProved) {
    item.proved = true;
    item.numProvedChecks = toCount(notProved[1], "proved check count", n);
    item.numChecks = toCount(notProved[2], "check count", n);
  }

  return item;
}

/** Ordered dispatch table. Generic items come before plain items: the plain pattern matches both. */
export const REPORT_RULES: readonly ReportRule[] = [
  {
    name: "summary",
    pattern: SUMMARY_RE,
    apply(match, _line, ctx) {
      ctx.setUnitsAnalyzed(toCount(match[1], "unit count", ctx.lineNumber));
    },
  },
  {
    name: "unit",
    pattern: UNIT_RE,
    apply(match, _line, ctx) {
      ctx.startUnit({
        name: match[1],
        numAnalyzed: toCount(match[2], "analyzed count", ctx.lineNumber),
        numTotal: toCount(match[3], "total count", ctx.lineNumber),
        items: [],
      });
    },
  },
  {
    name: "generic-item",
    pattern: GENERIC_ITEM_RE,
    apply(match, line, ctx) {
      ctx.addItem(
        makeItem(line, ctx, match[1], match[2], match[3], {
          fileName: match[4],
          lineNumber: match[5],
        })
      );
    },
  },
  {
    name: "item",
    pattern: ITEM_RE,
    apply(match, line, ctx) {
      ctx.addItem(makeItem(line, ctx, match[1], match[2], match[3]));
    },
  },
  {
    name: "suppression",
    pattern: SUPPRESSION_RE,
    apply(match, _line, ctx) {
      ctx.addSuppression({
        fileName: match[1],
        lineNumber: toCount(match[2], "line number", ctx.lineNumber),
        column: toCount(match[3], "column", ctx.lineNumber),
        message: match[4].trim(),
      });
    },
  },
];

/**
 * Incremental report parser: feed() one line at a time, then finish().
 *
 * Holds the unit under construction and the last item added to it.
 * A unit is sealed into the report when the next header arrives or on finish().
 */
export class ReportParser implements ParseContext {
  private readonly report: Report = { numUnitsAnalyzed: null, units: [] };
  private unit: Unit | null = null;
  private item: Item | null = null;
  private done = false;
  private linesRead = 0;

  constructor(private readonly rules: readonly ReportRule[] = REPORT_RULES) {}

  feed(rawLine: string): void {
    if (this.done) throw new Error("ReportParser.feed() called after finish()");
    this.linesRead++;
    const line = rawLine.replace(/\r?\n$|\r$/, "");

    for (const rule of this.rules) {
      const match = line.match(rule.pattern);
      if (match) {
        rule.apply(match, line, this);
        return;
      }
    }
  }

  /** 1-based number of the line being handled. */
  get lineNumber(): number {
    return this.linesRead;
  }

  finish(): Report {
    if (!this.done) {
      this.seal();
      this.done = true;
    }
    return this.report;
  }

  setUnitsAnalyzed(count: number): void {
    this.report.numUnitsAnalyzed = count;
  }

  startUnit(unit: Unit): void {
    this.seal();
    this.unit = unit;
  }

  addItem(item: Item): void {
    if (!this.unit) {
      throw new ReportError(
        `Item "${item.name}" appears before any "in unit" header`,
        "structure",
        this.lineNumber
      );
    }
    this.unit.items.push(item);
    this.item = item;
  }

  addSuppression(suppression: Suppression): void {
    if (!this.item) {
      const where = this.unit ? `unit "${this.unit.name}" has no items yet` : "no unit has started";
      throw new ReportError(
        `Suppressed message at ${suppression.fileName}:${suppression.lineNumber} has no owning item (${where})`,
        "structure",
        this.lineNumber
      );
    }
    this.item.suppressions.push(suppression);
  }

  private seal(): void {
    if (this.unit) {
      this.report.units.push(this.unit);
    }
    this.unit = null;
    this.item = null;
  }
}

/** Parse a sequence of report lines. */
export function parseReport(lines: Iterable<string>): Report {
  const parser = new ReportParser();
  for (const line of lines) {
    parser.feed(line);
  }
  return parser.finish();
}

/** Parse a whole report held in memory. LF, CRLF and bare CR all end a line. */
export function parseReportText(text: string): Report {
  return parseReport(text.split(/\r\n|\r|\n/));
}

/**
 * Read and parse a report file. The file handle is closed on every path,
 * including parse failures.
 */
export async function parseReportFile(path: string): Promise<Report> {
  let handle: FileHandle;
  try {
    handle = await open(path, "r");
  } catch (err) {
    const code = err instanceof Error && "code" in err ? err.code : undefined;
    if (code === "ENOENT") {
      throw new ReportError(`Report not found: ${path}`, "io");
    }
    throw new ReportError(`Cannot open report ${path}: ${errorMessage(err)}`, "io");
  }

  try {
    let text: string;
    try {
      text = await handle.readFile({ encoding: "utf-8" });
    } catch (err) {
      throw new ReportError(`Cannot read report ${path}: ${errorMessage(err)}`, "io");
    }
    return parseReportText(text);
  } finally {
    await handle.close();
  }
}

function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
