export interface Suppression {
  fileName: string;
  lineNumber: number;
  column: number;
  message: string;      // justification text, trimmed
}

/** One analyzed subprogram, package or generic instantiation. */
export interface Item {
  name: string;         // e.g., "Foo.Bar"
  fileName: string;     // e.g., "foo.adb"
  lineNumber: number;
  instFileName: string | null;    // null unless a generic instantiation
  instLineNumber: number | null;
  flowAnalyzed: boolean;
  numFlowErrors: number;
  numFlowWarnings: number;
  proved: boolean;
  numChecks: number;
  numProvedChecks: number;
  suppressions: Suppression[];
}

/** One compilation unit: "in unit NAME, A subprograms and packages out of T analyzed" */
export interface Unit {
  name: string;
  numAnalyzed: number;
  numTotal: number;
  items: Item[];
}

export interface Report {
  numUnitsAnalyzed: number | null;
  units: Unit[];        // input order
}
