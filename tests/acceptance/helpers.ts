/**
 * Shared test helpers.
 *
 * CLI tests run commands in-process: console output is captured and
 * process.exit is turned into a thrown ExitError.
 */
import { vi } from "vitest";
import { mkdtempSync } from "node:fs";
import { join } from "node:path";
import { tmpdir } from "node:os";
import type { Item } from "../../src/parsers/types.js";

export const FIXTURE = "fixtures/gnatprove.out";

/** Fresh temp directory under the OS temp dir */
export function makeTempDir(label: string): string {
  return mkdtempSync(join(tmpdir(), `provesheet-${label}-`));
}

/** Item with everything zeroed; override what the test cares about */
export function makeItem(overrides?: Partial<Item>): Item {
  return {
    name: "P",
    fileName: "p.adb",
    lineNumber: 1,
    instFileName: null,
    instLineNumber: null,
    flowAnalyzed: false,
    numFlowErrors: 0,
    numFlowWarnings: 0,
    proved: false,
    numChecks: 0,
    numProvedChecks: 0,
    suppressions: [],
    ...overrides,
  };
}

export class ExitError extends Error {
  constructor(readonly code: string | number | null | undefined) {
    super(`process.exit(${code})`);
  }
}

/** Capture console.log / console.error lines and trap process.exit */
export function captureConsole(): { logs: string[]; errors: string[] } {
  const logs: string[] = [];
  const errors: string[] = [];
  vi.spyOn(console, "log").mockImplementation((...args: unknown[]) => {
    logs.push(args.map(String).join(" "));
  });
  vi.spyOn(console, "error").mockImplementation((...args: unknown[]) => {
    errors.push(args.map(String).join(" "));
  });
  vi.spyOn(process, "exit").mockImplementation((code) => {
    throw new ExitError(code);
  });
  return { logs, errors };
}
