import { Command } from "commander";
import { exportCommand } from "./commands/export.js";
import { summaryCommand } from "./commands/summary.js";
import { configShow, configSet } from "./commands/config.js";

export const VERSION = "0.1.0";

export function buildProgram(): Command {
  const program = new Command();

  program
    .name("provesheet")
    .description("Export GNATprove analysis reports to spreadsheets")
    .version(VERSION);

  program
    .command("export <report>")
    .description("Parse a gnatprove.out report and write Summary, Details and Suppressed Messages sheets")
    .option("-o, --out <path>", "Output .xlsx file (or directory, with --format csv). Omit to only parse")
    .option("-f, --format <format>", "Output format: xlsx or csv (default from config)")
    .action(async (report: string, options: { out?: string; format?: string }) => {
      await exportCommand(report, { out: options.out, format: options.format });
    });

  program
    .command("summary <report>")
    .description("Print per-unit flow and proof totals for a report")
    .action(async (report: string) => {
      await summaryCommand(report);
    });

  const configCmd = program
    .command("config")
    .description("View and modify configuration");

  configCmd
    .command("show")
    .description("Show current configuration")
    .action(async () => {
      await configShow();
    });

  configCmd
    .command("set <key> <value>")
    .description("Set a config value (format, percent-format)")
    .action(async (key: string, value: string) => {
      await configSet(key, value);
    });

  // `provesheet config` with no subcommand → show
  configCmd.action(async () => {
    await configShow();
  });

  return program;
}
