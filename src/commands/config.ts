import {
  loadConfig,
  saveConfig,
  applyConfigValue,
  configPath,
} from "../core/config.js";

const BOLD = "\x1b[1m";
const DIM = "\x1b[2m";
const RESET = "\x1b[0m";

export async function configShow(): Promise<void> {
  const cfg = loadConfig();

  console.log(`${BOLD}provesheet configuration${RESET}`);
  console.log(`${DIM}${configPath()}${RESET}\n`);

  console.log(`  Format:         ${cfg.format}`);
  console.log(`  Percent format: ${cfg.percentFormat}`);
}

export async function configSet(key: string, value: string): Promise<void> {
  try {
    saveConfig(applyConfigValue(loadConfig(), key, value));
  } catch (err) {
    console.error(`Error: ${err instanceof Error ? err.message : String(err)}`);
    process.exit(1);
  }

  console.log(`${key} set to: ${value}`);
}
