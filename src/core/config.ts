import { readFileSync, writeFileSync, mkdirSync, existsSync } from "node:fs";
import { join, dirname } from "node:path";

const HOME = process.env.HOME ?? process.env.USERPROFILE ?? "~";
const DEFAULT_CONFIG_PATH = join(HOME, ".provesheet", "config.json");

export const VALID_FORMATS = ["xlsx", "csv"] as const;

export type OutputFormat = (typeof VALID_FORMATS)[number];

export interface ProvesheetConfig {
  format: OutputFormat;
  percentFormat: string;
}

/** Keys accepted by `provesheet config set` */
export const CONFIG_KEYS = ["format", "percent-format"] as const;

export type ConfigKey = (typeof CONFIG_KEYS)[number];

const DEFAULT_CONFIG: ProvesheetConfig = {
  format: "xlsx",
  percentFormat: "0%",
};

// Excel percentage formats only: 0%, 0.0%, #,##0.00%
const PERCENT_FORMAT_RE = /^[#0,]*0(\.0+)?%$/;

/** PROVESHEET_CONFIG overrides the default ~/.provesheet/config.json */
export function configPath(): string {
  return process.env.PROVESHEET_CONFIG ?? DEFAULT_CONFIG_PATH;
}

export function isOutputFormat(value: string): value is OutputFormat {
  return VALID_FORMATS.some((f) => f === value);
}

export function isConfigKey(value: string): value is ConfigKey {
  return CONFIG_KEYS.some((k) => k === value);
}

/** Keep only recognised, well-typed fields from a parsed config file */
function normalize(raw: unknown): ProvesheetConfig {
  const config = { ...DEFAULT_CONFIG };
  if (typeof raw !== "object" || raw === null) return config;

  if ("format" in raw && typeof raw.format === "string" && isOutputFormat(raw.format)) {
    config.format = raw.format;
  }
  if (
    "percentFormat" in raw &&
    typeof raw.percentFormat === "string" &&
    PERCENT_FORMAT_RE.test(raw.percentFormat)
  ) {
    config.percentFormat = raw.percentFormat;
  }
  return config;
}

/** Read config from disk. Returns defaults if the file doesn't exist or can't be parsed. */
export function loadConfig(path: string = configPath()): ProvesheetConfig {
  if (!existsSync(path)) {
    return { ...DEFAULT_CONFIG };
  }
  try {
    return normalize(JSON.parse(readFileSync(path, "utf-8")));
  } catch {
    return { ...DEFAULT_CONFIG };
  }
}

/** Write config to disk. Creates parent dirs if needed. */
export function saveConfig(config: ProvesheetConfig, path: string = configPath()): void {
  const dir = dirname(path);
  if (!existsSync(dir)) mkdirSync(dir, { recursive: true });
  writeFileSync(path, JSON.stringify(config, null, 2) + "\n", "utf-8");
}

/** Return a copy of config with one key changed. Throws on an unknown key or invalid value. */
export function applyConfigValue(
  config: ProvesheetConfig,
  key: string,
  value: string
): ProvesheetConfig {
  if (!isConfigKey(key)) {
    throw new Error(`Unknown config key: "${key}"\nValid keys: ${CONFIG_KEYS.join(", ")}`);
  }

  switch (key) {
    case "format":
      if (!isOutputFormat(value)) {
        throw new Error(`Invalid format: "${value}"\nValid formats: ${VALID_FORMATS.join(", ")}`);
      }
      return { ...config, format: value };
    case "percent-format":
      if (!PERCENT_FORMAT_RE.test(value)) {
        throw new Error(`Invalid percent format: "${value}"\nExamples: 0%, 0.0%, 0.00%`);
      }
      return { ...config, percentFormat: value };
  }
}

/** Effective output format: CLI override > config file > "xlsx" */
export function resolveFormat(cliOverride: string | undefined, config: ProvesheetConfig): OutputFormat {
  if (cliOverride) {
    if (!isOutputFormat(cliOverride)) {
      throw new Error(
        `Invalid format: "${cliOverride}". Valid: ${VALID_FORMATS.join(", ")}`
      );
    }
    return cliOverride;
  }
  return config.format;
}
