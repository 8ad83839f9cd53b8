import fs from "node:fs";
import path from "node:path";
import { fileURLToPath } from "node:url";
import YAML from "yaml";
import type { ResultsConfig } from "../types/config.js";

const CONFIG_DIR = path.resolve(path.dirname(fileURLToPath(import.meta.url)), "../../config");
const ENV_PREFIX = "RESULTS_";

type ConfigRecord = Record<string, unknown>;

export const DEFAULT_CONFIG: ResultsConfig = {
  schema_version: "1.0.0",
  results_dir: "results",
  max_workers: 4,
  timeout_markers: ["timed out"],
  raw_detail_limit: 65536,
  report_format: "yaml",
};

function isRecord(value: unknown): value is ConfigRecord {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/**
 * Deep merge two objects. `override` values take precedence.
 * Arrays are replaced, not concatenated.
 */
function deepMerge(base: ConfigRecord, override: ConfigRecord): ConfigRecord {
  const result: ConfigRecord = { ...base };
  for (const [key, val] of Object.entries(override)) {
    const current = result[key];
    if (isRecord(val) && isRecord(current)) {
      result[key] = deepMerge(current, val);
    } else if (val !== undefined && val !== null) {
      result[key] = val;
    }
  }
  return result;
}

/** Load a YAML file and return the parsed object, or an empty object if not found. */
function loadYaml(filePath: string): ConfigRecord {
  if (!fs.existsSync(filePath)) return {};
  const parsed: unknown = YAML.parse(fs.readFileSync(filePath, "utf8"));
  if (parsed === null || parsed === undefined) return {};
  if (!isRecord(parsed)) {
    throw new Error(`Config file is not a mapping: ${filePath}`);
  }
  return parsed;
}

function parseEnvValue(value: string): unknown {
  try {
    return YAML.parse(value) ?? value;
  } catch {
    return value;
  }
}

/**
 * RESULTS_MAX_WORKERS=8 → max_workers: 8. Values are read as YAML scalars so
 * numbers and lists keep their types.
 */
function applyEnvOverrides(config: ConfigRecord, env: NodeJS.ProcessEnv): ConfigRecord {
  const result: ConfigRecord = { ...config };
  for (const [key, value] of Object.entries(env)) {
    if (!key.startsWith(ENV_PREFIX) || value === undefined) continue;
    const configKey = key.slice(ENV_PREFIX.length).toLowerCase();
    result[configKey] = parseEnvValue(value);
  }
  return result;
}

/**
 * Load layered config: defaults ← base.yaml ← {envName}.yaml ← RESULTS_* variables.
 * The result is unchecked; run it through `validateConfig` before use.
 *
 * @param envName - Optional environment name (e.g., "ci"), loaded from `config/{envName}.yaml`.
 * @param configDir - Optional config directory path override.
 */
export function loadConfig(envName?: string, configDir?: string, env: NodeJS.ProcessEnv = process.env): ConfigRecord {
  const dir = configDir ?? CONFIG_DIR;

  let merged = deepMerge({ ...DEFAULT_CONFIG }, loadYaml(path.join(dir, "base.yaml")));
  if (envName) {
    merged = deepMerge(merged, loadYaml(path.join(dir, `${envName}.yaml`)));
  }

  return applyEnvOverrides(merged, env);
}
