import { loadAjv } from "../schema/ajv.js";
import type { ResultsConfig } from "../types/config.js";
import { loadConfig } from "./loader.js";

const CONFIG_SCHEMA = {
  type: "object",
  required: ["schema_version", "results_dir", "max_workers", "timeout_markers", "raw_detail_limit", "report_format"],
  properties: {
    schema_version: { type: "string", minLength: 1 },
    results_dir: { type: "string", minLength: 1 },
    max_workers: { type: "integer", minimum: 1, maximum: 256 },
    timeout_markers: { type: "array", items: { type: "string", minLength: 1 } },
    raw_detail_limit: { type: "integer", minimum: 0 },
    report_format: { type: "string", enum: ["yaml", "json"] },
    report_file: { type: "string", minLength: 1 },
  },
};

export type ConfigValidationResult =
  | { valid: true; config: ResultsConfig; errors: null }
  | { valid: false; errors: string };

/** Validate a loaded config against the config schema. */
export async function validateConfig(config: unknown): Promise<ConfigValidationResult> {
  const ajv = await loadAjv();
  const validate = ajv.compile<ResultsConfig>(CONFIG_SCHEMA);
  if (validate(config)) {
    return { valid: true, config, errors: null };
  }
  return { valid: false, errors: ajv.errorsText(validate.errors) };
}

/** Load and validate in one step; throws when the layered config is invalid. */
export async function resolveConfig(envName?: string, configDir?: string): Promise<ResultsConfig> {
  const res = await validateConfig(loadConfig(envName, configDir));
  if (!res.valid) {
    throw new Error(`Invalid config: ${res.errors}`);
  }
  return res.config;
}
