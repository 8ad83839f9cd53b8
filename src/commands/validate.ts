import fs from "node:fs";
import path from "node:path";
import { loadConfig } from "../config/loader.js";
import { validateConfig } from "../config/validator.js";
import { loadPluginDescriptor } from "../plugin/descriptor.js";
import { computeSha256 } from "../report/checksum.js";
import type { ReportManifest } from "../report/manifest-builder.js";
import { createRegistry, type SchemaRegistry } from "../schema/registry.js";

export type Diagnostic = {
  level: "error" | "warn" | "info";
  code: string;
  message: string;
  path?: string;
};

export type ValidateResult = { ok: true } | { ok: false; errors: Diagnostic[] };

function diag(level: Diagnostic["level"], code: string, message: string, filePath?: string): Diagnostic {
  return filePath === undefined ? { level, code, message } : { level, code, message, path: filePath };
}

/**
 * Check the layered config and, when given, a plugin definition and a stored
 * report manifest (schema plus checksum of the report it points at).
 */
export async function validateAll(opts: {
  configDir: string;
  env?: string;
  pluginFile?: string;
  manifestFile?: string;
  schemaDir?: string;
}): Promise<ValidateResult> {
  const errors: Diagnostic[] = [];

  const configDir = path.resolve(opts.configDir);
  if (!fs.existsSync(configDir)) {
    return { ok: false, errors: [diag("error", "CONFIG_DIR_MISSING", `Config directory not found: ${configDir}`)] };
  }

  let registry: SchemaRegistry;
  try {
    registry = await createRegistry(opts.schemaDir);
  } catch (e) {
    return { ok: false, errors: [diag("error", "SCHEMA_DIR_MISSING", e instanceof Error ? e.message : String(e))] };
  }

  try {
    const res = await validateConfig(loadConfig(opts.env, configDir));
    if (!res.valid) {
      errors.push(diag("error", "CONFIG_INVALID", `Config invalid: ${res.errors}`, configDir));
    }
  } catch (e) {
    errors.push(diag("error", "CONFIG_READ_FAILED", `Failed to read config: ${e instanceof Error ? e.message : String(e)}`, configDir));
  }

  if (opts.pluginFile) {
    const res = await loadPluginDescriptor(opts.pluginFile, registry);
    if (!res.ok) {
      errors.push(diag("error", "PLUGIN_INVALID", res.error, opts.pluginFile));
    }
  }

  if (opts.manifestFile) {
    errors.push(...(await validateManifest(opts.manifestFile, registry)));
  }

  return errors.length === 0 ? { ok: true } : { ok: false, errors };
}

async function validateManifest(
  manifestFile: string,
  registry: SchemaRegistry,
): Promise<Diagnostic[]> {
  if (!fs.existsSync(manifestFile)) {
    return [diag("error", "MANIFEST_MISSING", `Report manifest not found: ${manifestFile}`, manifestFile)];
  }

  let doc: unknown;
  try {
    doc = JSON.parse(fs.readFileSync(manifestFile, "utf8"));
  } catch (e) {
    return [diag("error", "MANIFEST_READ_FAILED", `Failed to read manifest: ${e instanceof Error ? e.message : String(e)}`, manifestFile)];
  }

  const validate = await registry.getValidator<ReportManifest>("report-manifest");
  if (!validate(doc)) {
    return [diag("error", "MANIFEST_INVALID", `Manifest invalid: ${registry.errorsText(validate.errors)}`, manifestFile)];
  }

  const reportPath = path.join(path.dirname(manifestFile), doc.report_file);
  if (!fs.existsSync(reportPath)) {
    return [diag("error", "REPORT_MISSING", `Report not found: ${reportPath}`, reportPath)];
  }
  if (computeSha256(reportPath) !== doc.sha256) {
    return [diag("error", "REPORT_INTEGRITY", `Report checksum mismatch: ${doc.report_file}`, reportPath)];
  }
  return [];
}
