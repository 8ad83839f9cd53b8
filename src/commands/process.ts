import path from "node:path";
import { resolveConfig } from "../config/validator.js";
import { loadPluginDescriptor } from "../plugin/descriptor.js";
import { processPlugin, pluginDir } from "../results/processing.js";
import { summarizeItem, type ResultSummary } from "../results/summary.js";
import { ReportWriter } from "../report/writer.js";
import { createRegistry } from "../schema/registry.js";
import type { ResultsConfig } from "../types/config.js";
import type { ResultItem } from "../types/result-item.js";
import { EXIT, exitCodeForStatus, type ExitCode } from "./exit-codes.js";

export type ProcessCommandOptions = {
  pluginFile: string;
  /** Overrides `results_dir` from config. */
  resultsDir?: string;
  configDir?: string;
  env?: string;
  /** Directory for the report; defaults to the plugin's own directory. */
  outDir?: string;
  /** Treat collection errors as a failed run. */
  strict?: boolean;
  /** Skip writing the report. */
  noWrite?: boolean;
  signal?: AbortSignal;
};

export type ProcessCommandResult =
  | {
      ok: true;
      exitCode: ExitCode;
      item: ResultItem;
      summary: ResultSummary;
      errors: string[];
      reportPath: string | null;
    }
  | { ok: false; exitCode: ExitCode; error: string };

/**
 * Collect one plugin's results, roll them up and store the report.
 */
export async function processCommand(opts: ProcessCommandOptions): Promise<ProcessCommandResult> {
  let config: ResultsConfig;
  try {
    config = await resolveConfig(opts.env, opts.configDir);
  } catch (e) {
    return { ok: false, exitCode: EXIT.INVALID_ARGS, error: e instanceof Error ? e.message : String(e) };
  }

  const registry = await createRegistry();
  const descriptor = await loadPluginDescriptor(opts.pluginFile, registry);
  if (!descriptor.ok) {
    return { ok: false, exitCode: EXIT.INVALID_ARGS, error: descriptor.error };
  }

  const plugin = descriptor.plugin;
  const resultsRoot = path.resolve(opts.resultsDir ?? config.results_dir);
  const { item, errors, status } = await processPlugin(plugin, resultsRoot, {
    maxWorkers: config.max_workers,
    timeoutMarkers: config.timeout_markers,
    rawDetailLimit: config.raw_detail_limit,
    registry,
    signal: opts.signal,
  });

  let reportPath: string | null = null;
  if (!opts.noWrite) {
    const writer = new ReportWriter(opts.outDir ?? pluginDir(resultsRoot, plugin.name), config.report_format, config.report_file);
    reportPath = writer.write({ item, status, errors }).reportPath;
  }

  const exitCode = opts.strict && errors.length > 0 ? EXIT.COLLECTION_ERRORS : exitCodeForStatus(status);

  return { ok: true, exitCode, item, summary: summarizeItem(item), errors, reportPath };
}
