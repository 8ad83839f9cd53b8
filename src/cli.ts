#!/usr/bin/env node

import { Command } from "commander";
import { processCommand } from "./commands/process.js";
import { formatSummary, reportCommand, type ReportMode } from "./commands/report.js";
import { validateAll } from "./commands/validate.js";
import { EXIT } from "./commands/exit-codes.js";

type OutputFormat = "human" | "jsonl";

function emit(format: OutputFormat, record: Record<string, unknown>, human: string[]): void {
  if (format === "jsonl") {
    process.stdout.write(JSON.stringify(record) + "\n");
  } else {
    for (const line of human) console.log(line);
  }
}

function emitError(format: OutputFormat, code: string, message: string): void {
  if (format === "jsonl") {
    process.stdout.write(JSON.stringify({ level: "error", code, message }) + "\n");
  } else {
    console.error(message);
  }
}

const program = new Command();

program
  .name("resultsctl")
  .description("Collect, roll up and report conformance plugin results")
  .version("0.1.0");

program
  .command("process")
  .description("Build the result tree for one plugin and store its report")
  .argument("<plugin-file>", "Plugin definition (YAML)")
  .option("--results <path>", "Results root (overrides results_dir)")
  .option("--config <path>", "Path to config directory")
  .option("--env <name>", "Config environment overlay (config/<name>.yaml)")
  .option("--out <path>", "Directory for the report (default: the plugin directory)")
  .option("--timeout <seconds>", "Give up reading artifacts after this many seconds")
  .option("--strict", "Exit non-zero when any artifact could not be collected")
  .option("--no-write", "Do not store the report")
  .option("--format <format>", "Output format: human|jsonl", "human")
  .action(
    async (
      pluginFile: string,
      opts: {
        results?: string;
        config?: string;
        env?: string;
        out?: string;
        timeout?: string;
        strict?: boolean;
        write: boolean;
        format: OutputFormat;
      },
    ) => {
      let signal: AbortSignal | undefined;
      if (opts.timeout !== undefined) {
        const seconds = Number(opts.timeout);
        if (!Number.isFinite(seconds) || seconds <= 0) {
          emitError(opts.format, "INVALID_ARGS", `--timeout must be a positive number: ${opts.timeout}`);
          process.exit(EXIT.INVALID_ARGS);
        }
        signal = AbortSignal.timeout(seconds * 1000);
      }

      const res = await processCommand({
        pluginFile,
        resultsDir: opts.results,
        configDir: opts.config,
        env: opts.env,
        outDir: opts.out,
        strict: opts.strict,
        noWrite: !opts.write,
        signal,
      });

      if (!res.ok) {
        emitError(opts.format, "PROCESS_FAILED", res.error);
        process.exit(res.exitCode);
      }

      if (opts.format === "jsonl") {
        for (const message of res.errors) {
          process.stdout.write(JSON.stringify({ level: "warn", code: "COLLECTION_ERROR", message }) + "\n");
        }
      } else {
        for (const message of res.errors) console.error(`warning: ${message}`);
      }

      emit(
        opts.format,
        { level: "info", code: "OK", plugin: res.summary.plugin, status: res.summary.status, report: res.reportPath },
        [...formatSummary(res.summary), ...(res.reportPath ? ["", `Report: ${res.reportPath}`] : [])],
      );
      process.exitCode = res.exitCode;
    },
  );

program
  .command("report")
  .description("Summarise a stored report")
  .argument("<report-file>", "Stored report (YAML or JSON)")
  .option("--mode <mode>", "summary|detailed", "summary")
  .option("--format <format>", "Output format: human|jsonl", "human")
  .action(async (reportFile: string, opts: { mode: string; format: OutputFormat }) => {
    if (opts.mode !== "summary" && opts.mode !== "detailed") {
      emitError(opts.format, "INVALID_ARGS", `Unknown mode: ${opts.mode}`);
      process.exit(EXIT.INVALID_ARGS);
    }
    const mode: ReportMode = opts.mode;

    const res = await reportCommand({ reportFile, mode });
    if (!res.ok) {
      emitError(opts.format, "REPORT_FAILED", res.error);
      process.exit(EXIT.INVALID_ARGS);
    }

    if (opts.format === "jsonl") {
      process.stdout.write(JSON.stringify({ level: "info", code: "OK", ...res.summary }) + "\n");
      for (const leaf of res.leaves) process.stdout.write(JSON.stringify(leaf) + "\n");
    } else {
      for (const line of formatSummary(res.summary, res.leaves)) console.log(line);
    }
  });

program
  .command("validate")
  .description("Validate config and, optionally, a plugin definition or report manifest")
  .option("--config <path>", "Path to config directory", "config")
  .option("--env <name>", "Config environment overlay")
  .option("--plugin <path>", "Plugin definition to validate")
  .option("--manifest <path>", "Report manifest to verify")
  .option("--format <format>", "Output format: human|jsonl", "human")
  .action(
    async (opts: { config: string; env?: string; plugin?: string; manifest?: string; format: OutputFormat }) => {
      const res = await validateAll({
        configDir: opts.config,
        env: opts.env,
        pluginFile: opts.plugin,
        manifestFile: opts.manifest,
      });

      if (!res.ok) {
        if (opts.format === "jsonl") {
          for (const err of res.errors) process.stdout.write(JSON.stringify(err) + "\n");
        } else {
          for (const err of res.errors) console.error(err.message);
        }
        process.exit(EXIT.INVALID_ARGS);
      }

      emit(opts.format, { level: "info", code: "OK", message: "OK" }, ["OK"]);
    },
  );

program.parseAsync(process.argv).catch((err: unknown) => {
  const message = err instanceof Error ? err.message : String(err);
  process.stderr.write(JSON.stringify({ ok: false, error: message }) + "\n");
  process.exit(EXIT.INTERNAL_ERROR);
});
