import { describe, expect, it, beforeEach, afterEach } from "vitest";
import fs from "node:fs";
import path from "node:path";
import { processCommand } from "../src/commands/process.js";
import { formatSummary, reportCommand } from "../src/commands/report.js";
import { validateAll } from "../src/commands/validate.js";
import { EXIT, exitCodeForStatus } from "../src/commands/exit-codes.js";
import { FAILING_JUNIT, PASSING_JUNIT, mockResults } from "./helpers/mock-results.js";

const CONFIG_DIR = path.resolve(import.meta.dirname, "../config");
const FIXTURES = path.resolve(import.meta.dirname, "../fixtures");

describe("exit-codes", () => {
  it("defines all exit codes", () => {
    expect(EXIT.SUCCESS).toBe(0);
    expect(EXIT.RESULTS_FAILED).toBe(1);
    expect(EXIT.RESULTS_UNKNOWN).toBe(2);
    expect(EXIT.INVALID_ARGS).toBe(3);
    expect(EXIT.COLLECTION_ERRORS).toBe(4);
    expect(EXIT.INTERNAL_ERROR).toBe(5);
  });

  it("keeps unexpected failures apart from every result code", () => {
    const resultCodes = [EXIT.SUCCESS, EXIT.RESULTS_FAILED, EXIT.RESULTS_UNKNOWN, EXIT.COLLECTION_ERRORS];
    expect(resultCodes).not.toContain(EXIT.INTERNAL_ERROR);
  });

  it("maps rolled-up statuses to exit codes", () => {
    expect(exitCodeForStatus("passed")).toBe(0);
    expect(exitCodeForStatus("failed")).toBe(1);
    expect(exitCodeForStatus("unknown")).toBe(2);
  });
});

describe("process command", () => {
  let root: string;
  let pluginFile: string;

  beforeEach(() => {
    root = mockResults("e2e", {
      "results/output.xml": FAILING_JUNIT,
      "results/output2.xml": PASSING_JUNIT,
    });
    pluginFile = path.join(root, "e2e.yaml");
    fs.writeFileSync(pluginFile, "plugin-config:\n  plugin-name: e2e\n  driver: Job\n  result-format: junit\n");
  });

  afterEach(() => {
    fs.rmSync(root, { recursive: true, force: true });
  });

  it("rolls up, summarises and stores the report", async () => {
    const res = await processCommand({ pluginFile, resultsDir: root, configDir: CONFIG_DIR });

    expect(res.ok).toBe(true);
    if (!res.ok) return;
    expect(res.exitCode).toBe(EXIT.RESULTS_FAILED);
    expect(res.item.status).toBe("failed");
    expect(res.summary).toEqual({
      plugin: "e2e",
      status: "failed",
      total: 3,
      counts: { passed: 2, failed: 1 },
      failures: ["output.xml / node checks / disk pressure absent"],
    });
    expect(res.reportPath).toBe(path.join(root, "plugins", "e2e", "plugin-results.yaml"));
    expect(fs.existsSync(path.join(root, "plugins", "e2e", "plugin-results.manifest.json"))).toBe(true);
  });

  it("reads the stored report back", async () => {
    const processed = await processCommand({ pluginFile, resultsDir: root, configDir: CONFIG_DIR });
    if (!processed.ok || !processed.reportPath) throw new Error("process failed");

    const res = await reportCommand({ reportFile: processed.reportPath, mode: "detailed" });
    expect(res.ok).toBe(true);
    if (!res.ok) return;
    expect(res.summary).toEqual(processed.summary);
    expect(res.leaves.map((l) => l.status)).toEqual(["passed", "failed", "passed"]);
    expect(formatSummary(res.summary)).toEqual([
      "Plugin: e2e",
      "Status: failed",
      "Total: 3",
      "Failed: 1",
      "Passed: 2",
      "",
      "Failed tests:",
      "output.xml / node checks / disk pressure absent",
    ]);
  });

  it("leaves the results untouched with noWrite", async () => {
    const res = await processCommand({ pluginFile, resultsDir: root, configDir: CONFIG_DIR, noWrite: true });
    expect(res.ok && res.reportPath).toBeNull();
    expect(fs.existsSync(path.join(root, "plugins", "e2e", "plugin-results.yaml"))).toBe(false);
  });

  it("fails strict runs that hit collection errors", async () => {
    fs.writeFileSync(path.join(root, "plugins", "e2e", "results", "broken.xml"), "<testsuite>");

    const lenient = await processCommand({ pluginFile, resultsDir: root, configDir: CONFIG_DIR, noWrite: true });
    expect(lenient.exitCode).toBe(EXIT.RESULTS_FAILED);
    expect(lenient.ok && lenient.errors).toHaveLength(1);

    const strict = await processCommand({ pluginFile, resultsDir: root, configDir: CONFIG_DIR, noWrite: true, strict: true });
    expect(strict.exitCode).toBe(EXIT.COLLECTION_ERRORS);
  });

  it("rejects an invalid plugin definition", async () => {
    const res = await processCommand({
      pluginFile: path.join(FIXTURES, "plugins", "bad-driver.yaml"),
      resultsDir: root,
      configDir: CONFIG_DIR,
    });
    expect(res.ok).toBe(false);
    expect(res.exitCode).toBe(EXIT.INVALID_ARGS);
  });
});

describe("validate command", () => {
  it("accepts the shipped config and a valid plugin", async () => {
    const res = await validateAll({ configDir: CONFIG_DIR, pluginFile: path.join(FIXTURES, "plugins", "e2e.yaml") });
    expect(res).toEqual({ ok: true });
  });

  it("reports an invalid plugin", async () => {
    const res = await validateAll({ configDir: CONFIG_DIR, pluginFile: path.join(FIXTURES, "plugins", "bad-driver.yaml") });
    expect(res.ok).toBe(false);
    if (!res.ok) expect(res.errors.map((e) => e.code)).toEqual(["PLUGIN_INVALID"]);
  });

  it("reports a missing config directory", async () => {
    const res = await validateAll({ configDir: path.join(FIXTURES, "no-such-dir") });
    expect(res.ok).toBe(false);
    if (!res.ok) expect(res.errors[0].code).toBe("CONFIG_DIR_MISSING");
  });

  it("detects a report that changed after it was written", async () => {
    const root = mockResults("e2e", { "results/output.xml": PASSING_JUNIT });
    const pluginFile = path.join(root, "e2e.yaml");
    fs.writeFileSync(pluginFile, "plugin-config:\n  plugin-name: e2e\n  driver: Job\n  result-format: junit\n");
    try {
      const processed = await processCommand({ pluginFile, resultsDir: root, configDir: CONFIG_DIR });
      if (!processed.ok || !processed.reportPath) throw new Error("process failed");
      const manifestFile = path.join(path.dirname(processed.reportPath), "plugin-results.manifest.json");

      expect(await validateAll({ configDir: CONFIG_DIR, manifestFile })).toEqual({ ok: true });

      fs.appendFileSync(processed.reportPath, "# edited\n");
      const res = await validateAll({ configDir: CONFIG_DIR, manifestFile });
      expect(res.ok).toBe(false);
      if (!res.ok) expect(res.errors.map((e) => e.code)).toEqual(["REPORT_INTEGRITY"]);
    } finally {
      fs.rmSync(root, { recursive: true, force: true });
    }
  });
});
