import { describe, expect, it } from "vitest";
import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import { DEFAULT_CONFIG, loadConfig } from "../src/config/loader.js";
import { resolveConfig, validateConfig } from "../src/config/validator.js";

const CONFIG_DIR = path.resolve(import.meta.dirname, "../config");

describe("config loader", () => {
  it("loads base config with all required fields", () => {
    const config = loadConfig(undefined, CONFIG_DIR, {});
    expect(config.schema_version).toBe("1.0.0");
    expect(config.results_dir).toBe("results");
    expect(config.max_workers).toBe(4);
    expect(config.timeout_markers).toEqual(["timed out"]);
    expect(config.report_format).toBe("yaml");
  });

  it("merges env-specific config over base", () => {
    const config = loadConfig("ci", CONFIG_DIR, {});
    expect(config.results_dir).toBe("/var/run/conformance/results");
    expect(config.max_workers).toBe(8);
    expect(config.report_format).toBe("json");
    // base fields still present
    expect(config.raw_detail_limit).toBe(65536);
  });

  it("applies environment variable overrides with their YAML types", () => {
    const config = loadConfig(undefined, CONFIG_DIR, {
      RESULTS_RESULTS_DIR: "/tmp/override",
      RESULTS_MAX_WORKERS: "16",
      RESULTS_TIMEOUT_MARKERS: "[deadline exceeded]",
      OTHER_MAX_WORKERS: "99",
    });
    expect(config.results_dir).toBe("/tmp/override");
    expect(config.max_workers).toBe(16);
    expect(config.timeout_markers).toEqual(["deadline exceeded"]);
  });

  it("keeps env values that are not valid YAML as strings", () => {
    const config = loadConfig(undefined, CONFIG_DIR, { RESULTS_RESULTS_DIR: "[unclosed" });
    expect(config.results_dir).toBe("[unclosed");
  });

  it("env vars override env-specific yaml", () => {
    const config = loadConfig("ci", CONFIG_DIR, { RESULTS_MAX_WORKERS: "2" });
    expect(config.max_workers).toBe(2);
  });

  it("falls back to defaults when no config files exist", () => {
    const empty = fs.mkdtempSync(path.join(os.tmpdir(), "plugin-results-config-"));
    try {
      expect(loadConfig("nonexistent-env", empty, {})).toEqual(DEFAULT_CONFIG);
    } finally {
      fs.rmSync(empty, { recursive: true, force: true });
    }
  });
});

describe("config validator", () => {
  it("validates the base config", async () => {
    const res = await validateConfig(loadConfig(undefined, CONFIG_DIR, {}));
    expect(res.valid).toBe(true);
    expect(res.errors).toBeNull();
  });

  it("rejects config with a missing required field", async () => {
    const { results_dir: _omitted, ...rest } = DEFAULT_CONFIG;
    const res = await validateConfig(rest);
    expect(res.valid).toBe(false);
    expect(res.errors).toContain("results_dir");
  });

  it("rejects an unknown report format", async () => {
    const res = await validateConfig({ ...DEFAULT_CONFIG, report_format: "xml" });
    expect(res.valid).toBe(false);
  });

  it("rejects a worker count below one", async () => {
    const res = await validateConfig({ ...DEFAULT_CONFIG, max_workers: 0 });
    expect(res.valid).toBe(false);
    expect(res.errors).toContain("max_workers");
  });

  it("resolves a typed config for the ci environment", async () => {
    const config = await resolveConfig("ci", CONFIG_DIR);
    expect(config.max_workers).toBe(8);
    expect(config.report_format).toBe("json");
  });
});
