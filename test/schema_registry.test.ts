import { describe, expect, it, beforeAll } from "vitest";
import path from "node:path";
import { SchemaRegistry, createRegistry } from "../src/schema/registry.js";

const SCHEMA_DIR = path.resolve(import.meta.dirname, "../schemas");

describe("schema registry", () => {
  let registry: SchemaRegistry;

  beforeAll(async () => {
    registry = await createRegistry(SCHEMA_DIR);
  });

  it("discovers all schema files", () => {
    expect(registry.names()).toEqual(["plugin", "report-manifest", "result-item"]);
  });

  it("reads versions from the schema ids", () => {
    expect(registry.versions()).toEqual({
      plugin: "1.0.0",
      "report-manifest": "1.0.0",
      "result-item": "1.0.0",
    });
  });

  it("fails on an unknown schema name", async () => {
    await expect(registry.getValidator("nope")).rejects.toThrow("Schema not found: nope");
  });

  it("fails on a missing schema directory", async () => {
    await expect(createRegistry(path.join(SCHEMA_DIR, "missing"))).rejects.toThrow(/Schema directory not found/);
  });

  describe("result-item schema", () => {
    it("accepts a nested tree", async () => {
      const { valid } = await registry.validate("result-item", {
        name: "e2e",
        status: "failed",
        meta: { type: "summary" },
        items: [
          {
            name: "junit_01.xml",
            status: "failed",
            meta: { file: "results/junit_01.xml", type: "file" },
            items: [{ name: "pods start", status: "failed", details: { failure: "timed out" } }],
          },
        ],
      });
      expect(valid).toBe(true);
    });

    it("rejects unknown fields at any depth", async () => {
      const { valid, errors } = await registry.validate("result-item", {
        name: "e2e",
        items: [{ name: "a", extra: true }],
      });
      expect(valid).toBe(false);
      expect(errors).toContain("must NOT have additional properties");
    });

    it("rejects non-string meta values", async () => {
      const { valid } = await registry.validate("result-item", { name: "e2e", meta: { retries: 3 } });
      expect(valid).toBe(false);
    });
  });

  describe("plugin schema", () => {
    it("accepts a DaemonSet plugin", async () => {
      const { valid } = await registry.validate("plugin", {
        "plugin-config": { "plugin-name": "node-checks", driver: "DaemonSet", "result-format": "raw" },
      });
      expect(valid).toBe(true);
    });

    it("rejects an unknown driver", async () => {
      const { valid } = await registry.validate("plugin", {
        "plugin-config": { "plugin-name": "node-checks", driver: "CronJob" },
      });
      expect(valid).toBe(false);
    });
  });

  describe("report-manifest schema", () => {
    const manifest = {
      plugin: "e2e",
      status: "passed",
      report_file: "plugin-results.yaml",
      format: "yaml",
      sha256: "a".repeat(64),
      generated_at: "2026-02-09T10:00:00Z",
      errors: [],
    };

    it("accepts a valid manifest", async () => {
      const { valid } = await registry.validate("report-manifest", manifest);
      expect(valid).toBe(true);
    });

    it("rejects a malformed checksum", async () => {
      const { valid } = await registry.validate("report-manifest", { ...manifest, sha256: "abc" });
      expect(valid).toBe(false);
    });

    it("rejects a malformed timestamp", async () => {
      const { valid } = await registry.validate("report-manifest", { ...manifest, generated_at: "yesterday" });
      expect(valid).toBe(false);
    });
  });
});
