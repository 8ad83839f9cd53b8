import fs from "node:fs";
import path from "node:path";
import { fileURLToPath } from "node:url";
import { loadAjv, type AjvValidateFn, type AjvInstance } from "./ajv.js";

export type SchemaEntry = {
  name: string;
  version: string;
  filePath: string;
  schema: unknown;
};

const DEFAULT_SCHEMA_DIR = path.resolve(path.dirname(fileURLToPath(import.meta.url)), "../../schemas");

/**
 * Discovers and loads all JSON Schemas from a directory.
 * Provides compile-on-demand validation functions.
 */
export class SchemaRegistry {
  private entries = new Map<string, SchemaEntry>();
  private ajv: AjvInstance | null = null;

  constructor(private readonly schemaDir: string) {}

  /** Discover all *.schema.json files in the schema directory. */
  async load(): Promise<void> {
    if (!fs.existsSync(this.schemaDir)) {
      throw new Error(`Schema directory not found: ${this.schemaDir}`);
    }

    const files = fs.readdirSync(this.schemaDir).filter((f) => f.endsWith(".schema.json")).sort();

    for (const file of files) {
      const filePath = path.join(this.schemaDir, file);
      const schema: unknown = JSON.parse(fs.readFileSync(filePath, "utf8"));

      // "result-item.schema.json" → "result-item"
      const name = file.replace(/\.schema\.json$/, "");
      this.entries.set(name, { name, version: extractVersion(schema) ?? "1.0.0", filePath, schema });
    }

    this.ajv = await loadAjv();
  }

  /** List all registered schema names. */
  names(): string[] {
    return [...this.entries.keys()].sort();
  }

  /** name → version */
  versions(): Record<string, string> {
    const result: Record<string, string> = {};
    for (const [name, entry] of this.entries) {
      result[name] = entry.version;
    }
    return result;
  }

  private async instance(): Promise<AjvInstance> {
    this.ajv ??= await loadAjv();
    return this.ajv;
  }

  /**
   * Validator for the given schema name. The caller names the type the schema
   * describes and the validator narrows to it. Ajv caches compiled schemas
   * per schema object.
   */
  async getValidator<T>(name: string): Promise<AjvValidateFn<T>> {
    const entry = this.entries.get(name);
    if (!entry) {
      throw new Error(`Schema not found: ${name}`);
    }

    const ajv = await this.instance();
    return ajv.compile<T>(entry.schema);
  }

  errorsText(errors: unknown): string {
    return this.ajv ? this.ajv.errorsText(errors) : String(errors);
  }

  /** Validate data against a named schema. Returns errors or null. */
  async validate(name: string, data: unknown): Promise<{ valid: boolean; errors: string | null }> {
    const validate = await this.getValidator(name);
    const valid = validate(data);
    return {
      valid,
      errors: valid ? null : this.errorsText(validate.errors),
    };
  }
}

function extractVersion(schema: unknown): string | null {
  if (typeof schema !== "object" || schema === null) return null;
  const record = Object.fromEntries(Object.entries(schema));

  // "...@1.0.0" at the end of $id
  if (typeof record.$id === "string") {
    const m = /@(\d+\.\d+\.\d+)/.exec(record.$id);
    if (m) return m[1];
  }

  return null;
}

/** Create and load a registry from the default schemas directory. */
export async function createRegistry(schemaDir?: string): Promise<SchemaRegistry> {
  const registry = new SchemaRegistry(schemaDir ?? DEFAULT_SCHEMA_DIR);
  await registry.load();
  return registry;
}
