import fs from "node:fs";
import YAML from "yaml";
import { createRegistry, type SchemaRegistry } from "../schema/registry.js";
import type { PluginDescriptor, PluginFile } from "../types/plugin.js";

export type DescriptorResult =
  | { ok: true; plugin: PluginDescriptor }
  | { ok: false; error: string };

export function toDescriptor(file: PluginFile): PluginDescriptor {
  const cfg = file["plugin-config"];
  return {
    name: cfg["plugin-name"],
    driver: cfg.driver,
    resultFormat: cfg["result-format"] ?? "",
    resultFiles: cfg["result-files"] ?? [],
  };
}

/** Parse and validate a plugin definition from YAML text. */
export async function parsePluginDescriptor(raw: string, registry?: SchemaRegistry): Promise<DescriptorResult> {
  let doc: unknown;
  try {
    doc = YAML.parse(raw);
  } catch (e) {
    return { ok: false, error: `Invalid plugin YAML: ${e instanceof Error ? e.message : String(e)}` };
  }

  const reg = registry ?? (await createRegistry());
  const validate = await reg.getValidator<PluginFile>("plugin");
  if (!validate(doc)) {
    return { ok: false, error: `Invalid plugin definition: ${reg.errorsText(validate.errors)}` };
  }
  return { ok: true, plugin: toDescriptor(doc) };
}

/** Read a plugin definition file. */
export async function loadPluginDescriptor(filePath: string, registry?: SchemaRegistry): Promise<DescriptorResult> {
  if (!fs.existsSync(filePath)) {
    return { ok: false, error: `Plugin definition not found: ${filePath}` };
  }
  return parsePluginDescriptor(fs.readFileSync(filePath, "utf8"), registry);
}
