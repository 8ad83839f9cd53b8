import YAML from "yaml";
import type { SchemaRegistry } from "../schema/registry.js";
import type { ResultItem } from "../types/result-item.js";
import { fromSerialized, type SerializedItem } from "../results/serialize.js";
import { fileMeta, type DecodeTarget } from "./target.js";

/**
 * The plugin already wrote its own result tree as YAML or
 * JSON. The document is checked against the `result-item` schema; the file
 * reference is stamped into the root's meta.
 */
export async function parseManualResults(
  bytes: Buffer,
  target: DecodeTarget,
  registry: SchemaRegistry,
): Promise<ResultItem> {
  let doc: unknown;
  try {
    doc = YAML.parse(bytes.toString("utf8"));
  } catch (e) {
    throw new Error(`unparseable results document ${target.name}: ${e instanceof Error ? e.message : String(e)}`);
  }

  const validate = await registry.getValidator<SerializedItem>("result-item");
  if (!validate(doc)) {
    throw new Error(`invalid results document ${target.name}: ${registry.errorsText(validate.errors)}`);
  }

  const item = fromSerialized(doc);
  item.meta = { ...item.meta, ...fileMeta(target) };
  return item;
}
