import { parseJunitXml } from "./junit-xml.js";
import { wrapRaw } from "./raw.js";
import { parseManualResults } from "./manual.js";
import { createRegistry, type SchemaRegistry } from "../schema/registry.js";
import type { ResultItem } from "../types/result-item.js";
import type { DecodeTarget } from "./target.js";
import type { ResultFormat } from "../types/plugin.js";

export { fileMeta, type DecodeTarget } from "./target.js";

export const RESULT_FORMATS: readonly ResultFormat[] = ["junit", "e2e", "raw", "manual", ""];

export type Decoder = (bytes: Buffer, target: DecodeTarget) => Promise<ResultItem>;

export type DecoderOptions = {
  /** Byte cap on raw contents carried in details. 0 keeps everything. */
  rawDetailLimit?: number;
  /** Schema registry for manual results. Loaded from the default directory when omitted. */
  registry?: SchemaRegistry;
};

export function isResultFormat(format: string): format is ResultFormat {
  return RESULT_FORMATS.some((f) => f === format);
}

/**
 * Picks the decoder for a plugin's declared result format.
 * `junit` and `e2e` are structured reports, `raw` and the empty tag wrap files
 * as they are, `manual` reads a tree the plugin wrote itself.
 */
export function getDecoder(format: string, opts: DecoderOptions = {}): Decoder {
  if (!isResultFormat(format)) {
    throw new Error(`Unsupported result format: ${format}`);
  }

  switch (format) {
    case "junit":
    case "e2e":
      return async (bytes, target) => parseJunitXml(bytes.toString("utf8"), target);
    case "manual": {
      let registry: Promise<SchemaRegistry> | null = opts.registry ? Promise.resolve(opts.registry) : null;
      return async (bytes, target) => {
        registry ??= createRegistry();
        return parseManualResults(bytes, target, await registry);
      };
    }
    case "raw":
    case "":
      return async (bytes, target) => wrapRaw(bytes, target, opts.rawDetailLimit ?? 0);
  }
}
