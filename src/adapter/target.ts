import { ITEM_TYPE, type ItemMeta } from "../types/result-item.js";

/** Where an artifact came from, as shown in the result tree. */
export type DecodeTarget = {
  /** Item name: the path relative to the results location. */
  name: string;
  /** Path relative to the plugin directory, stored in `meta.file`. */
  file: string;
};

export function fileMeta(target: DecodeTarget): ItemMeta {
  return { file: target.file, type: ITEM_TYPE.FILE };
}
