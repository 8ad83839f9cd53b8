import type { ResultItem } from "../types/result-item.js";

/** Stored form of a result item: leaves leave out `items`. */
export type SerializedItem = {
  name: string;
  status?: string;
  meta?: Record<string, string>;
  details?: Record<string, unknown>;
  items?: SerializedItem[];
};

export function toSerialized(item: ResultItem): SerializedItem {
  const out: SerializedItem = { name: item.name, status: item.status };
  if (item.meta && Object.keys(item.meta).length > 0) out.meta = item.meta;
  if (item.details && Object.keys(item.details).length > 0) out.details = item.details;
  if (item.items.length > 0) out.items = item.items.map(toSerialized);
  return out;
}

export function fromSerialized(doc: SerializedItem): ResultItem {
  const item: ResultItem = {
    name: doc.name,
    status: doc.status ?? "",
    items: (doc.items ?? []).map(fromSerialized),
  };
  if (doc.meta) item.meta = { ...doc.meta };
  if (doc.details) item.details = doc.details;
  return item;
}
