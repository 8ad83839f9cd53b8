import type { ResultItem, Status } from "../types/result-item.js";
import { parseStatus, resolveTree, statusClass } from "./aggregate.js";

export const PATH_SEPARATOR = " / ";

export type LeafResult = {
  /** Names from the root's children down to the leaf. */
  path: string;
  status: Status;
};

export type ResultSummary = {
  plugin: string;
  status: Status;
  total: number;
  /** Leaf count per stored status string. */
  counts: Record<string, number>;
  /** Paths of leaves that count as failures (failed or timeout). */
  failures: string[];
};

function walkLeaves(item: ResultItem, trail: string[], out: LeafResult[]): void {
  if (item.items.length === 0) {
    out.push({ path: trail.join(PATH_SEPARATOR), status: item.status });
    return;
  }
  for (const child of item.items) {
    walkLeaves(child, [...trail, child.name], out);
  }
}

/** Every leaf below `root` in tree order. A leaf root is listed under its own name. */
export function listLeaves(root: ResultItem): LeafResult[] {
  const out: LeafResult[] = [];
  if (root.items.length === 0) {
    out.push({ path: root.name, status: root.status });
    return out;
  }
  walkLeaves(root, [], out);
  return out;
}

/**
 * Count the leaves of a plugin's tree by status. Works on a rolled-up copy, so
 * unaggregated trees summarise the same way as stored reports.
 */
export function summarizeItem(root: ResultItem): ResultSummary {
  const { item, status } = resolveTree(root);
  const leaves = listLeaves(item);

  const counts = new Map<string, number>();
  const failures: string[] = [];
  for (const leaf of leaves) {
    counts.set(leaf.status, (counts.get(leaf.status) ?? 0) + 1);
    if (statusClass(parseStatus(leaf.status)) === "failed") failures.push(leaf.path);
  }

  return { plugin: root.name, status, total: leaves.length, counts: Object.fromEntries(counts), failures };
}
