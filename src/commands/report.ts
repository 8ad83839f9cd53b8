import { readReport } from "../report/writer.js";
import { listLeaves, summarizeItem, type LeafResult, type ResultSummary } from "../results/summary.js";
import { createRegistry } from "../schema/registry.js";

export type ReportMode = "summary" | "detailed";

export type ReportCommandResult =
  | { ok: true; summary: ResultSummary; leaves: LeafResult[] }
  | { ok: false; error: string };

/**
 * Summarise a stored report. `detailed` also lists every leaf with its status.
 */
export async function reportCommand(opts: { reportFile: string; mode: ReportMode }): Promise<ReportCommandResult> {
  const registry = await createRegistry();
  const res = await readReport(opts.reportFile, registry);
  if (!res.ok) return res;

  return {
    ok: true,
    summary: summarizeItem(res.item),
    leaves: opts.mode === "detailed" ? listLeaves(res.item) : [],
  };
}

/** Human-readable lines for a summary, as printed by the CLI. */
export function formatSummary(summary: ResultSummary, leaves: LeafResult[] = []): string[] {
  const lines = [`Plugin: ${summary.plugin}`, `Status: ${summary.status}`, `Total: ${summary.total}`];
  for (const key of Object.keys(summary.counts).sort()) {
    lines.push(`${key[0].toUpperCase()}${key.slice(1)}: ${summary.counts[key]}`);
  }
  if (summary.failures.length > 0) {
    lines.push("", "Failed tests:");
    for (const failure of summary.failures) lines.push(failure);
  }
  if (leaves.length > 0) {
    lines.push("", "Results:");
    for (const leaf of leaves) lines.push(`${leaf.status}  ${leaf.path}`);
  }
  return lines;
}
