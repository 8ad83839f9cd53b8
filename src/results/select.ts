import path from "node:path";
import { minimatch } from "minimatch";

/** Whether a present file answers to a declared result-file entry. */
export function matchesDeclared(file: string, entry: string): boolean {
  const base = path.posix.basename(file);
  if (file === entry || base === entry) return true;
  return minimatch(file, entry, { dot: true }) || minimatch(base, entry, { dot: true });
}

/**
 * Pick the authoritative result files out of what a plugin left behind.
 *
 * With no declared files every present file is a result, in listing order.
 * Otherwise results follow the declared order; present files nobody declared
 * are scratch output and are dropped. A file is returned at most once.
 */
export function selectArtifacts(declared: readonly string[], present: readonly string[]): string[] {
  if (declared.length === 0) return [...present];

  const selected: string[] = [];
  const seen = new Set<string>();
  for (const entry of declared) {
    for (const file of present) {
      if (seen.has(file) || !matchesDeclared(file, entry)) continue;
      seen.add(file);
      selected.push(file);
    }
  }
  return selected;
}
