import type { Dirent } from "node:fs";
import fs from "node:fs/promises";
import path from "node:path";
import { getDecoder, type Decoder } from "../adapter/adapter.js";
import { DEFAULT_TIMEOUT_MARKERS, errorArtifactItem } from "../adapter/error-artifact.js";
import { fileMeta, type DecodeTarget } from "../adapter/target.js";
import { createLimiter, mapBounded, type Limiter } from "../core/concurrency.js";
import type { SchemaRegistry } from "../schema/registry.js";
import type { PluginDescriptor } from "../types/plugin.js";
import { ITEM_TYPE, STATUS, type ResultItem, type Status } from "../types/result-item.js";
import { aggregateStatus } from "./aggregate.js";
import { selectArtifacts } from "./select.js";

export const PLUGINS_DIR = "plugins";
export const RESULTS_DIR = "results";
export const ERRORS_DIR = "errors";

export type ProcessOptions = {
  /** Upper bound on artifact reads and decodes in flight, across all nodes. */
  maxWorkers?: number;
  timeoutMarkers?: readonly string[];
  rawDetailLimit?: number;
  registry?: SchemaRegistry;
  /** Reads started after abort fail as collection errors. */
  signal?: AbortSignal;
};

export type ProcessResult = {
  item: ResultItem;
  /** Non-fatal collection errors, in tree order. */
  errors: string[];
};

type Context = {
  plugin: PluginDescriptor;
  pluginDir: string;
  decoder: Decoder;
  limit: Limiter;
  markers: readonly string[];
  signal?: AbortSignal;
};

type Collected = { items: ResultItem[]; errors: string[] };

export function pluginDir(resultsRoot: string, pluginName: string): string {
  return path.join(resultsRoot, PLUGINS_DIR, pluginName);
}

function errorMessage(e: unknown): string {
  return e instanceof Error ? e.message : String(e);
}

function isMissing(e: unknown): boolean {
  return e instanceof Error && "code" in e && e.code === "ENOENT";
}

function byName(a: string, b: string): number {
  return a < b ? -1 : a > b ? 1 : 0;
}

/** Files under `dir`, as sorted posix paths relative to it. A missing directory is empty. */
async function listFiles(dir: string, prefix = ""): Promise<string[]> {
  let entries: Dirent[];
  try {
    entries = await fs.readdir(dir, { withFileTypes: true });
  } catch (e) {
    if (isMissing(e) && prefix === "") return [];
    throw e;
  }

  const files: string[] = [];
  for (const entry of [...entries].sort((a, b) => byName(a.name, b.name))) {
    const rel = prefix ? `${prefix}/${entry.name}` : entry.name;
    if (entry.isDirectory()) {
      files.push(...(await listFiles(path.join(dir, entry.name), rel)));
    } else if (entry.isFile()) {
      files.push(rel);
    }
  }
  return files;
}

async function listDirs(dir: string): Promise<string[]> {
  try {
    const entries = await fs.readdir(dir, { withFileTypes: true });
    return entries
      .filter((e) => e.isDirectory())
      .map((e) => e.name)
      .sort(byName);
  } catch (e) {
    if (isMissing(e)) return [];
    throw e;
  }
}

function failedLeaf(target: DecodeTarget, message: string): ResultItem {
  return {
    name: target.name,
    status: STATUS.FAILED,
    meta: fileMeta(target),
    details: { error: message },
    items: [],
  };
}

/**
 * Decode every file of one location. A file that cannot be read or decoded
 * becomes a failed leaf and an error; its siblings are unaffected.
 */
async function collectLocation(
  ctx: Context,
  location: string,
  pick: (files: string[]) => string[],
  decode: (bytes: Buffer, target: DecodeTarget) => Promise<ResultItem>,
): Promise<Collected> {
  let files: string[];
  try {
    files = pick(await listFiles(path.join(ctx.pluginDir, location)));
  } catch (e) {
    const message = `${ctx.plugin.name}: cannot list ${location}: ${errorMessage(e)}`;
    return { items: [failedLeaf({ name: location, file: location }, message)], errors: [message] };
  }

  const targets = files.map((f): DecodeTarget => ({ name: f, file: `${location}/${f}` }));
  const settled = await mapBounded(targets, targets.length, (target) =>
    ctx.limit(async () => {
      const bytes = await fs.readFile(path.join(ctx.pluginDir, target.file), { signal: ctx.signal });
      return decode(bytes, target);
    }),
  );

  const out: Collected = { items: [], errors: [] };
  settled.forEach((res, i) => {
    if (res.ok) {
      out.items.push(res.value);
      return;
    }
    const message = `${ctx.plugin.name}: failed to process ${targets[i].file}: ${errorMessage(res.error)}`;
    out.items.push(failedLeaf(targets[i], message));
    out.errors.push(message);
  });
  return out;
}

/** Results of one execution target followed by its error leaves. */
async function collectTarget(ctx: Context, resultsLocation: string, errorsLocation: string): Promise<Collected> {
  const results = await collectLocation(
    ctx,
    resultsLocation,
    (files) => selectArtifacts(ctx.plugin.resultFiles, files),
    ctx.decoder,
  );
  const errors = await collectLocation(
    ctx,
    errorsLocation,
    (files) => files,
    async (bytes, target) => errorArtifactItem(bytes, target, ctx.markers),
  );
  return {
    items: [...results.items, ...errors.items],
    errors: [...results.errors, ...errors.errors],
  };
}

async function collectNodes(ctx: Context): Promise<Collected> {
  let nodes: string[];
  try {
    const [withResults, withErrors] = await Promise.all([
      listDirs(path.join(ctx.pluginDir, RESULTS_DIR)),
      listDirs(path.join(ctx.pluginDir, ERRORS_DIR)),
    ]);
    nodes = [...new Set([...withResults, ...withErrors])].sort(byName);
  } catch (e) {
    const message = `${ctx.plugin.name}: cannot list nodes: ${errorMessage(e)}`;
    return { items: [failedLeaf({ name: RESULTS_DIR, file: RESULTS_DIR }, message)], errors: [message] };
  }

  // Node tasks hold no slot; only their reads are limited.
  const settled = await mapBounded(nodes, nodes.length, (node) =>
    collectTarget(ctx, `${RESULTS_DIR}/${node}`, `${ERRORS_DIR}/${node}`),
  );

  const out: Collected = { items: [], errors: [] };
  settled.forEach((res, i) => {
    const node: ResultItem = { name: nodes[i], status: "", meta: { type: ITEM_TYPE.NODE }, items: [] };
    if (res.ok) {
      node.items = res.value.items;
      out.errors.push(...res.value.errors);
    } else {
      const message = `${ctx.plugin.name}: node ${nodes[i]}: ${errorMessage(res.error)}`;
      node.items = [failedLeaf({ name: nodes[i], file: `${RESULTS_DIR}/${nodes[i]}` }, message)];
      out.errors.push(message);
    }
    out.items.push(node);
  });
  return out;
}

/**
 * Build the result tree of one plugin from `<resultsRoot>/plugins/<name>`.
 *
 * `Job` plugins yield one level of file items; `DaemonSet` plugins one branch
 * per node directory. Statuses are not rolled up: call `aggregateStatus`
 * (or use `processPlugin`) before trusting the root's status.
 */
export async function postProcessPlugin(
  plugin: PluginDescriptor,
  resultsRoot: string,
  opts: ProcessOptions = {},
): Promise<ProcessResult> {
  const item: ResultItem = { name: plugin.name, status: "", meta: { type: ITEM_TYPE.SUMMARY }, items: [] };
  const dir = pluginDir(resultsRoot, plugin.name);

  let decoder: Decoder;
  try {
    decoder = getDecoder(plugin.resultFormat, { rawDetailLimit: opts.rawDetailLimit, registry: opts.registry });
  } catch (e) {
    return { item, errors: [`${plugin.name}: ${errorMessage(e)}`] };
  }

  try {
    const stat = await fs.stat(dir);
    if (!stat.isDirectory()) {
      return { item, errors: [`${plugin.name}: not a directory: ${dir}`] };
    }
  } catch (e) {
    const reason = isMissing(e) ? "no results found" : errorMessage(e);
    return { item, errors: [`${plugin.name}: ${reason} at ${dir}`] };
  }

  const ctx: Context = {
    plugin,
    pluginDir: dir,
    decoder,
    limit: createLimiter(opts.maxWorkers ?? 4),
    markers: opts.timeoutMarkers ?? DEFAULT_TIMEOUT_MARKERS,
    signal: opts.signal,
  };

  const collected =
    plugin.driver === "DaemonSet" ? await collectNodes(ctx) : await collectTarget(ctx, RESULTS_DIR, ERRORS_DIR);

  item.items = collected.items;
  return { item, errors: collected.errors };
}

/** `postProcessPlugin` followed by the status rollup. */
export async function processPlugin(
  plugin: PluginDescriptor,
  resultsRoot: string,
  opts: ProcessOptions = {},
): Promise<ProcessResult & { status: Status }> {
  const result = await postProcessPlugin(plugin, resultsRoot, opts);
  const status = aggregateStatus([result.item]);
  return { ...result, status };
}
