import fs from "node:fs";
import path from "node:path";
import YAML from "yaml";
import { computeSha256FromContent } from "./checksum.js";
import { buildReportManifest, manifestFileName, type ReportManifest } from "./manifest-builder.js";
import { fromSerialized, toSerialized, type SerializedItem } from "../results/serialize.js";
import type { SchemaRegistry } from "../schema/registry.js";
import type { ReportFormat } from "../types/config.js";
import type { ResultItem, Status } from "../types/result-item.js";

export const DEFAULT_REPORT_BASENAME = "plugin-results";

export type WriteReportInput = {
  item: ResultItem;
  status: Status;
  errors: string[];
};

export type WrittenReport = {
  reportPath: string;
  manifestPath: string;
  manifest: ReportManifest;
};

export function serializeReport(item: ResultItem, format: ReportFormat): string {
  const doc = toSerialized(item);
  return format === "json" ? JSON.stringify(doc, null, 2) + "\n" : YAML.stringify(doc);
}

/**
 * Stores a resolved result tree beside a plugin's results,
 * together with a manifest carrying its checksum and the collection errors.
 */
export class ReportWriter {
  private readonly fileName: string;

  constructor(
    private readonly outDir: string,
    private readonly format: ReportFormat,
    fileName?: string,
  ) {
    this.fileName = fileName ?? `${DEFAULT_REPORT_BASENAME}.${format}`;
  }

  write(input: WriteReportInput): WrittenReport {
    fs.mkdirSync(this.outDir, { recursive: true });

    const body = serializeReport(input.item, this.format);
    const reportPath = path.join(this.outDir, this.fileName);
    fs.writeFileSync(reportPath, body, "utf8");

    const manifest = buildReportManifest({
      plugin: input.item.name,
      status: input.status,
      report_file: this.fileName,
      format: this.format,
      sha256: computeSha256FromContent(body),
      errors: input.errors,
    });
    const manifestPath = path.join(this.outDir, manifestFileName(this.fileName));
    fs.writeFileSync(manifestPath, JSON.stringify(manifest, null, 2) + "\n", "utf8");

    return { reportPath, manifestPath, manifest };
  }

  getReportPath(): string {
    return path.join(this.outDir, this.fileName);
  }
}

export type ReadReportResult =
  | { ok: true; item: ResultItem }
  | { ok: false; error: string };

/** Load a stored report (YAML or JSON) and check it against the result-item schema. */
export async function readReport(filePath: string, registry: SchemaRegistry): Promise<ReadReportResult> {
  if (!fs.existsSync(filePath)) {
    return { ok: false, error: `Report not found: ${filePath}` };
  }

  let doc: unknown;
  try {
    doc = YAML.parse(fs.readFileSync(filePath, "utf8"));
  } catch (e) {
    return { ok: false, error: `Failed to parse report: ${e instanceof Error ? e.message : String(e)}` };
  }

  const validate = await registry.getValidator<SerializedItem>("result-item");
  if (!validate(doc)) {
    return { ok: false, error: `Invalid report ${filePath}: ${registry.errorsText(validate.errors)}` };
  }
  return { ok: true, item: fromSerialized(doc) };
}
