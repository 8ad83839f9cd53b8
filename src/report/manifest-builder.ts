import type { ReportFormat } from "../types/config.js";
import type { Status } from "../types/result-item.js";

/** Sidecar describing a stored report. Validated by `report-manifest.schema.json`. */
export type ReportManifest = {
  plugin: string;
  status: Status;
  report_file: string;
  format: ReportFormat;
  sha256: string;
  generated_at: string;
  errors: string[];
};

export type ReportManifestInput = Omit<ReportManifest, "generated_at"> & { generated_at?: Date };

export function buildReportManifest(input: ReportManifestInput): ReportManifest {
  return {
    plugin: input.plugin,
    status: input.status,
    report_file: input.report_file,
    format: input.format,
    sha256: input.sha256,
    generated_at: (input.generated_at ?? new Date()).toISOString(),
    errors: [...input.errors],
  };
}

export function manifestFileName(reportFile: string): string {
  return reportFile.replace(/\.(ya?ml|json)$/, "") + ".manifest.json";
}
