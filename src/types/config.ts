/** Layered configuration types. */
export type ReportFormat = "yaml" | "json";

export type ResultsConfig = {
  schema_version: string;
  results_dir: string;
  max_workers: number;
  timeout_markers: string[];
  raw_detail_limit: number;
  report_format: ReportFormat;
  report_file?: string;
};
