/** One node of a plugin's hierarchical report. */
export const STATUS = {
  PASSED: "passed",
  FAILED: "failed",
  UNKNOWN: "unknown",
  TIMEOUT: "timeout",
} as const;

export type KnownStatus = (typeof STATUS)[keyof typeof STATUS];

/**
 * Leaves may carry any status string a plugin wrote; branches only ever hold a
 * known status after aggregation.
 */
export type Status = KnownStatus | (string & {});

export const ITEM_TYPE = {
  SUMMARY: "summary",
  NODE: "node",
  FILE: "file",
} as const;

export type ItemType = (typeof ITEM_TYPE)[keyof typeof ITEM_TYPE];

/**
 * Item metadata. `file` is the source artifact's path relative to the plugin
 * directory and `type` one of {@link ItemType}; plugins may add their own keys.
 */
export type ItemMeta = Record<string, string>;

export type ResultItem = {
  name: string;
  status: Status;
  meta?: ItemMeta;
  details?: Record<string, unknown>;
  items: ResultItem[];
};

/** Parsed form of a stored status string. `external` keeps the original text. */
export type ParsedStatus =
  | { kind: "passed" }
  | { kind: "failed" }
  | { kind: "unknown" }
  | { kind: "timeout" }
  | { kind: "external"; raw: string };

export type StatusClass = "failed" | "unknown" | "passed";
