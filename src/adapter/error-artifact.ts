import { STATUS, type ResultItem } from "../types/result-item.js";
import { fileMeta, type DecodeTarget } from "./target.js";

export const DEFAULT_TIMEOUT_MARKERS = ["timed out"];

function parseDetails(text: string): Record<string, unknown> {
  try {
    const parsed: unknown = JSON.parse(text);
    if (typeof parsed === "object" && parsed !== null && !Array.isArray(parsed)) {
      return Object.fromEntries(Object.entries(parsed));
    }
  } catch {
    // Not JSON: the whole text is the error message
  }
  return { error: text.trim() };
}

/** Whether the `error` message of an error report names a timeout. Other fields are not read. */
export function isTimeoutError(details: Record<string, unknown>, markers: readonly string[]): boolean {
  const message = details.error;
  if (typeof message !== "string") return false;
  const text = message.toLowerCase();
  return markers.some((m) => m !== "" && text.includes(m.toLowerCase()));
}

/**
 * Turn one file from an errors location into a leaf. The leaf is `failed`,
 * or `timeout` when its error message contains one of the timeout markers.
 */
export function errorArtifactItem(
  bytes: Buffer,
  target: DecodeTarget,
  markers: readonly string[] = DEFAULT_TIMEOUT_MARKERS,
): ResultItem {
  const details = parseDetails(bytes.toString("utf8"));
  return {
    name: target.name,
    status: isTimeoutError(details, markers) ? STATUS.TIMEOUT : STATUS.FAILED,
    meta: fileMeta(target),
    details,
    items: [],
  };
}
