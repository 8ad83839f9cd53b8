import { STATUS, type ResultItem } from "../types/result-item.js";
import { fileMeta, type DecodeTarget } from "./target.js";

/**
 * A raw artifact passes by being present. The text is carried in `details.contents`, cut at `limit` bytes when
 * `limit` is positive. The cut never splits a UTF-8 character.
 */
/** Largest offset <= `end` that does not fall inside a multi-byte sequence. */
function charBoundary(bytes: Buffer, end: number): number {
  let at = end;
  // 0b10xxxxxx bytes continue a sequence
  while (at > 0 && (bytes[at] & 0xc0) === 0x80) at--;
  return at;
}

export function wrapRaw(bytes: Buffer, target: DecodeTarget, limit = 0): ResultItem {
  const truncated = limit > 0 && bytes.length > limit;
  const details: Record<string, unknown> = {
    contents: (truncated ? bytes.subarray(0, charBoundary(bytes, limit)) : bytes).toString("utf8"),
  };
  if (truncated) details.truncated = true;

  return {
    name: target.name,
    status: STATUS.PASSED,
    meta: fileMeta(target),
    details,
    items: [],
  };
}
