import { STATUS, type ParsedStatus, type ResultItem, type Status, type StatusClass } from "../types/result-item.js";

const CLASS_PRIORITY: Record<StatusClass, number> = {
  passed: 0,
  unknown: 1,
  failed: 2,
};

const CLASS_STATUS: Record<StatusClass, Status> = {
  passed: STATUS.PASSED,
  unknown: STATUS.UNKNOWN,
  failed: STATUS.FAILED,
};

/** Parse a stored status string. Unrecognised strings stay `external`. */
export function parseStatus(raw: string): ParsedStatus {
  switch (raw) {
    case STATUS.PASSED:
      return { kind: "passed" };
    case STATUS.FAILED:
      return { kind: "failed" };
    case STATUS.UNKNOWN:
      return { kind: "unknown" };
    case STATUS.TIMEOUT:
      return { kind: "timeout" };
    default:
      return { kind: "external", raw };
  }
}

/** Priority bucket used during rollup. */
export function statusClass(status: ParsedStatus): StatusClass {
  switch (status.kind) {
    case "failed":
    case "timeout":
      return "failed";
    case "unknown":
      return "unknown";
    case "passed":
    case "external":
      return "passed";
  }
}

/**
 * Roll statuses up a group of sibling items, bottom-up.
 *
 * Branches are overwritten with the combined status of their children and
 * empty leaf statuses become `unknown`. Every item is visited even after a
 * failure has been seen. Returns the combined status of the group; an empty
 * group is `unknown`.
 */
export function aggregateStatus(items: ResultItem[]): Status {
  for (const item of items) {
    if (item.items.length > 0) {
      item.status = aggregateStatus(item.items);
    } else if (item.status === "") {
      item.status = STATUS.UNKNOWN;
    }
  }

  if (items.length === 0) return STATUS.UNKNOWN;

  let combined: StatusClass = "passed";
  for (const item of items) {
    const cls = statusClass(parseStatus(item.status));
    if (CLASS_PRIORITY[cls] > CLASS_PRIORITY[combined]) combined = cls;
  }
  return CLASS_STATUS[combined];
}

/** Copy an item tree without sharing any nested arrays or records. */
export function cloneItem(item: ResultItem): ResultItem {
  const copy: ResultItem = {
    name: item.name,
    status: item.status,
    items: item.items.map(cloneItem),
  };
  if (item.meta) copy.meta = { ...item.meta };
  if (item.details) copy.details = structuredClone(item.details);
  return copy;
}

/**
 * Non-mutating rollup: returns a resolved copy of `root` and its status.
 * The input tree is left as it was.
 */
export function resolveTree(root: ResultItem): { item: ResultItem; status: Status } {
  const item = cloneItem(root);
  const status = aggregateStatus([item]);
  return { item, status };
}
