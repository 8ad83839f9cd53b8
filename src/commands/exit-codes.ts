import { STATUS, type Status } from "../types/result-item.js";

/**
 * CLI exit codes.
 */
export const EXIT = {
  SUCCESS: 0,
  RESULTS_FAILED: 1,
  RESULTS_UNKNOWN: 2,
  INVALID_ARGS: 3,
  COLLECTION_ERRORS: 4,
  INTERNAL_ERROR: 5,
} as const;

export type ExitCode = (typeof EXIT)[keyof typeof EXIT];

/** Exit code for a rolled-up plugin status. */
export function exitCodeForStatus(status: Status): ExitCode {
  switch (status) {
    case STATUS.FAILED:
      return EXIT.RESULTS_FAILED;
    case STATUS.UNKNOWN:
      return EXIT.RESULTS_UNKNOWN;
    default:
      return EXIT.SUCCESS;
  }
}
