import type { CapacityErrorCode } from "../types/errors.js";

/**
 * CLI exit codes. Schedulers branch on these; the printed result carries the
 * detail.
 */
export const EXIT = {
  SUCCESS: 0,
  OPERATION_FAILED: 1,
  INVALID_ARGS: 2,
  API_REJECTED: 3,
  TIMED_OUT: 4,
  PRECONDITION_FAILED: 5
} as const;

export type ExitCode = (typeof EXIT)[keyof typeof EXIT];

export function exitCodeFor(code: CapacityErrorCode): ExitCode {
  switch (code) {
    case "InvalidIdentifier":
    case "InvalidSku":
    case "InvalidArgument":
    case "InvalidConfig":
      return EXIT.INVALID_ARGS;
    case "CredentialUnavailable":
    case "StatusFetchFailed":
    case "ResumeRejected":
    case "SuspendRejected":
    case "ResizeRejected":
      return EXIT.API_REJECTED;
    case "StartTimeoutBeforeScale":
    case "Timeout":
      return EXIT.TIMED_OUT;
    case "CannotScaleWhileStopped":
      return EXIT.PRECONDITION_FAILED;
    case "ScalingFailed":
    case "SuspendFailed":
    case "PostScaleVerificationFailed":
      return EXIT.OPERATION_FAILED;
  }
}
