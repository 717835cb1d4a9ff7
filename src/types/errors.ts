/** Failure taxonomy for a single orchestrator invocation. */
export type CapacityErrorCode =
  | "InvalidIdentifier"
  | "InvalidSku"
  | "InvalidArgument"
  | "InvalidConfig"
  | "CredentialUnavailable"
  | "StatusFetchFailed"
  | "ResumeRejected"
  | "SuspendRejected"
  | "ResizeRejected"
  | "CannotScaleWhileStopped"
  | "StartTimeoutBeforeScale"
  | "ScalingFailed"
  | "SuspendFailed"
  | "PostScaleVerificationFailed"
  | "Timeout";

export type CapacityFailure = {
  code: CapacityErrorCode;
  message: string;
  status?: number;
  body?: string;
};

export type CapacityErrorDetails = {
  status?: number;
  body?: string;
  cause?: unknown;
};

/**
 * Raised by the locator and the management-API client. The orchestrator turns
 * it into a failed outcome; it never reaches the CLI as an exception.
 */
export class CapacityError extends Error {
  readonly code: CapacityErrorCode;
  readonly status?: number;
  readonly body?: string;

  constructor(code: CapacityErrorCode, message: string, details: CapacityErrorDetails = {}) {
    super(message, details.cause === undefined ? undefined : { cause: details.cause });
    this.name = "CapacityError";
    this.code = code;
    this.status = details.status;
    this.body = details.body;
  }

  toFailure(): CapacityFailure {
    const failure: CapacityFailure = { code: this.code, message: this.message };
    if (this.status !== undefined) failure.status = this.status;
    if (this.body !== undefined && this.body !== "") failure.body = this.body;
    return failure;
  }
}
