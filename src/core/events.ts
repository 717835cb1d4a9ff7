export type EventLevel = "info" | "warn" | "error";

export type EventCode =
  | "CAPACITY_READ"
  | "ALREADY_AT_TARGET"
  | "RESUME_ISSUED"
  | "SUSPEND_ISSUED"
  | "RESIZE_ISSUED"
  | "SETTLE_DELAY"
  | "POLL"
  | "UNRECOGNIZED_STATE"
  | "WAIT_CONVERGED"
  | "WAIT_FAILED"
  | "WAIT_TIMED_OUT"
  | "REREAD_FAILED"
  | "VERIFY_OK"
  | "OPERATION_FAILED";

export type EventField = string | number | boolean | null;

/** One structured progress line; `fields` are flattened into it on output. */
export type OrchestratorEvent = {
  level: EventLevel;
  code: EventCode;
  message: string;
  fields?: Record<string, EventField>;
};

export type EventSink = (event: OrchestratorEvent) => void;

export const silentSink: EventSink = () => {};
