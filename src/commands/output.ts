import type { EventSink, OrchestratorEvent } from "../core/events.js";
import type { CapacityFailure } from "../types/errors.js";

export type OutputFormat = "human" | "jsonl";

export type LineWriter = (line: string) => void;

export type OutputStreams = {
  out: LineWriter;
  err: LineWriter;
};

export const processStreams: OutputStreams = {
  out: (line) => process.stdout.write(line + "\n"),
  err: (line) => process.stderr.write(line + "\n")
};

export function isOutputFormat(value: string): value is OutputFormat {
  return value === "human" || value === "jsonl";
}

export function formatEvent(event: OrchestratorEvent, format: OutputFormat): string {
  if (format === "jsonl") {
    return JSON.stringify({ level: event.level, code: event.code, message: event.message, ...event.fields });
  }
  return `[${event.level}] ${event.message}`;
}

/** Progress events go to stdout as JSONL, or to stderr for humans. */
export function createEventWriter(format: OutputFormat, streams: OutputStreams = processStreams): EventSink {
  return (event) => {
    const line = formatEvent(event, format);
    if (format === "jsonl") streams.out(line);
    else streams.err(line);
  };
}

export function formatFailure(error: CapacityFailure): string {
  const parts = [`${error.code}: ${error.message}`];
  if (error.status !== undefined) parts.push(`HTTP status: ${error.status}`);
  if (error.body) parts.push(`Response body: ${error.body}`);
  return parts.join("\n");
}

/**
 * Print a command's payload (when there is one) followed by its error (when it
 * failed). In jsonl mode each is a single line tagged with a code.
 */
export function writeCommandOutput(
  payload: object | null,
  error: CapacityFailure | null,
  format: OutputFormat,
  streams: OutputStreams = processStreams
): void {
  if (payload) {
    if (format === "jsonl") {
      streams.out(JSON.stringify({ level: error ? "error" : "info", code: "RESULT", result: payload }));
    } else {
      streams.out(JSON.stringify(payload, null, 2));
    }
  }
  if (error) {
    if (format === "jsonl") {
      streams.out(JSON.stringify({ level: "error", ...error }));
    } else {
      streams.err(formatFailure(error));
    }
  }
}
