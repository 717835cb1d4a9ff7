import type { CapacityApi } from "../arm/capacity-client.js";
import type { CapacitySnapshot, ResourceCoordinates } from "../types/capacity.js";
import type { Clock } from "./clock.js";
import { silentSink, type EventSink } from "./events.js";
import { evaluatePoll, type WaitTarget } from "./state-machine.js";

export type PollTiming = {
  pollIntervalMs: number;
  /** Used while a start wait still sees the capacity paused. */
  stoppedPollIntervalMs: number;
};

export const DEFAULT_POLL_TIMING: PollTiming = {
  pollIntervalMs: 30_000,
  stoppedPollIntervalMs: 60_000
};

export type WaitOutcome =
  | { status: "converged"; snapshot: CapacitySnapshot; polls: number }
  | { status: "failed"; reason: string; snapshot: CapacitySnapshot | null; timedOut: boolean; polls: number }
  | { status: "timed_out"; snapshot: CapacitySnapshot | null; polls: number };

export type WaitOptions = {
  target: WaitTarget;
  timeoutMs: number;
  timing: PollTiming;
  clock: Clock;
  emit?: EventSink;
};

function describeTarget(target: WaitTarget): string {
  return target.kind === "resize" ? `resize to ${target.sku}` : target.kind;
}

function deadlineOutcome(target: WaitTarget, last: CapacitySnapshot | null, polls: number): WaitOutcome {
  if (target.kind === "resize") {
    return {
      status: "failed",
      reason: `timeout, last observed ${last?.state ?? "unknown"}/${last?.sku ?? "unknown"}`,
      snapshot: last,
      timedOut: true,
      polls
    };
  }
  return { status: "timed_out", snapshot: last, polls };
}

/**
 * Poll the capacity until `evaluatePoll` reports convergence or failure, or
 * until `timeoutMs` has elapsed. The deadline is checked before every read,
 * so an in-flight read may finish past it. Read errors propagate.
 */
export async function waitForConvergence(
  api: CapacityApi,
  coordinates: ResourceCoordinates,
  options: WaitOptions
): Promise<WaitOutcome> {
  const { target, timeoutMs, timing, clock } = options;
  const emit = options.emit ?? silentSink;
  const startedAt = clock.now();
  let last: CapacitySnapshot | null = null;
  let polls = 0;

  for (;;) {
    if (clock.now() - startedAt >= timeoutMs) {
      const outcome = deadlineOutcome(target, last, polls);
      emit({
        level: "warn",
        code: "WAIT_TIMED_OUT",
        message: `Gave up waiting for ${describeTarget(target)} after ${Math.round(timeoutMs / 1000)}s`,
        fields: { state: last?.state ?? null, sku: last?.sku ?? null, polls }
      });
      return outcome;
    }

    last = await api.get(coordinates);
    polls++;
    const decision = evaluatePoll(target, last);

    emit({
      level: "info",
      code: "POLL",
      message: `Poll ${polls}: ${last.state} at ${last.sku} (provisioning ${last.provisioningState})`,
      fields: { poll: polls, state: last.state, sku: last.sku, provisioningState: last.provisioningState }
    });

    switch (decision.action) {
      case "converged":
        emit({
          level: "info",
          code: "WAIT_CONVERGED",
          message: `Capacity reached ${describeTarget(target)} target after ${polls} poll(s)`,
          fields: { state: last.state, sku: last.sku, polls }
        });
        return { status: "converged", snapshot: last, polls };

      case "failed":
        emit({ level: "error", code: "WAIT_FAILED", message: decision.reason, fields: { state: last.state, sku: last.sku } });
        return { status: "failed", reason: decision.reason, snapshot: last, timedOut: false, polls };

      case "continue":
        if (decision.unrecognized !== null) {
          emit({
            level: "warn",
            code: "UNRECOGNIZED_STATE",
            message: `Unrecognized lifecycle state "${decision.unrecognized}", treating it as still in transition`,
            fields: { state: decision.unrecognized }
          });
        }
        await clock.sleep(decision.pace === "slow" ? timing.stoppedPollIntervalMs : timing.pollIntervalMs);
        break;
    }
  }
}
