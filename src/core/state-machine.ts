import type { CapacitySku, CapacitySnapshot } from "../types/capacity.js";

export const RUNNING_STATES = ["Active", "Running"] as const;
export const STOPPED_STATES = ["Paused", "Suspended"] as const;
export const TRANSITIONAL_STATES = [
  "Starting",
  "Resuming",
  "PreparingForRunning",
  "Preparing",
  "Provisioning",
  "Scaling",
  "Updating",
  "Pausing",
  "Suspending"
] as const;
export const FAILURE_STATES = ["Failed", "Error"] as const;

export type RunningState = (typeof RUNNING_STATES)[number];
export type StoppedState = (typeof STOPPED_STATES)[number];
export type TransitionalState = (typeof TRANSITIONAL_STATES)[number];
export type FailureState = (typeof FAILURE_STATES)[number];

/**
 * Lifecycle state as reported by the API, sorted into its family. Values
 * outside the known sets land in `unknown` with the raw text kept.
 */
export type LifecycleState =
  | { family: "running"; state: RunningState }
  | { family: "stopped"; state: StoppedState }
  | { family: "transitional"; state: TransitionalState }
  | { family: "failure"; state: FailureState }
  | { family: "unknown"; state: string };

export type LifecycleFamily = LifecycleState["family"];

function lookup<S extends string>(values: readonly S[], raw: string): S | undefined {
  const needle = raw.toLowerCase();
  return values.find((v) => v.toLowerCase() === needle);
}

export function classifyLifecycle(raw: string): LifecycleState {
  const running = lookup(RUNNING_STATES, raw);
  if (running) return { family: "running", state: running };
  const stopped = lookup(STOPPED_STATES, raw);
  if (stopped) return { family: "stopped", state: stopped };
  const transitional = lookup(TRANSITIONAL_STATES, raw);
  if (transitional) return { family: "transitional", state: transitional };
  const failure = lookup(FAILURE_STATES, raw);
  if (failure) return { family: "failure", state: failure };
  return { family: "unknown", state: raw };
}

export type ProvisioningStatus = "succeeded" | "failed" | "in_progress";

export function classifyProvisioning(raw: string): ProvisioningStatus {
  switch (raw.toLowerCase()) {
    case "succeeded":
      return "succeeded";
    case "failed":
      return "failed";
    default:
      return "in_progress";
  }
}

export function isRunning(snapshot: CapacitySnapshot): boolean {
  return classifyLifecycle(snapshot.state).family === "running";
}

export function isStopped(snapshot: CapacitySnapshot): boolean {
  return classifyLifecycle(snapshot.state).family === "stopped";
}

/** What a wait is converging towards. */
export type WaitTarget = { kind: "resize"; sku: CapacitySku } | { kind: "start" } | { kind: "stop" };

export type PollPace = "normal" | "slow";

export type PollDecision =
  | { action: "converged" }
  | { action: "failed"; reason: string }
  | { action: "continue"; pace: PollPace; unrecognized: string | null };

export function quotaHint(state: string): string {
  return `Capacity entered ${state} state - may indicate quota limitation`;
}

function keepPolling(lifecycle: LifecycleState, pace: PollPace = "normal"): PollDecision {
  return { action: "continue", pace, unrecognized: lifecycle.family === "unknown" ? lifecycle.state : null };
}

function assertNever(value: never): never {
  throw new Error(`Unhandled variant: ${JSON.stringify(value)}`);
}

/**
 * Pure function: given what a wait is after and the latest snapshot, decide
 * whether the wait is over.
 */
export function evaluatePoll(target: WaitTarget, snapshot: CapacitySnapshot): PollDecision {
  const lifecycle = classifyLifecycle(snapshot.state);

  switch (target.kind) {
    case "resize": {
      if (lifecycle.family === "failure") {
        return { action: "failed", reason: quotaHint(lifecycle.state) };
      }
      if (classifyProvisioning(snapshot.provisioningState) === "failed") {
        return {
          action: "failed",
          reason: `Provisioning state Failed while ${snapshot.state} at ${snapshot.sku} - may indicate quota limitation`
        };
      }
      if (snapshot.sku === target.sku && lifecycle.family === "running") {
        return { action: "converged" };
      }
      return keepPolling(lifecycle);
    }

    case "start":
      // A start wait only ever ends by reaching running or by its deadline.
      switch (lifecycle.family) {
        case "running":
          return { action: "converged" };
        case "stopped":
          return keepPolling(lifecycle, "slow");
        case "transitional":
        case "failure":
        case "unknown":
          return keepPolling(lifecycle);
      }
      return assertNever(lifecycle);

    case "stop":
      if (lifecycle.family === "stopped") return { action: "converged" };
      if (lifecycle.family === "failure") {
        return { action: "failed", reason: `Capacity entered ${lifecycle.state} state while pausing` };
      }
      return keepPolling(lifecycle);

    default:
      return assertNever(target);
  }
}
