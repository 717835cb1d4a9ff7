import type { CapacityApi } from "../arm/capacity-client.js";
import { DEFAULT_PROVIDER_NAMESPACE, parseResourceId } from "../arm/resource-id.js";
import type {
  CapacityOperation,
  CapacitySku,
  CapacitySnapshot,
  OperationResult,
  ResourceCoordinates
} from "../types/capacity.js";
import { CapacityError, type CapacityErrorCode, type CapacityFailure } from "../types/errors.js";
import { systemClock, type Clock } from "./clock.js";
import { silentSink, type EventSink } from "./events.js";
import { isRunning, isStopped, type WaitTarget } from "./state-machine.js";
import { DEFAULT_POLL_TIMING, waitForConvergence, type PollTiming, type WaitOutcome } from "./waiter.js";

export type OperationOutcome =
  | { ok: true; result: OperationResult }
  | { ok: false; result: OperationResult | null; error: CapacityFailure };

export type LifecycleRequest = {
  resourceId: string;
  waitForCompletion: boolean;
  timeoutMs: number;
};

export type ScaleRequest = LifecycleRequest & {
  targetSku: CapacitySku;
};

export type OrchestratorOptions = {
  providerNamespace?: string;
  timing?: PollTiming;
  /** Pause between a resume request and the first start-wait poll. */
  settleDelayMs?: number;
  clock?: Clock;
  emit?: EventSink;
};

export const DEFAULT_SETTLE_DELAY_MS = 30_000;

/** Per-invocation bookkeeping: what was read first and what was read last. */
type Run = {
  operation: CapacityOperation;
  coordinates: ResourceCoordinates;
  targetSku: string | null;
  previous: CapacitySnapshot | null;
  last: CapacitySnapshot | null;
};

/** Thrown inside an operation body to end it with a specific failure. */
class OperationFailure extends Error {
  constructor(
    readonly code: CapacityErrorCode,
    message: string,
    readonly snapshot: CapacitySnapshot | null = null
  ) {
    super(message);
  }
}

function minutes(ms: number): string {
  const value = ms / 60_000;
  return Number.isInteger(value) ? `${value} minute(s)` : `${value.toFixed(1)} minute(s)`;
}

/**
 * Capacity orchestrator: drives one capacity through scale, start or stop and
 * reports a single outcome.
 *
 * Each operation reads the capacity first, short-circuits when it is already
 * where it should be, issues one transition (resuming first for a scale of a
 * paused capacity) and optionally waits for convergence; a scale re-reads at
 * the end to verify the SKU. Failures come back as `{ ok: false }` with a
 * result built from the last snapshot seen, so the payload and the exit
 * status agree.
 */
export class CapacityOrchestrator {
  private readonly api: CapacityApi;
  private readonly providerNamespace: string;
  private readonly timing: PollTiming;
  private readonly settleDelayMs: number;
  private readonly clock: Clock;
  private readonly emit: EventSink;

  constructor(api: CapacityApi, options: OrchestratorOptions = {}) {
    this.api = api;
    this.providerNamespace = options.providerNamespace ?? DEFAULT_PROVIDER_NAMESPACE;
    this.timing = options.timing ?? DEFAULT_POLL_TIMING;
    this.settleDelayMs = options.settleDelayMs ?? DEFAULT_SETTLE_DELAY_MS;
    this.clock = options.clock ?? systemClock;
    this.emit = options.emit ?? silentSink;
  }

  async scale(request: ScaleRequest): Promise<OperationOutcome> {
    const target = request.targetSku;

    return this.execute("scale", request.resourceId, target, async (run) => {
      let snapshot = await this.read(run);

      if (snapshot.sku === target) {
        this.emit({
          level: "info",
          code: "ALREADY_AT_TARGET",
          message: `Capacity ${run.coordinates.capacityName} is already at ${target}`,
          fields: { sku: target }
        });
        return this.result(run, snapshot, { message: "already at target" });
      }

      if (!isRunning(snapshot)) {
        await this.resume(run, snapshot);

        if (!request.waitForCompletion) {
          throw new OperationFailure(
            "CannotScaleWhileStopped",
            `Capacity ${run.coordinates.capacityName} is ${snapshot.state}; resume was requested, ` +
              `but scaling to ${target} needs to wait for it to reach a running state`
          );
        }

        await this.settle();
        const started = await this.wait(run, { kind: "start" }, Math.floor(request.timeoutMs / 2));
        if (started.status !== "converged") {
          throw new OperationFailure(
            "StartTimeoutBeforeScale",
            `Capacity ${run.coordinates.capacityName} did not reach a running state within ` +
              `${minutes(Math.floor(request.timeoutMs / 2))}; not scaling to ${target}`
          );
        }
        snapshot = await this.read(run);
      }

      await this.api.resize(run.coordinates, snapshot, target);
      this.emit({
        level: "info",
        code: "RESIZE_ISSUED",
        message: `Requested resize of ${run.coordinates.capacityName} from ${snapshot.sku} to ${target}`,
        fields: { from: snapshot.sku, to: target }
      });

      if (!request.waitForCompletion) {
        return this.result(run, snapshot, { state: "Scaling", message: "scale requested; completion not confirmed" });
      }

      const outcome = await this.wait(run, { kind: "resize", sku: target }, request.timeoutMs);
      if (outcome.status !== "converged") {
        const latest = await this.rereadBestEffort(run, outcome.snapshot ?? snapshot);
        const timedOut = outcome.status === "timed_out" || outcome.timedOut;
        const reason = outcome.status === "failed" ? outcome.reason : `timeout after ${minutes(request.timeoutMs)}`;
        throw new OperationFailure(
          timedOut ? "Timeout" : "ScalingFailed",
          `Scaling ${run.coordinates.capacityName} to ${target} failed: ${reason}`,
          latest
        );
      }

      const final = await this.read(run);
      if (final.sku !== target) {
        throw new OperationFailure(
          "PostScaleVerificationFailed",
          `Capacity ${run.coordinates.capacityName} reported ${final.sku} after converging on ${target}`,
          final
        );
      }
      this.emit({ level: "info", code: "VERIFY_OK", message: `Verified ${final.sku} (${final.state})`, fields: { sku: final.sku } });

      return this.result(run, final, { success: final.sku === target });
    });
  }

  async start(request: LifecycleRequest): Promise<OperationOutcome> {
    return this.execute("start", request.resourceId, null, async (run) => {
      const snapshot = await this.read(run);
      if (isRunning(snapshot)) {
        return this.result(run, snapshot, { message: "already running" });
      }

      await this.resume(run, snapshot);
      if (!request.waitForCompletion) {
        return this.result(run, snapshot, { state: "Resuming", message: "resume requested; completion not confirmed" });
      }

      await this.settle();
      const outcome = await this.wait(run, { kind: "start" }, request.timeoutMs);
      if (outcome.status !== "converged") {
        throw new OperationFailure(
          "Timeout",
          `Capacity ${run.coordinates.capacityName} did not reach a running state within ${minutes(request.timeoutMs)} ` +
            `(last observed ${outcome.snapshot?.state ?? "unknown"})`,
          outcome.snapshot
        );
      }

      return this.result(run, outcome.snapshot);
    });
  }

  async stop(request: LifecycleRequest): Promise<OperationOutcome> {
    return this.execute("stop", request.resourceId, null, async (run) => {
      const snapshot = await this.read(run);
      if (isStopped(snapshot)) {
        return this.result(run, snapshot, { message: "already paused" });
      }

      await this.api.suspend(run.coordinates);
      this.emit({
        level: "info",
        code: "SUSPEND_ISSUED",
        message: `Requested suspend of ${run.coordinates.capacityName} (was ${snapshot.state})`,
        fields: { state: snapshot.state }
      });
      if (!request.waitForCompletion) {
        return this.result(run, snapshot, { state: "Pausing", message: "suspend requested; completion not confirmed" });
      }

      const outcome = await this.wait(run, { kind: "stop" }, request.timeoutMs);
      if (outcome.status === "failed") {
        throw new OperationFailure(
          outcome.timedOut ? "Timeout" : "SuspendFailed",
          `Pausing ${run.coordinates.capacityName} failed: ${outcome.reason}`,
          outcome.snapshot
        );
      }
      if (outcome.status === "timed_out") {
        throw new OperationFailure(
          "Timeout",
          `Capacity ${run.coordinates.capacityName} did not pause within ${minutes(request.timeoutMs)} ` +
            `(last observed ${outcome.snapshot?.state ?? "unknown"})`,
          outcome.snapshot
        );
      }

      return this.result(run, outcome.snapshot);
    });
  }

  private async execute(
    operation: CapacityOperation,
    resourceId: string,
    targetSku: string | null,
    body: (run: Run) => Promise<OperationResult>
  ): Promise<OperationOutcome> {
    let run: Run | null = null;
    try {
      const coordinates = parseResourceId(resourceId, this.providerNamespace);
      run = { operation, coordinates, targetSku, previous: null, last: null };
      return { ok: true, result: await body(run) };
    } catch (e) {
      if (e instanceof OperationFailure) {
        return this.failed(run, e.code, e.message, e.snapshot);
      }
      if (e instanceof CapacityError) {
        return this.failed(run, e.code, e.message, null, e.toFailure());
      }
      throw e;
    }
  }

  private failed(
    run: Run | null,
    code: CapacityErrorCode,
    message: string,
    snapshot: CapacitySnapshot | null,
    failure: CapacityFailure = { code, message }
  ): OperationOutcome {
    this.emit({ level: "error", code: "OPERATION_FAILED", message, fields: { error: code } });

    const basis = snapshot ?? run?.last ?? null;
    const result =
      run && basis ? { ...this.result(run, basis, { success: false, message }), error: true } : null;
    return { ok: false, result, error: failure };
  }

  private async read(run: Run): Promise<CapacitySnapshot> {
    const snapshot = await this.api.get(run.coordinates);
    run.previous ??= snapshot;
    run.last = snapshot;
    this.emit({
      level: "info",
      code: "CAPACITY_READ",
      message: `Capacity ${run.coordinates.capacityName}: ${snapshot.state} at ${snapshot.sku} in ${snapshot.location}`,
      fields: { state: snapshot.state, sku: snapshot.sku, provisioningState: snapshot.provisioningState }
    });
    return snapshot;
  }

  /** Re-read for a failure report; a failing read leaves `fallback` in place. */
  private async rereadBestEffort(run: Run, fallback: CapacitySnapshot): Promise<CapacitySnapshot> {
    try {
      return await this.read(run);
    } catch (e) {
      if (!(e instanceof CapacityError)) throw e;
      this.emit({
        level: "warn",
        code: "REREAD_FAILED",
        message: `Could not re-read capacity after failure: ${e.message}`,
        fields: { error: e.code }
      });
      return fallback;
    }
  }

  private async resume(run: Run, snapshot: CapacitySnapshot): Promise<void> {
    await this.api.resume(run.coordinates);
    this.emit({
      level: "info",
      code: "RESUME_ISSUED",
      message: `Requested resume of ${run.coordinates.capacityName} (was ${snapshot.state})`,
      fields: { state: snapshot.state }
    });
  }

  private async settle(): Promise<void> {
    this.emit({
      level: "info",
      code: "SETTLE_DELAY",
      message: `Waiting ${Math.round(this.settleDelayMs / 1000)}s before polling`,
      fields: { delayMs: this.settleDelayMs }
    });
    await this.clock.sleep(this.settleDelayMs);
  }

  private async wait(run: Run, target: WaitTarget, timeoutMs: number): Promise<WaitOutcome> {
    const outcome = await waitForConvergence(this.api, run.coordinates, {
      target,
      timeoutMs,
      timing: this.timing,
      clock: this.clock,
      emit: this.emit
    });
    if (outcome.snapshot) run.last = outcome.snapshot;
    return outcome;
  }

  private result(
    run: Run,
    snapshot: CapacitySnapshot,
    overrides: { state?: string; success?: boolean; message?: string } = {}
  ): OperationResult {
    const result: OperationResult = {
      operation: run.operation,
      capacityName: run.coordinates.capacityName,
      subscriptionId: run.coordinates.subscriptionId,
      resourceGroup: run.coordinates.resourceGroup,
      region: snapshot.location,
      previousSku: run.previous?.sku ?? snapshot.sku,
      currentSku: snapshot.sku,
      targetSku: run.targetSku ?? snapshot.sku,
      state: overrides.state ?? snapshot.state,
      success: overrides.success ?? true,
      timestamp: new Date(this.clock.now()).toISOString()
    };
    if (overrides.message !== undefined) result.message = overrides.message;
    return result;
  }
}
