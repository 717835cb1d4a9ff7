import { describe, expect, it } from "vitest";
import { waitForConvergence, DEFAULT_POLL_TIMING } from "../src/core/waiter.js";
import { CapacityError } from "../src/types/errors.js";
import { COORDS, ScriptedCapacityApi, VirtualClock, collectEvents, snapshot } from "./helpers/fake-capacity.js";

const MINUTE = 60_000;

describe("convergence waiter: resize", () => {
  it("converges on the first poll that shows target SKU and running, then stops polling", async () => {
    const api = new ScriptedCapacityApi([
      snapshot({ sku: "F2", state: "Updating" }),
      snapshot({ sku: "F64", state: "Active" }),
      snapshot({ sku: "F2", state: "Failed" })
    ]);
    const clock = new VirtualClock();

    const outcome = await waitForConvergence(api, COORDS, {
      target: { kind: "resize", sku: "F64" },
      timeoutMs: 10 * MINUTE,
      timing: DEFAULT_POLL_TIMING,
      clock
    });

    expect(outcome.status).toBe("converged");
    expect(outcome.polls).toBe(2);
    expect(api.methods).toEqual(["get", "get"]);
    expect(clock.sleeps).toEqual([30_000]);
  });

  it("fails immediately on a failure-family state", async () => {
    const api = new ScriptedCapacityApi([snapshot({ sku: "F8", state: "Failed" }), snapshot({ sku: "F16", state: "Active" })]);
    const clock = new VirtualClock();

    const outcome = await waitForConvergence(api, COORDS, {
      target: { kind: "resize", sku: "F16" },
      timeoutMs: 10 * MINUTE,
      timing: DEFAULT_POLL_TIMING,
      clock
    });

    expect(outcome).toMatchObject({
      status: "failed",
      reason: "Capacity entered Failed state - may indicate quota limitation",
      timedOut: false,
      polls: 1
    });
    expect(api.methods).toEqual(["get"]);
    expect(clock.sleeps).toEqual([]);
  });

  it("reports a timeout as a failure naming the last observed state and SKU", async () => {
    const api = new ScriptedCapacityApi([snapshot({ sku: "F8", state: "Updating" })]);
    const clock = new VirtualClock();

    const outcome = await waitForConvergence(api, COORDS, {
      target: { kind: "resize", sku: "F16" },
      timeoutMs: 90_000,
      timing: DEFAULT_POLL_TIMING,
      clock
    });

    expect(outcome).toMatchObject({
      status: "failed",
      reason: "timeout, last observed Updating/F8",
      timedOut: true,
      polls: 3
    });
    expect(clock.sleeps).toEqual([30_000, 30_000, 30_000]);
  });

  it("never converges when no poll matches before the deadline", async () => {
    const api = new ScriptedCapacityApi([snapshot({ sku: "F16", state: "Updating" })]);

    const outcome = await waitForConvergence(api, COORDS, {
      target: { kind: "resize", sku: "F16" },
      timeoutMs: 5 * MINUTE,
      timing: DEFAULT_POLL_TIMING,
      clock: new VirtualClock()
    });

    expect(outcome.status).toBe("failed");
    expect(outcome.polls).toBe(10);
  });

  it("checks the deadline before the first poll", async () => {
    const api = new ScriptedCapacityApi([snapshot()]);

    const outcome = await waitForConvergence(api, COORDS, {
      target: { kind: "resize", sku: "F16" },
      timeoutMs: 0,
      timing: DEFAULT_POLL_TIMING,
      clock: new VirtualClock()
    });

    expect(outcome).toMatchObject({ status: "failed", reason: "timeout, last observed unknown/unknown", polls: 0 });
    expect(api.calls).toEqual([]);
  });

  it("propagates read failures", async () => {
    const api = new ScriptedCapacityApi([
      new CapacityError("StatusFetchFailed", "GET returned HTTP 500", { status: 500, body: "boom" })
    ]);

    await expect(
      waitForConvergence(api, COORDS, {
        target: { kind: "resize", sku: "F16" },
        timeoutMs: MINUTE,
        timing: DEFAULT_POLL_TIMING,
        clock: new VirtualClock()
      })
    ).rejects.toMatchObject({ code: "StatusFetchFailed", status: 500 });
  });
});

describe("convergence waiter: start", () => {
  it("polls every 60s while paused and every 30s while resuming", async () => {
    const api = new ScriptedCapacityApi([
      snapshot({ state: "Paused" }),
      snapshot({ state: "Resuming" }),
      snapshot({ state: "Active" })
    ]);
    const clock = new VirtualClock();

    const outcome = await waitForConvergence(api, COORDS, {
      target: { kind: "start" },
      timeoutMs: 10 * MINUTE,
      timing: DEFAULT_POLL_TIMING,
      clock
    });

    expect(outcome.status).toBe("converged");
    expect(clock.sleeps).toEqual([60_000, 30_000]);
  });

  it("times out without failing", async () => {
    const api = new ScriptedCapacityApi([snapshot({ state: "Paused" })]);

    const outcome = await waitForConvergence(api, COORDS, {
      target: { kind: "start" },
      timeoutMs: 2 * MINUTE,
      timing: DEFAULT_POLL_TIMING,
      clock: new VirtualClock()
    });

    expect(outcome.status).toBe("timed_out");
    expect(outcome.polls).toBe(2);
    expect(outcome.snapshot?.state).toBe("Paused");
  });

  it("keeps waiting through a failure-family state", async () => {
    const api = new ScriptedCapacityApi([snapshot({ state: "Failed" }), snapshot({ state: "Active" })]);

    const outcome = await waitForConvergence(api, COORDS, {
      target: { kind: "start" },
      timeoutMs: 10 * MINUTE,
      timing: DEFAULT_POLL_TIMING,
      clock: new VirtualClock()
    });

    expect(outcome.status).toBe("converged");
    expect(outcome.polls).toBe(2);
  });

  it("warns about unrecognized states and keeps polling", async () => {
    const api = new ScriptedCapacityApi([snapshot({ state: "Migrating" }), snapshot({ state: "Running" })]);
    const { events, emit } = collectEvents();

    await waitForConvergence(api, COORDS, {
      target: { kind: "start" },
      timeoutMs: 10 * MINUTE,
      timing: DEFAULT_POLL_TIMING,
      clock: new VirtualClock(),
      emit
    });

    const warning = events.find((e) => e.code === "UNRECOGNIZED_STATE");
    expect(warning?.level).toBe("warn");
    expect(warning?.fields).toEqual({ state: "Migrating" });
    expect(events.map((e) => e.code)).toEqual(["POLL", "UNRECOGNIZED_STATE", "POLL", "WAIT_CONVERGED"]);
  });
});

describe("convergence waiter: stop", () => {
  it("converges once paused", async () => {
    const api = new ScriptedCapacityApi([snapshot({ state: "Pausing" }), snapshot({ state: "Paused" })]);

    const outcome = await waitForConvergence(api, COORDS, {
      target: { kind: "stop" },
      timeoutMs: 10 * MINUTE,
      timing: { pollIntervalMs: 5_000, stoppedPollIntervalMs: 10_000 },
      clock: new VirtualClock()
    });

    expect(outcome).toMatchObject({ status: "converged", polls: 2 });
  });
});
