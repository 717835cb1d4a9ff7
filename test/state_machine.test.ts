import { describe, expect, it } from "vitest";
import {
  classifyLifecycle,
  classifyProvisioning,
  evaluatePoll,
  quotaHint
} from "../src/core/state-machine.js";
import { snapshot } from "./helpers/fake-capacity.js";

describe("lifecycle classification", () => {
  it("sorts known states into families", () => {
    expect(classifyLifecycle("Active")).toEqual({ family: "running", state: "Active" });
    expect(classifyLifecycle("Running")).toEqual({ family: "running", state: "Running" });
    expect(classifyLifecycle("Paused")).toEqual({ family: "stopped", state: "Paused" });
    expect(classifyLifecycle("Resuming")).toEqual({ family: "transitional", state: "Resuming" });
    expect(classifyLifecycle("PreparingForRunning")).toEqual({ family: "transitional", state: "PreparingForRunning" });
    expect(classifyLifecycle("Failed")).toEqual({ family: "failure", state: "Failed" });
    expect(classifyLifecycle("Error")).toEqual({ family: "failure", state: "Error" });
  });

  it("is case-insensitive and normalizes to the canonical spelling", () => {
    expect(classifyLifecycle("active")).toEqual({ family: "running", state: "Active" });
    expect(classifyLifecycle("PAUSED")).toEqual({ family: "stopped", state: "Paused" });
  });

  it("keeps unrecognized states verbatim", () => {
    expect(classifyLifecycle("Migrating")).toEqual({ family: "unknown", state: "Migrating" });
  });

  it("classifies provisioning state", () => {
    expect(classifyProvisioning("Succeeded")).toBe("succeeded");
    expect(classifyProvisioning("failed")).toBe("failed");
    expect(classifyProvisioning("Updating")).toBe("in_progress");
  });
});

describe("evaluatePoll: resize", () => {
  const target = { kind: "resize", sku: "F64" } as const;

  it("converges on target SKU while running", () => {
    expect(evaluatePoll(target, snapshot({ sku: "F64", state: "Active" }))).toEqual({ action: "converged" });
  });

  it("keeps polling when the SKU matches but the capacity is not running yet", () => {
    expect(evaluatePoll(target, snapshot({ sku: "F64", state: "Updating" }))).toEqual({
      action: "continue",
      pace: "normal",
      unrecognized: null
    });
  });

  it("keeps polling while still on the old SKU", () => {
    expect(evaluatePoll(target, snapshot({ sku: "F2", state: "Active" }))).toEqual({
      action: "continue",
      pace: "normal",
      unrecognized: null
    });
  });

  it("fails on a failure-family state with a quota hint", () => {
    expect(evaluatePoll(target, snapshot({ sku: "F2", state: "Failed" }))).toEqual({
      action: "failed",
      reason: "Capacity entered Failed state - may indicate quota limitation"
    });
    expect(quotaHint("Error")).toBe("Capacity entered Error state - may indicate quota limitation");
  });

  it("fails on a Failed provisioning state even while running", () => {
    expect(evaluatePoll(target, snapshot({ sku: "F2", state: "Active", provisioningState: "Failed" }))).toEqual({
      action: "failed",
      reason: "Provisioning state Failed while Active at F2 - may indicate quota limitation"
    });
  });

  it("checks failure before convergence", () => {
    const decision = evaluatePoll(target, snapshot({ sku: "F64", state: "Active", provisioningState: "Failed" }));
    expect(decision.action).toBe("failed");
  });

  it("flags unrecognized states while continuing", () => {
    expect(evaluatePoll(target, snapshot({ state: "Migrating" }))).toEqual({
      action: "continue",
      pace: "normal",
      unrecognized: "Migrating"
    });
  });
});

describe("evaluatePoll: start", () => {
  const target = { kind: "start" } as const;

  it("converges once running", () => {
    expect(evaluatePoll(target, snapshot({ state: "Active" }))).toEqual({ action: "converged" });
  });

  it("polls slowly while paused", () => {
    expect(evaluatePoll(target, snapshot({ state: "Paused" }))).toEqual({
      action: "continue",
      pace: "slow",
      unrecognized: null
    });
  });

  it("polls at the normal pace while transitioning", () => {
    expect(evaluatePoll(target, snapshot({ state: "Resuming" }))).toEqual({
      action: "continue",
      pace: "normal",
      unrecognized: null
    });
  });

  it("never fails, even on a failure-family state", () => {
    expect(evaluatePoll(target, snapshot({ state: "Failed" })).action).toBe("continue");
  });

  it("treats unknown states as still transitioning", () => {
    expect(evaluatePoll(target, snapshot({ state: "Deleting" }))).toEqual({
      action: "continue",
      pace: "normal",
      unrecognized: "Deleting"
    });
  });
});

describe("evaluatePoll: stop", () => {
  const target = { kind: "stop" } as const;

  it("converges once paused", () => {
    expect(evaluatePoll(target, snapshot({ state: "Paused" }))).toEqual({ action: "converged" });
    expect(evaluatePoll(target, snapshot({ state: "Suspended" }))).toEqual({ action: "converged" });
  });

  it("keeps polling while pausing", () => {
    expect(evaluatePoll(target, snapshot({ state: "Pausing" })).action).toBe("continue");
  });

  it("fails on a failure-family state", () => {
    expect(evaluatePoll(target, snapshot({ state: "Error" }))).toEqual({
      action: "failed",
      reason: "Capacity entered Error state while pausing"
    });
  });
});
