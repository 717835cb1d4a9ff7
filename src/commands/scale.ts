import { CAPACITY_SKUS, isCapacitySku } from "../types/capacity.js";
import { commandFailure, fromOutcome, prepare, type CapacityCommandResult, type CommandDeps, type CommandOpts } from "./context.js";

export type ScaleOpts = CommandOpts & { sku: string };

export async function scale(opts: ScaleOpts, deps: CommandDeps = {}): Promise<CapacityCommandResult> {
  const sku = opts.sku.trim().toUpperCase();
  if (!isCapacitySku(sku)) {
    return commandFailure("InvalidSku", `Invalid SKU "${opts.sku}". Expected one of: ${CAPACITY_SKUS.join(", ")}`);
  }

  const prepared = await prepare(opts, deps);
  if (!prepared.ok) return prepared;
  const { orchestrator, waitForCompletion, timeoutMs } = prepared.context;

  return fromOutcome(
    await orchestrator.scale({ resourceId: opts.resourceId, targetSku: sku, waitForCompletion, timeoutMs })
  );
}
