import { fromOutcome, prepare, type CapacityCommandResult, type CommandDeps, type CommandOpts } from "./context.js";

/** Resume the capacity and, unless told not to, wait for it to run. */
export async function start(opts: CommandOpts, deps: CommandDeps = {}): Promise<CapacityCommandResult> {
  const prepared = await prepare(opts, deps);
  if (!prepared.ok) return prepared;
  const { orchestrator, waitForCompletion, timeoutMs } = prepared.context;
  return fromOutcome(await orchestrator.start({ resourceId: opts.resourceId, waitForCompletion, timeoutMs }));
}

/** Suspend the capacity and, unless told not to, wait for it to pause. */
export async function stop(opts: CommandOpts, deps: CommandDeps = {}): Promise<CapacityCommandResult> {
  const prepared = await prepare(opts, deps);
  if (!prepared.ok) return prepared;
  const { orchestrator, waitForCompletion, timeoutMs } = prepared.context;
  return fromOutcome(await orchestrator.stop({ resourceId: opts.resourceId, waitForCompletion, timeoutMs }));
}
