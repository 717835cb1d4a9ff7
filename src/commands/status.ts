import { classifyLifecycle, type LifecycleFamily } from "../core/state-machine.js";
import { CapacityError } from "../types/errors.js";
import { EXIT } from "./exit-codes.js";
import { commandFailure, prepare, type CommandDeps, type CommandFailure, type CommandOpts } from "./context.js";

export type CapacityStatus = {
  capacityName: string;
  subscriptionId: string;
  resourceGroup: string;
  region: string;
  sku: string;
  state: string;
  lifecycleFamily: LifecycleFamily;
  provisioningState: string;
};

export type StatusResult = { ok: true; status: CapacityStatus; exitCode: typeof EXIT.SUCCESS } | CommandFailure;

/** Read-only: report what the management API says about the capacity. */
export async function status(opts: CommandOpts, deps: CommandDeps = {}): Promise<StatusResult> {
  const prepared = await prepare(opts, deps);
  if (!prepared.ok) return prepared;
  const { api, coordinates } = prepared.context;

  try {
    const snapshot = await api.get(coordinates);
    return {
      ok: true,
      exitCode: EXIT.SUCCESS,
      status: {
        ...coordinates,
        region: snapshot.location,
        sku: snapshot.sku,
        state: snapshot.state,
        lifecycleFamily: classifyLifecycle(snapshot.state).family,
        provisioningState: snapshot.provisioningState
      }
    };
  } catch (e) {
    if (!(e instanceof CapacityError)) throw e;
    const failure = commandFailure(e.code, e.message);
    return { ...failure, error: e.toFailure() };
  }
}
