import { CapacityClient, type CapacityApi } from "../arm/capacity-client.js";
import { bearerTokenProvider, createCredential } from "../arm/credential.js";
import { parseResourceId } from "../arm/resource-id.js";
import { loadConfig } from "../config/loader.js";
import type { Clock } from "../core/clock.js";
import type { EventSink } from "../core/events.js";
import { CapacityOrchestrator, type OperationOutcome } from "../core/orchestrator.js";
import { createRegistry } from "../schema/registry.js";
import type { OperationResult, ResourceCoordinates } from "../types/capacity.js";
import type { CapacityCtlConfig } from "../types/config.js";
import { CapacityError, type CapacityErrorCode, type CapacityFailure } from "../types/errors.js";
import { EXIT, exitCodeFor, type ExitCode } from "./exit-codes.js";

export type CommandOpts = {
  resourceId: string;
  configDir?: string;
  env?: string;
  wait?: boolean;
  timeoutMinutes?: number;
};

/** Seams for tests and embedding: anything left out is built from config. */
export type CommandDeps = {
  api?: CapacityApi;
  clock?: Clock;
  emit?: EventSink;
  processEnv?: NodeJS.ProcessEnv;
};

export type CommandFailure = {
  ok: false;
  result: OperationResult | null;
  error: CapacityFailure;
  exitCode: ExitCode;
};

export type CapacityCommandResult = { ok: true; result: OperationResult; exitCode: typeof EXIT.SUCCESS } | CommandFailure;

export type CommandContext = {
  config: CapacityCtlConfig;
  coordinates: ResourceCoordinates;
  api: CapacityApi;
  orchestrator: CapacityOrchestrator;
  waitForCompletion: boolean;
  timeoutMs: number;
};

export function commandFailure(code: CapacityErrorCode, message: string, result: OperationResult | null = null): CommandFailure {
  return { ok: false, result, error: { code, message }, exitCode: exitCodeFor(code) };
}

export function fromOutcome(outcome: OperationOutcome): CapacityCommandResult {
  if (outcome.ok) return { ok: true, result: outcome.result, exitCode: EXIT.SUCCESS };
  return { ok: false, result: outcome.result, error: outcome.error, exitCode: exitCodeFor(outcome.error.code) };
}

async function buildClient(config: CapacityCtlConfig, env: NodeJS.ProcessEnv): Promise<CapacityApi> {
  const credential = createCredential(config.credential_method, env);
  return new CapacityClient({
    endpoint: config.management_endpoint,
    apiVersion: config.api_version,
    providerNamespace: config.provider_namespace,
    token: bearerTokenProvider(credential, config.token_scope),
    schemas: await createRegistry()
  });
}

/** Load config and assemble the client and orchestrator for one invocation. */
export async function prepare(
  opts: CommandOpts,
  deps: CommandDeps = {}
): Promise<{ ok: true; context: CommandContext } | CommandFailure> {
  const env = deps.processEnv ?? process.env;
  const loaded = await loadConfig(opts.env, opts.configDir, env);
  if (!loaded.ok) return commandFailure("InvalidConfig", loaded.error);
  const config = loaded.config;

  const timeoutMinutes = opts.timeoutMinutes ?? config.defaults.timeout_minutes;
  if (!Number.isInteger(timeoutMinutes) || timeoutMinutes <= 0) {
    return commandFailure("InvalidArgument", `Timeout must be a positive whole number of minutes, got ${timeoutMinutes}`);
  }

  let coordinates: ResourceCoordinates;
  let api: CapacityApi;
  try {
    coordinates = parseResourceId(opts.resourceId, config.provider_namespace);
    api = deps.api ?? (await buildClient(config, env));
  } catch (e) {
    if (e instanceof CapacityError) return commandFailure(e.code, e.message);
    throw e;
  }

  const orchestrator = new CapacityOrchestrator(api, {
    providerNamespace: config.provider_namespace,
    timing: {
      pollIntervalMs: config.polling.interval_seconds * 1000,
      stoppedPollIntervalMs: config.polling.stopped_interval_seconds * 1000
    },
    settleDelayMs: config.polling.settle_delay_seconds * 1000,
    clock: deps.clock,
    emit: deps.emit
  });

  return {
    ok: true,
    context: {
      config,
      coordinates,
      api,
      orchestrator,
      waitForCompletion: opts.wait ?? config.defaults.wait_for_completion,
      timeoutMs: timeoutMinutes * 60_000
    }
  };
}
