import { Command, CommanderError, InvalidArgumentError } from "commander";
import { scale } from "./commands/scale.js";
import { start, stop } from "./commands/lifecycle.js";
import { status } from "./commands/status.js";
import type { CommandDeps, CommandOpts } from "./commands/context.js";
import { EXIT, type ExitCode } from "./commands/exit-codes.js";
import {
  createEventWriter,
  isOutputFormat,
  processStreams,
  writeCommandOutput,
  type OutputFormat,
  type OutputStreams
} from "./commands/output.js";
import { CAPACITY_SKUS } from "./types/capacity.js";

type CommonCliOpts = {
  resourceId: string;
  config?: string;
  env?: string;
  wait?: boolean;
  timeout?: number;
  format: OutputFormat;
};

export type CliDeps = CommandDeps & { streams?: OutputStreams };

function parsePositiveInt(value: string): number {
  const n = Number(value);
  if (!/^\d+$/.test(value.trim()) || !Number.isSafeInteger(n) || n <= 0) {
    throw new InvalidArgumentError("must be a positive whole number of minutes");
  }
  return n;
}

function parseFormat(value: string): OutputFormat {
  if (!isOutputFormat(value)) {
    throw new InvalidArgumentError("expected human or jsonl");
  }
  return value;
}

function toCommandOpts(opts: CommonCliOpts): CommandOpts {
  return {
    resourceId: opts.resourceId,
    configDir: opts.config,
    env: opts.env,
    wait: opts.wait,
    timeoutMinutes: opts.timeout
  };
}

function withCommonOptions(cmd: Command, transition: boolean): Command {
  cmd
    .requiredOption("--resource-id <id>", "Capacity resource id (/subscriptions/.../capacities/<name>)")
    .option("--config <path>", "Path to config directory (default: bundled config)")
    .option("--env <name>", "Config layer to apply over base.yaml, e.g. usgov")
    .option("--format <format>", "Output format: human|jsonl", parseFormat, "human");
  if (transition) {
    cmd
      .option("--wait", "Wait for the transition to complete (config default)")
      .option("--no-wait", "Return once the transition is accepted")
      .option("--timeout <minutes>", "Wait timeout in minutes (config default: 10)", parsePositiveInt);
  }
  return cmd;
}

/**
 * Parse `argv` and run one command. Resolves to the process exit code;
 * commander's own usage errors map to INVALID_ARGS, help and version to SUCCESS.
 */
export async function run(argv: string[], deps: CliDeps = {}): Promise<ExitCode> {
  const streams = deps.streams ?? processStreams;
  let exitCode: ExitCode = EXIT.SUCCESS;

  const program = new Command();

  program
    .name("capacityctl")
    .description("Scale, start, stop and inspect a Fabric capacity")
    .version("0.1.0")
    .exitOverride()
    .configureOutput({
      writeOut: (text) => streams.out(text.trimEnd()),
      writeErr: (text) => streams.err(text.trimEnd())
    });

  withCommonOptions(
    program
      .command("scale")
      .description("Resize the capacity to a target SKU, resuming it first if needed")
      .requiredOption("--sku <sku>", `Target SKU: ${CAPACITY_SKUS.join("|")}`),
    true
  ).action(async (opts: CommonCliOpts & { sku: string }) => {
    const res = await scale({ ...toCommandOpts(opts), sku: opts.sku }, { ...deps, emit: createEventWriter(opts.format, streams) });
    writeCommandOutput(res.result, res.ok ? null : res.error, opts.format, streams);
    exitCode = res.exitCode;
  });

  withCommonOptions(program.command("start").description("Resume the capacity"), true).action(
    async (opts: CommonCliOpts) => {
      const res = await start(toCommandOpts(opts), { ...deps, emit: createEventWriter(opts.format, streams) });
      writeCommandOutput(res.result, res.ok ? null : res.error, opts.format, streams);
      exitCode = res.exitCode;
    }
  );

  withCommonOptions(program.command("stop").description("Suspend the capacity"), true).action(
    async (opts: CommonCliOpts) => {
      const res = await stop(toCommandOpts(opts), { ...deps, emit: createEventWriter(opts.format, streams) });
      writeCommandOutput(res.result, res.ok ? null : res.error, opts.format, streams);
      exitCode = res.exitCode;
    }
  );

  withCommonOptions(program.command("status").description("Show the capacity's SKU and lifecycle state"), false).action(
    async (opts: CommonCliOpts) => {
      const res = await status(toCommandOpts(opts), deps);
      writeCommandOutput(res.ok ? res.status : null, res.ok ? null : res.error, opts.format, streams);
      exitCode = res.exitCode;
    }
  );

  try {
    await program.parseAsync(argv);
  } catch (err) {
    if (err instanceof CommanderError) {
      return err.exitCode === 0 ? EXIT.SUCCESS : EXIT.INVALID_ARGS;
    }
    throw err;
  }
  return exitCode;
}
