import fs from "node:fs";
import path from "node:path";
import { fileURLToPath } from "node:url";
import YAML from "yaml";
import type { CapacityCtlConfig } from "../types/config.js";
import { validateConfig } from "./validator.js";

export const DEFAULT_CONFIG_DIR = path.resolve(path.dirname(fileURLToPath(import.meta.url)), "../../config");

export const ENV_PREFIX = "CAPACITYCTL_";

const LAYER_NAME = /^[\w-]+$/;

export type ConfigLoadResult =
  | { ok: true; config: CapacityCtlConfig }
  | { ok: false; error: string };

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return value !== null && typeof value === "object" && !Array.isArray(value);
}

/**
 * Deep merge two objects. `override` values take precedence.
 * Arrays are replaced, not concatenated.
 */
function deepMerge(base: Record<string, unknown>, override: Record<string, unknown>): Record<string, unknown> {
  const result: Record<string, unknown> = { ...base };
  for (const [key, val] of Object.entries(override)) {
    if (isPlainObject(val)) {
      const current = result[key];
      result[key] = deepMerge(isPlainObject(current) ? current : {}, val);
    } else if (val !== undefined && val !== null) {
      result[key] = val;
    }
  }
  return result;
}

/** Load a YAML file and return the parsed mapping, or an empty object if not found. */
function loadYaml(filePath: string): Record<string, unknown> {
  if (!fs.existsSync(filePath)) return {};
  const parsed: unknown = YAML.parse(fs.readFileSync(filePath, "utf8"));
  if (parsed === null || parsed === undefined) return {};
  if (!isPlainObject(parsed)) {
    throw new Error(`Config file is not a mapping: ${filePath}`);
  }
  return parsed;
}

/** Apply CAPACITYCTL_ prefixed environment variable overrides to top-level keys. */
function applyEnvOverrides(config: Record<string, unknown>, env: NodeJS.ProcessEnv): Record<string, unknown> {
  const result = { ...config };
  for (const [key, value] of Object.entries(env)) {
    if (!key.startsWith(ENV_PREFIX) || value === undefined) continue;
    // CAPACITYCTL_API_VERSION → api_version
    result[key.slice(ENV_PREFIX.length).toLowerCase()] = value;
  }
  return result;
}

/**
 * Load layered config: base.yaml ← {envName}.yaml ← environment variables,
 * then validate the merged result.
 *
 * @param envName - Optional layer name, e.g. "usgov" loads `config/usgov.yaml`.
 */
export async function loadConfig(
  envName?: string,
  configDir?: string,
  env: NodeJS.ProcessEnv = process.env
): Promise<ConfigLoadResult> {
  const dir = configDir ?? DEFAULT_CONFIG_DIR;
  if (envName !== undefined && !LAYER_NAME.test(envName)) {
    return { ok: false, error: `Invalid config layer name "${envName}": use letters, digits, "_" or "-"` };
  }

  let merged: Record<string, unknown>;
  try {
    merged = loadYaml(path.join(dir, "base.yaml"));
    if (envName) {
      merged = deepMerge(merged, loadYaml(path.join(dir, `${envName}.yaml`)));
    }
  } catch (e) {
    return { ok: false, error: e instanceof Error ? e.message : String(e) };
  }

  merged = applyEnvOverrides(merged, env);

  const checked = await validateConfig(merged);
  if (!checked.valid) {
    return { ok: false, error: `Invalid configuration: ${checked.errors}` };
  }
  return { ok: true, config: checked.config };
}
