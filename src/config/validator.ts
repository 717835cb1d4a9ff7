import { loadAjv } from "../schema/ajv.js";
import type { CapacityCtlConfig } from "../types/config.js";

const CONFIG_SCHEMA = {
  type: "object",
  required: [
    "schema_version",
    "management_endpoint",
    "api_version",
    "provider_namespace",
    "token_scope",
    "credential_method",
    "polling",
    "defaults"
  ],
  properties: {
    schema_version: { type: "string", minLength: 1 },
    management_endpoint: { type: "string", format: "uri", pattern: "^https://" },
    api_version: { type: "string", pattern: "^\\d{4}-\\d{2}-\\d{2}(-preview)?$" },
    provider_namespace: { type: "string", minLength: 1 },
    token_scope: { type: "string", minLength: 1 },
    credential_method: { type: "string", enum: ["default", "cli", "managed-identity", "service-principal"] },
    polling: {
      type: "object",
      required: ["interval_seconds", "stopped_interval_seconds", "settle_delay_seconds"],
      properties: {
        interval_seconds: { type: "integer", minimum: 1 },
        stopped_interval_seconds: { type: "integer", minimum: 1 },
        settle_delay_seconds: { type: "integer", minimum: 0 }
      }
    },
    defaults: {
      type: "object",
      required: ["timeout_minutes", "wait_for_completion"],
      properties: {
        timeout_minutes: { type: "integer", minimum: 1 },
        wait_for_completion: { type: "boolean" }
      }
    }
  }
};

export type ConfigValidationResult =
  | { valid: true; config: CapacityCtlConfig; errors: null }
  | { valid: false; errors: string };

/** Validate a merged config object against the config schema. */
export async function validateConfig(config: unknown): Promise<ConfigValidationResult> {
  const ajv = await loadAjv();
  const validate = ajv.compile<CapacityCtlConfig>(CONFIG_SCHEMA);
  if (validate(config)) {
    return { valid: true, config, errors: null };
  }
  return { valid: false, errors: ajv.errorsText(validate.errors) };
}
