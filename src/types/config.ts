/** Configuration types: base.yaml ← {env}.yaml ← CAPACITYCTL_* variables. */
export type CredentialMethod = "default" | "cli" | "managed-identity" | "service-principal";

export type PollingConfig = {
  interval_seconds: number;
  stopped_interval_seconds: number;
  settle_delay_seconds: number;
};

export type DefaultsConfig = {
  timeout_minutes: number;
  wait_for_completion: boolean;
};

export type CapacityCtlConfig = {
  schema_version: string;
  management_endpoint: string;
  api_version: string;
  provider_namespace: string;
  token_scope: string;
  credential_method: CredentialMethod;
  polling: PollingConfig;
  defaults: DefaultsConfig;
};
