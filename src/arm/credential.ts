import {
  AzureCliCredential,
  ClientSecretCredential,
  DefaultAzureCredential,
  ManagedIdentityCredential,
  type TokenCredential
} from "@azure/identity";
import type { CredentialMethod } from "../types/config.js";
import { CapacityError } from "../types/errors.js";

/** Explicit bearer-token capability handed to the management-API client. */
export type BearerTokenProvider = () => Promise<string>;

export function createCredential(method: CredentialMethod, env: NodeJS.ProcessEnv = process.env): TokenCredential {
  switch (method) {
    case "cli":
      return new AzureCliCredential();

    case "managed-identity": {
      const clientId = env.AZURE_CLIENT_ID;
      return clientId ? new ManagedIdentityCredential({ clientId }) : new ManagedIdentityCredential();
    }

    case "service-principal": {
      const tenantId = env.AZURE_TENANT_ID;
      const clientId = env.AZURE_CLIENT_ID;
      const clientSecret = env.AZURE_CLIENT_SECRET;
      if (!tenantId || !clientId || !clientSecret) {
        throw new CapacityError(
          "CredentialUnavailable",
          "Service principal auth requires AZURE_TENANT_ID, AZURE_CLIENT_ID, and AZURE_CLIENT_SECRET"
        );
      }
      return new ClientSecretCredential(tenantId, clientId, clientSecret);
    }

    case "default":
      return new DefaultAzureCredential();
  }
}

/**
 * Wrap a credential as a token provider for one scope. Called once per
 * request; the credential's own cache decides when to refresh.
 */
export function bearerTokenProvider(credential: TokenCredential, scope: string): BearerTokenProvider {
  return async () => {
    let token: Awaited<ReturnType<TokenCredential["getToken"]>>;
    try {
      token = await credential.getToken(scope);
    } catch (e) {
      const reason = e instanceof Error ? e.message : String(e);
      throw new CapacityError("CredentialUnavailable", `Failed to acquire token for ${scope}: ${reason}`, { cause: e });
    }
    if (!token) {
      throw new CapacityError("CredentialUnavailable", `Credential returned no token for ${scope}`);
    }
    return token.token;
  };
}
