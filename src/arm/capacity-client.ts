import type { SchemaRegistry } from "../schema/registry.js";
import type {
  ArmCapacityPayload,
  CapacitySku,
  CapacitySnapshot,
  ResizeRequestBody,
  ResourceCoordinates
} from "../types/capacity.js";
import { CapacityError, type CapacityErrorCode } from "../types/errors.js";
import type { BearerTokenProvider } from "./credential.js";
import { DEFAULT_PROVIDER_NAMESPACE, formatResourceId } from "./resource-id.js";

/** Status Reader and Transition Issuer, as seen by the waiter and the orchestrator. */
export interface CapacityApi {
  get(coordinates: ResourceCoordinates): Promise<CapacitySnapshot>;
  resume(coordinates: ResourceCoordinates): Promise<void>;
  suspend(coordinates: ResourceCoordinates): Promise<void>;
  /** Full-object replace: `base` supplies location, properties and tags unchanged. */
  resize(coordinates: ResourceCoordinates, base: CapacitySnapshot, sku: CapacitySku): Promise<void>;
}

export type CapacityClientOptions = {
  endpoint: string;
  apiVersion: string;
  providerNamespace?: string;
  token: BearerTokenProvider;
  schemas: SchemaRegistry;
  fetchImpl?: typeof fetch;
};

export const DEFAULT_SKU_TIER = "Fabric";

export function buildResizeBody(base: CapacitySnapshot, sku: CapacitySku): ResizeRequestBody {
  const body: ResizeRequestBody = {
    location: base.location,
    sku: { name: sku, tier: base.skuTier ?? DEFAULT_SKU_TIER },
    properties: base.properties
  };
  if (base.tags) body.tags = base.tags;
  return body;
}

export function toSnapshot(coordinates: ResourceCoordinates, payload: ArmCapacityPayload): CapacitySnapshot {
  return {
    coordinates,
    id: payload.id ?? null,
    location: payload.location,
    sku: payload.sku.name,
    skuTier: payload.sku.tier ?? null,
    state: payload.properties.state ?? "Unknown",
    provisioningState: payload.properties.provisioningState ?? "Unknown",
    properties: payload.properties,
    tags: payload.tags ?? null
  };
}

/**
 * Management-API client for one provider namespace. Every call is a single
 * attempt: a rejected or failed request surfaces as a CapacityError carrying
 * the HTTP status and response body.
 */
export class CapacityClient implements CapacityApi {
  private readonly endpoint: string;
  private readonly apiVersion: string;
  private readonly providerNamespace: string;
  private readonly token: BearerTokenProvider;
  private readonly schemas: SchemaRegistry;
  private readonly fetchImpl: typeof fetch;

  constructor(options: CapacityClientOptions) {
    this.endpoint = options.endpoint;
    this.apiVersion = options.apiVersion;
    this.providerNamespace = options.providerNamespace ?? DEFAULT_PROVIDER_NAMESPACE;
    this.token = options.token;
    this.schemas = options.schemas;
    this.fetchImpl = options.fetchImpl ?? fetch;
  }

  urlFor(coordinates: ResourceCoordinates, action?: "resume" | "suspend"): string {
    const resourcePath = formatResourceId(
      {
        subscriptionId: encodeURIComponent(coordinates.subscriptionId),
        resourceGroup: encodeURIComponent(coordinates.resourceGroup),
        capacityName: encodeURIComponent(coordinates.capacityName)
      },
      this.providerNamespace
    );
    const url = new URL(action ? `${resourcePath}/${action}` : resourcePath, this.endpoint);
    url.searchParams.set("api-version", this.apiVersion);
    return url.toString();
  }

  async get(coordinates: ResourceCoordinates): Promise<CapacitySnapshot> {
    const { status, body } = await this.send("StatusFetchFailed", "GET", this.urlFor(coordinates));

    let payload: unknown;
    try {
      payload = JSON.parse(body);
    } catch (e) {
      throw new CapacityError("StatusFetchFailed", `Capacity ${coordinates.capacityName} returned a non-JSON body`, {
        status,
        body,
        cause: e
      });
    }

    const checked = await this.schemas.check<ArmCapacityPayload>("capacity", payload);
    if (!checked.ok) {
      throw new CapacityError(
        "StatusFetchFailed",
        `Capacity ${coordinates.capacityName} returned an unexpected payload: ${checked.errors}`,
        { status, body }
      );
    }
    return toSnapshot(coordinates, checked.value);
  }

  async resume(coordinates: ResourceCoordinates): Promise<void> {
    await this.send("ResumeRejected", "POST", this.urlFor(coordinates, "resume"));
  }

  async suspend(coordinates: ResourceCoordinates): Promise<void> {
    await this.send("SuspendRejected", "POST", this.urlFor(coordinates, "suspend"));
  }

  async resize(coordinates: ResourceCoordinates, base: CapacitySnapshot, sku: CapacitySku): Promise<void> {
    await this.send("ResizeRejected", "PUT", this.urlFor(coordinates), buildResizeBody(base, sku));
  }

  private async send(
    failureCode: CapacityErrorCode,
    method: "GET" | "POST" | "PUT",
    url: string,
    payload?: ResizeRequestBody
  ): Promise<{ status: number; body: string }> {
    const token = await this.token();
    const headers: Record<string, string> = { Authorization: `Bearer ${token}` };
    if (payload !== undefined) headers["Content-Type"] = "application/json";

    let response: Response;
    let body: string;
    try {
      response = await this.fetchImpl(url, {
        method,
        headers,
        body: payload === undefined ? undefined : JSON.stringify(payload)
      });
      body = await response.text();
    } catch (e) {
      const reason = e instanceof Error ? e.message : String(e);
      throw new CapacityError(failureCode, `${method} ${url} failed: ${reason}`, { cause: e });
    }

    if (!response.ok) {
      throw new CapacityError(failureCode, `${method} ${url} returned HTTP ${response.status}`, {
        status: response.status,
        body
      });
    }
    return { status: response.status, body };
  }
}
