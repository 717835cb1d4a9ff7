import type { ResourceCoordinates } from "../types/capacity.js";
import { CapacityError } from "../types/errors.js";

export const DEFAULT_PROVIDER_NAMESPACE = "Microsoft.Fabric";

export function expectedResourceIdShape(providerNamespace: string = DEFAULT_PROVIDER_NAMESPACE): string {
  return `/subscriptions/{subscriptionId}/resourceGroups/{resourceGroup}/providers/${providerNamespace}/capacities/{capacityName}`;
}

function escapeRegExp(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\]/g, "\\$&");
}

/**
 * Split a capacity resource id into its coordinates. Fixed segments match
 * case-insensitively; the coordinates themselves are returned as written and
 * left for the management API to judge.
 */
export function parseResourceId(
  resourceId: string,
  providerNamespace: string = DEFAULT_PROVIDER_NAMESPACE
): ResourceCoordinates {
  const pattern = new RegExp(
    `^/subscriptions/([^/]+)/resourceGroups/([^/]+)/providers/${escapeRegExp(providerNamespace)}/capacities/([^/]+)$`,
    "i"
  );
  const m = pattern.exec(resourceId.trim());
  if (!m) {
    throw new CapacityError(
      "InvalidIdentifier",
      `Invalid capacity resource id "${resourceId}". Expected ${expectedResourceIdShape(providerNamespace)}`
    );
  }
  return { subscriptionId: m[1], resourceGroup: m[2], capacityName: m[3] };
}

export function formatResourceId(
  coordinates: ResourceCoordinates,
  providerNamespace: string = DEFAULT_PROVIDER_NAMESPACE
): string {
  return (
    `/subscriptions/${coordinates.subscriptionId}` +
    `/resourceGroups/${coordinates.resourceGroup}` +
    `/providers/${providerNamespace}/capacities/${coordinates.capacityName}`
  );
}
