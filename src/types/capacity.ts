/** Capacity resource model as read from, and written back to, the management API. */
export const CAPACITY_SKUS = ["F2", "F4", "F8", "F16", "F32", "F64", "F128", "F256", "F512", "F1024"] as const;

export type CapacitySku = (typeof CAPACITY_SKUS)[number];

export function isCapacitySku(value: string): value is CapacitySku {
  return CAPACITY_SKUS.some((sku) => sku === value);
}

export type ResourceCoordinates = {
  subscriptionId: string;
  resourceGroup: string;
  capacityName: string;
};

/** Payload shape accepted by schemas/capacity.schema.json. */
export type ArmCapacityPayload = {
  id?: string;
  name?: string;
  type?: string;
  location: string;
  sku: { name: string; tier?: string };
  properties: { state?: string; provisioningState?: string; [key: string]: unknown };
  tags?: Record<string, string>;
};

export type CapacitySnapshot = {
  coordinates: ResourceCoordinates;
  id: string | null;
  location: string;
  sku: string;
  skuTier: string | null;
  state: string;
  provisioningState: string;
  /** Carried through a resize unmodified. */
  properties: ArmCapacityPayload["properties"];
  tags: Record<string, string> | null;
};

export type ResizeRequestBody = {
  location: string;
  sku: { name: CapacitySku; tier: string };
  properties: ArmCapacityPayload["properties"];
  tags?: Record<string, string>;
};

export type CapacityOperation = "scale" | "start" | "stop";

export type OperationResult = {
  operation: CapacityOperation;
  capacityName: string;
  subscriptionId: string;
  resourceGroup: string;
  region: string;
  previousSku: string;
  currentSku: string;
  targetSku: string;
  state: string;
  success: boolean;
  timestamp: string;
  message?: string;
  error?: boolean;
};
