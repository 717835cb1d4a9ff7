import { describe, expect, it } from "vitest";
import { expectedResourceIdShape, formatResourceId, parseResourceId } from "../src/arm/resource-id.js";
import { CapacityError } from "../src/types/errors.js";
import { COORDS, RESOURCE_ID } from "./helpers/fake-capacity.js";

function codeOf(fn: () => unknown): string | null {
  try {
    fn();
    return null;
  } catch (e) {
    return e instanceof CapacityError ? e.code : "not a CapacityError";
  }
}

describe("resource locator", () => {
  it("extracts the three coordinates", () => {
    expect(parseResourceId(RESOURCE_ID)).toEqual(COORDS);
  });

  it("matches the fixed segments case-insensitively", () => {
    const id = "/SUBSCRIPTIONS/sub-1/resourcegroups/My-RG/providers/microsoft.fabric/Capacities/CapA";
    expect(parseResourceId(id)).toEqual({ subscriptionId: "sub-1", resourceGroup: "My-RG", capacityName: "CapA" });
  });

  it("does not validate coordinate syntax", () => {
    const id = "/subscriptions/not-a-guid/resourceGroups/rg.with.dots/providers/Microsoft.Fabric/capacities/x";
    expect(parseResourceId(id).subscriptionId).toBe("not-a-guid");
  });

  it("ignores surrounding whitespace", () => {
    expect(parseResourceId(`  ${RESOURCE_ID}\n`)).toEqual(COORDS);
  });

  it.each([
    "",
    "fabcap01",
    "/subscriptions/sub/resourceGroups/rg",
    "/subscriptions/sub/resourceGroups/rg/providers/Microsoft.Fabric/capacities/",
    "/subscriptions/sub/resourceGroups/rg/providers/Microsoft.Fabric/capacities/a/extra",
    "/subscriptions/sub/resourceGroups/rg/providers/Microsoft.PowerBIDedicated/capacities/a",
    "subscriptions/sub/resourceGroups/rg/providers/Microsoft.Fabric/capacities/a",
    "/subscriptions//resourceGroups/rg/providers/Microsoft.Fabric/capacities/a"
  ])("rejects %j with InvalidIdentifier", (id) => {
    expect(codeOf(() => parseResourceId(id))).toBe("InvalidIdentifier");
  });

  it("names the expected shape in the error", () => {
    expect(() => parseResourceId("bad")).toThrow(
      "/subscriptions/{subscriptionId}/resourceGroups/{resourceGroup}/providers/Microsoft.Fabric/capacities/{capacityName}"
    );
  });

  it("honours a different provider namespace", () => {
    const id = "/subscriptions/sub/resourceGroups/rg/providers/Microsoft.PowerBIDedicated/capacities/a";
    expect(parseResourceId(id, "Microsoft.PowerBIDedicated").capacityName).toBe("a");
    expect(expectedResourceIdShape("Microsoft.PowerBIDedicated")).toContain("/providers/Microsoft.PowerBIDedicated/");
  });

  it("formats coordinates back into the same id", () => {
    expect(formatResourceId(COORDS)).toBe(RESOURCE_ID);
  });
});
