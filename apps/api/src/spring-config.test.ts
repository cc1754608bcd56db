import { describe, expect, it } from "vitest";
import type { SpringTypeDefinition } from "@spring-shop/shared";
import {
  inferCoachType,
  resolveSpringConfiguration,
  springConfigurationEntries,
  springPositionKeys,
} from "./spring-config";

const masterSpringTypes: SpringTypeDefinition[] = [
  { id: 1, name: "Primary", applicableCoachTypes: ["VB", "LHB"], maxPerBogie: null },
  { id: 2, name: "Secondary Outer", applicableCoachTypes: ["VB"], maxPerBogie: 2 },
  { id: 3, name: "Anti Roll Bar Spring", applicableCoachTypes: ["LHB"], maxPerBogie: 2 },
];

describe("resolveSpringConfiguration", () => {
  it("drops secondary positions for air suspension", () => {
    const config = resolveSpringConfiguration("VB", "Air Spring", masterSpringTypes);
    expect(Array.from(config)).toEqual([["Primary", 4]]);
  });

  it("adds both coil secondary positions when the master data has none", () => {
    const config = resolveSpringConfiguration("VB", " coil spring ", []);
    expect(Array.from(config)).toEqual([
      ["Secondary Outer", 2],
      ["Secondary Inner", 2],
    ]);
  });

  it("keeps the master quantity of a coil secondary already present", () => {
    const withOuter: SpringTypeDefinition[] = [
      { id: 1, name: "Secondary Outer", applicableCoachTypes: ["VB"], maxPerBogie: 3 },
    ];
    const config = resolveSpringConfiguration("VB", "COIL", withOuter);
    expect(config.get("Secondary Outer")).toBe(3);
    expect(config.get("Secondary Inner")).toBe(2);
  });

  it("keeps master order and filters by coach type", () => {
    const config = resolveSpringConfiguration("LHB", "", masterSpringTypes);
    expect(Array.from(config.keys())).toEqual(["Primary", "Anti Roll Bar Spring"]);
  });

  it("returns an empty configuration for an unknown coach type", () => {
    expect(resolveSpringConfiguration("EMU", "Air Spring", masterSpringTypes).size).toBe(0);
  });

  it("is deterministic for identical input", () => {
    const first = resolveSpringConfiguration("VB", "Coil", masterSpringTypes);
    const second = resolveSpringConfiguration("VB", "Coil", masterSpringTypes);
    expect(Array.from(second)).toEqual(Array.from(first));
  });
});

describe("springConfigurationEntries", () => {
  it("exposes names, keys and quantities in configuration order", () => {
    const config = resolveSpringConfiguration("LHB", null, masterSpringTypes);
    expect(springConfigurationEntries(config)).toEqual([
      { name: "Primary", key: "primary", quantityPerBogie: 4 },
      { name: "Anti Roll Bar Spring", key: "antirollbarspring", quantityPerBogie: 2 },
    ]);
    expect(springPositionKeys(config)).toEqual(["primary", "antirollbarspring"]);
  });
});

describe("inferCoachType", () => {
  it("prefers the stored coach type", () => {
    expect(inferCoachType("VB", "LWSCN")).toBe("VB");
  });

  it("guesses from the coach code when the type is blank", () => {
    expect(inferCoachType("", "gs-vb-01")).toBe("VB");
    expect(inferCoachType(null, "LWACCN")).toBe("LHB");
    expect(inferCoachType(undefined, "GSCN")).toBe("LHB");
  });
});
