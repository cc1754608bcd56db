/**
 * Spring configuration resolver: derives which spring positions a coach
 * carries, and how many per bogie, from the spring-type master table.
 *
 * The configuration is an insertion-ordered Map: its order is the column
 * order of every checklist table in the printed report.
 */
import { springPositionKey } from "@spring-shop/shared";
import type { SpringTypeDefinition } from "@spring-shop/shared";

export type SpringConfiguration = Map<string, number>;

export interface SpringPositionEntry {
  name: string;
  key: string;
  quantityPerBogie: number;
}

const DEFAULT_MAX_PER_BOGIE = 4;
const COIL_SECONDARY_POSITIONS = ["Secondary Outer", "Secondary Inner"] as const;
const COIL_SECONDARY_QUANTITY = 2;

export function resolveSpringConfiguration(
  coachType: string,
  secondaryType: string | null | undefined,
  masterSpringTypes: readonly SpringTypeDefinition[]
): SpringConfiguration {
  const config: SpringConfiguration = new Map();
  const secondary = (secondaryType ?? "").trim().toUpperCase();
  const isAirSuspension = secondary.includes("AIR");

  for (const definition of masterSpringTypes) {
    if (!definition.applicableCoachTypes.includes(coachType)) continue;
    // Air-spring coaches carry no secondary coil springs.
    if (isAirSuspension && definition.name.toLowerCase().includes("secondary")) continue;
    config.set(definition.name, definition.maxPerBogie ?? DEFAULT_MAX_PER_BOGIE);
  }

  if (secondary.includes("COIL")) {
    for (const name of COIL_SECONDARY_POSITIONS) {
      if (!config.has(name)) config.set(name, COIL_SECONDARY_QUANTITY);
    }
  }

  return config;
}

export function springConfigurationEntries(config: SpringConfiguration): SpringPositionEntry[] {
  return Array.from(config, ([name, quantityPerBogie]) => ({
    name,
    key: springPositionKey(name),
    quantityPerBogie,
  }));
}

export function springPositionKeys(config: SpringConfiguration): string[] {
  return Array.from(config.keys(), springPositionKey);
}

/**
 * Coach type for report purposes: the stored type wins, otherwise it is
 * guessed from the coach code, LHB when nothing matches.
 */
export function inferCoachType(coachType: string | null | undefined, coachCode: string | null | undefined): string {
  const stored = (coachType ?? "").trim();
  if (stored) return stored;
  const code = (coachCode ?? "").trim().toUpperCase();
  if (code.includes("VB")) return "VB";
  return "LHB";
}
