import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";

vi.mock("./db", () => ({ query: vi.fn(), getClient: vi.fn() }));

import { query } from "./db";
import { queryResult } from "./db.test-helpers";
import {
  defectCodeToName,
  emptyMasterData,
  inspectorName,
  loadMasterData,
  MasterDataCache,
  type MasterDataSnapshot,
} from "./master-data";

function snapshotWith(overrides: Partial<MasterDataSnapshot>): MasterDataSnapshot {
  return { ...emptyMasterData(new Date(0)), ...overrides };
}

describe("loadMasterData", () => {
  beforeEach(() => {
    vi.mocked(query).mockReset();
  });

  it("maps master tables and keeps only active activities of known kinds", async () => {
    vi.mocked(query)
      .mockResolvedValueOnce(
        queryResult([
          { id: 1, spring_type: "Primary", coach_types: ["VB", "LHB"], max_per_bogie: null },
          { id: 2, spring_type: "Secondary Outer", coach_types: null, max_per_bogie: 2 },
        ])
      )
      .mockResolvedValueOnce(queryResult([{ defect_code: "BRK", defect_name: "Broken" }]))
      .mockResolvedValueOnce(
        queryResult([
          { id: 10, activity_text: "Check cracks", activity_type: "VISUAL_INSPECTION", sequence_number: 1, is_active: true },
          { id: 11, activity_text: "Measure height", activity_type: "MUST_DO", sequence_number: 2, is_active: true },
          { id: 12, activity_text: "Retired", activity_type: "MUST_DO", sequence_number: 3, is_active: false },
          { id: 13, activity_text: "Unknown", activity_type: "OTHER", sequence_number: 4, is_active: true },
        ])
      )
      .mockResolvedValueOnce(queryResult([{ id: 3, name: "A. Kumar" }]));

    const snapshot = await loadMasterData();

    expect(snapshot.springTypes).toEqual([
      { id: 1, name: "Primary", applicableCoachTypes: ["VB", "LHB"], maxPerBogie: null },
      { id: 2, name: "Secondary Outer", applicableCoachTypes: [], maxPerBogie: 2 },
    ]);
    expect(snapshot.defectTypes).toEqual([{ code: "BRK", name: "Broken" }]);
    expect(snapshot.visualActivities.map((activity) => activity.id)).toEqual([10]);
    expect(snapshot.mustDoActivities).toEqual([
      { id: 11, text: "Measure height", sequenceNumber: 2, kind: "MUST_DO", active: true },
    ]);
    expect(snapshot.inspectors).toEqual([{ id: 3, name: "A. Kumar" }]);
    expect(vi.mocked(query).mock.calls[3][0]).toBe(
      "SELECT id, name FROM inspectors WHERE is_active = true ORDER BY name"
    );
  });
});

describe("MasterDataCache", () => {
  let clock = 0;
  const now = () => clock;

  beforeEach(() => {
    clock = 1_000;
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  it("serves the cached snapshot until the ttl passes", async () => {
    const loader = vi.fn(async () => snapshotWith({ inspectors: [{ id: 1, name: "A" }] }));
    const cache = new MasterDataCache({ ttlMs: 500, loader, now });

    await cache.get();
    clock += 499;
    await cache.get();
    expect(loader).toHaveBeenCalledTimes(1);

    clock += 1;
    await cache.get();
    expect(loader).toHaveBeenCalledTimes(2);
  });

  it("reloads on refresh", async () => {
    const loader = vi.fn(async () => snapshotWith({}));
    const cache = new MasterDataCache({ ttlMs: 60_000, loader, now });
    await cache.get();
    await cache.refresh();
    expect(loader).toHaveBeenCalledTimes(2);
  });

  it("shares one load between concurrent callers", async () => {
    const loader = vi.fn(async () => snapshotWith({}));
    const cache = new MasterDataCache({ ttlMs: 60_000, loader, now });
    await Promise.all([cache.get(), cache.get(), cache.refresh()]);
    expect(loader).toHaveBeenCalledTimes(1);
  });

  it("reports a load failure with an empty snapshot and retries next time", async () => {
    vi.spyOn(console, "error").mockImplementation(() => undefined);
    const loader = vi
      .fn<() => Promise<MasterDataSnapshot>>()
      .mockRejectedValueOnce(new Error("connection refused"))
      .mockResolvedValueOnce(snapshotWith({ defectTypes: [{ code: "BRK", name: "Broken" }] }));
    const cache = new MasterDataCache({ ttlMs: 60_000, loader, now });

    const failed = await cache.get();
    expect(failed.error).toBe("MASTER_DATA_UNAVAILABLE: connection refused");
    expect(failed.snapshot.springTypes).toEqual([]);

    const recovered = await cache.get();
    expect(recovered.error).toBeNull();
    expect(recovered.snapshot.defectTypes).toHaveLength(1);
  });
});

describe("lookups", () => {
  const snapshot = snapshotWith({
    defectTypes: [
      { code: "BRK", name: "Broken" },
      { code: "CRK", name: "Cracked" },
    ],
    inspectors: [{ id: 7, name: "S. Rao" }],
  });

  it("maps defect codes to names", () => {
    expect(Array.from(defectCodeToName(snapshot))).toEqual([
      ["BRK", "Broken"],
      ["CRK", "Cracked"],
    ]);
  });

  it("resolves inspector names by id", () => {
    expect(inspectorName(snapshot, 7)).toBe("S. Rao");
    expect(inspectorName(snapshot, 8)).toBe("");
    expect(inspectorName(snapshot, null)).toBe("");
  });
});
