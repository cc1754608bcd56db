/**
 * Master data snapshot: spring types, defect codes, inspection activities
 * and active inspectors. Loaded together, cached per app instance.
 */
import type {
  DefectType,
  InspectionActivity,
  InspectionActivityKind,
  Inspector,
  SpringTypeDefinition,
} from "@spring-shop/shared";
import { activitiesOfKind } from "./checklist";
import { query } from "./db";
import { errorMessage } from "./errors";
import { logError } from "./logger";
import { recordMasterDataLoadFailure } from "./observability/metrics";

export interface MasterDataSnapshot {
  springTypes: SpringTypeDefinition[];
  defectTypes: DefectType[];
  visualActivities: InspectionActivity[];
  mustDoActivities: InspectionActivity[];
  inspectors: Inspector[];
  loadedAt: Date;
}

export interface MasterDataResult {
  snapshot: MasterDataSnapshot;
  error: string | null;
}

type SpringTypeRow = {
  id: number;
  spring_type: string | null;
  coach_types: string[] | null;
  max_per_bogie: number | null;
};

type DefectTypeRow = {
  defect_code: string;
  defect_name: string | null;
};

type ActivityRow = {
  id: number;
  activity_text: string | null;
  activity_type: string | null;
  sequence_number: number | null;
  is_active: boolean | null;
};

type InspectorRow = {
  id: number;
  name: string;
};

const ACTIVITY_KIND_BY_TYPE: Record<string, InspectionActivityKind> = {
  VISUAL_INSPECTION: "VISUAL",
  MUST_DO: "MUST_DO",
};

export function emptyMasterData(loadedAt = new Date()): MasterDataSnapshot {
  return {
    springTypes: [],
    defectTypes: [],
    visualActivities: [],
    mustDoActivities: [],
    inspectors: [],
    loadedAt,
  };
}

function rowToActivity(row: ActivityRow): InspectionActivity | null {
  const type = row.activity_type ?? "";
  const kind = Object.hasOwn(ACTIVITY_KIND_BY_TYPE, type) ? ACTIVITY_KIND_BY_TYPE[type] : undefined;
  if (!kind) return null;
  return {
    id: row.id,
    text: row.activity_text ?? "",
    sequenceNumber: row.sequence_number ?? 0,
    kind,
    active: row.is_active === true,
  };
}

export async function loadMasterData(): Promise<MasterDataSnapshot> {
  const [springResult, defectResult, activityResult, inspectorResult] = await Promise.all([
    query<SpringTypeRow>(
      "SELECT id, spring_type, coach_types, max_per_bogie FROM spring_types ORDER BY id"
    ),
    query<DefectTypeRow>("SELECT defect_code, defect_name FROM defect_types ORDER BY defect_code"),
    query<ActivityRow>(
      "SELECT id, activity_text, activity_type, sequence_number, is_active FROM inspection_activities ORDER BY sequence_number"
    ),
    query<InspectorRow>("SELECT id, name FROM inspectors WHERE is_active = true ORDER BY name"),
  ]);

  const activities = activityResult.rows
    .map(rowToActivity)
    .filter((activity): activity is InspectionActivity => activity !== null);

  return {
    springTypes: springResult.rows.map((row) => ({
      id: row.id,
      name: row.spring_type ?? "",
      applicableCoachTypes: row.coach_types ?? [],
      maxPerBogie: row.max_per_bogie,
    })),
    defectTypes: defectResult.rows.map((row) => ({ code: row.defect_code, name: row.defect_name ?? "" })),
    visualActivities: activitiesOfKind(activities, "VISUAL"),
    mustDoActivities: activitiesOfKind(activities, "MUST_DO"),
    inspectors: inspectorResult.rows.map((row) => ({ id: row.id, name: row.name })),
    loadedAt: new Date(),
  };
}

export function defectCodeToName(snapshot: MasterDataSnapshot): Map<string, string> {
  return new Map(snapshot.defectTypes.map((defect) => [defect.code, defect.name]));
}

export function inspectorName(snapshot: MasterDataSnapshot, inspectorId: number | null): string {
  if (inspectorId === null) return "";
  return snapshot.inspectors.find((inspector) => inspector.id === inspectorId)?.name ?? "";
}

export interface MasterDataCacheOptions {
  ttlMs: number;
  loader?: () => Promise<MasterDataSnapshot>;
  now?: () => number;
}

/**
 * Holds the last loaded snapshot for one app instance. A failed load is
 * reported through `error` and never cached, so the next call retries.
 */
export class MasterDataCache {
  private current: { result: MasterDataResult; expiresAt: number } | null = null;
  private pending: Promise<MasterDataResult> | null = null;
  private readonly loader: () => Promise<MasterDataSnapshot>;
  private readonly now: () => number;

  constructor(private readonly options: MasterDataCacheOptions) {
    this.loader = options.loader ?? loadMasterData;
    this.now = options.now ?? Date.now;
  }

  async get(): Promise<MasterDataResult> {
    if (this.current && this.current.expiresAt > this.now()) {
      return this.current.result;
    }
    return this.refresh();
  }

  async refresh(): Promise<MasterDataResult> {
    // Concurrent callers share one in-flight load.
    if (!this.pending) {
      this.pending = this.load().finally(() => {
        this.pending = null;
      });
    }
    return this.pending;
  }

  private async load(): Promise<MasterDataResult> {
    try {
      const snapshot = await this.loader();
      const result: MasterDataResult = { snapshot, error: null };
      this.current = { result, expiresAt: this.now() + this.options.ttlMs };
      return result;
    } catch (error) {
      const message = errorMessage(error);
      logError("MASTER_DATA_LOAD_FAILED", { error: message });
      recordMasterDataLoadFailure();
      return {
        snapshot: emptyMasterData(new Date(this.now())),
        error: `MASTER_DATA_UNAVAILABLE: ${message}`,
      };
    }
  }
}
