/**
 * Inspection checklist builder. Supplies the default answer grid shown to
 * the preparer, and applies the finalize-time merge that turns cleared cells
 * back into the kind default.
 */
import type {
  ChecklistStatus,
  InspectionActivity,
  InspectionActivityKind,
  InspectionRow,
} from "@spring-shop/shared";
import { springPositionKeys, type SpringConfiguration } from "./spring-config";

export const CHECKLIST_STATUS_OPTIONS = {
  VISUAL: ["Satisfactory", "Unsatisfactory"],
  MUST_DO: ["Done", "Not Done"],
} as const satisfies Record<InspectionActivityKind, readonly ChecklistStatus[]>;

export const DEFAULT_CHECKLIST_STATUS = {
  VISUAL: "Satisfactory",
  MUST_DO: "Done",
} as const satisfies Record<InspectionActivityKind, ChecklistStatus>;

export function buildDefaultChecklist(
  activities: readonly InspectionActivity[],
  springConfiguration: SpringConfiguration,
  defaultStatus: ChecklistStatus
): InspectionRow[] {
  const keys = springPositionKeys(springConfiguration);
  return activities.map((activity) => ({
    activityId: activity.id,
    activityText: activity.text,
    remarks: "",
    answers: Object.fromEntries(keys.map((key) => [key, defaultStatus])),
  }));
}

/**
 * Applied once, when the report is generated. Every configured position gets
 * an answer: the edited value when non-empty, the kind default otherwise.
 * Answers for keys outside the configuration are dropped.
 */
export function finalizeChecklist(
  rows: readonly InspectionRow[],
  springConfiguration: SpringConfiguration,
  kind: InspectionActivityKind
): InspectionRow[] {
  const keys = springPositionKeys(springConfiguration);
  const fallback = DEFAULT_CHECKLIST_STATUS[kind];
  return rows.map((row) => {
    const answers: Record<string, ChecklistStatus> = {};
    for (const key of keys) {
      const edited = Object.hasOwn(row.answers, key) ? row.answers[key] : "";
      answers[key] = edited ? edited : fallback;
    }
    return {
      activityId: row.activityId,
      activityText: row.activityText,
      remarks: row.remarks,
      answers,
    };
  });
}

export function activitiesOfKind(
  activities: readonly InspectionActivity[],
  kind: InspectionActivityKind
): InspectionActivity[] {
  return activities.filter((activity) => activity.kind === kind && activity.active);
}
