/**
 * Inspection checklist bundle: activities, per-kind status enums and
 * checklist rows as edited by the report preparer.
 */
import { z } from "zod";

export const InspectionActivityKindEnum = z.enum(["VISUAL", "MUST_DO"]);

export const InspectionActivitySchema = z.object({
  id: z.number().int(),
  text: z.string(),
  sequenceNumber: z.number().int(),
  kind: InspectionActivityKindEnum,
  active: z.boolean(),
});

// "" marks a cell the preparer cleared; it reverts to the kind default on finalize.
export const VisualStatusEnum = z.enum(["Satisfactory", "Unsatisfactory", ""]);
export const MustDoStatusEnum = z.enum(["Done", "Not Done", ""]);

function checklistRowSchema<T extends z.ZodTypeAny>(status: T) {
  return z
    .object({
      activityId: z.number().int().nullable().default(null),
      activityText: z.string().default(""),
      remarks: z.string().default(""),
      answers: z.record(z.string(), status).default({}),
    })
    .strict();
}

export const VisualChecklistRowSchema = checklistRowSchema(VisualStatusEnum);
export const MustDoChecklistRowSchema = checklistRowSchema(MustDoStatusEnum);

export type InspectionActivityKind = z.infer<typeof InspectionActivityKindEnum>;
export type InspectionActivity = z.infer<typeof InspectionActivitySchema>;
export type VisualStatus = z.infer<typeof VisualStatusEnum>;
export type MustDoStatus = z.infer<typeof MustDoStatusEnum>;
export type ChecklistStatus = VisualStatus | MustDoStatus;

export interface InspectionRow {
  activityId: number | null;
  activityText: string;
  remarks: string;
  /** Keyed by spring-position key (see springPositionKey). */
  answers: Record<string, ChecklistStatus>;
}
