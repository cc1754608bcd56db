/**
 * Spring shop master model: barrel export.
 *
 * Usage:
 *   import { SpringFailureInputSchema, parseCoachReportRequest } from "@spring-shop/shared";
 *   import type { SpringTypeDefinition, InspectionRow } from "@spring-shop/shared";
 */

// Primitives
export { NonEmptyString, ISODate, OptionalFormText } from "./primitives";

// Master data
export {
  CoachTypeEnum,
  SpringTypeDefinitionSchema,
  DefectTypeSchema,
  InspectorSchema,
  type CoachType,
  type SpringTypeDefinition,
  type DefectType,
  type Inspector,
} from "./spring-types";

// Inspection checklists
export {
  InspectionActivityKindEnum,
  InspectionActivitySchema,
  VisualStatusEnum,
  MustDoStatusEnum,
  VisualChecklistRowSchema,
  MustDoChecklistRowSchema,
  type InspectionActivityKind,
  type InspectionActivity,
  type VisualStatus,
  type MustDoStatus,
  type ChecklistStatus,
  type InspectionRow,
} from "./inspection";

// Failure records
export {
  SpringFailureInputSchema,
  SpringFailureUpdateSchema,
  type SpringFailure,
  type SpringFailureFilter,
  type SpringFailureInput,
  type SpringFailureDraft,
  type SpringFailureUpdate,
} from "./failures";

// Report requests
export {
  SignatureInputSchema,
  CoachReportRequestSchema,
  parseCoachReportRequest,
  type SignatureInput,
  type CoachReportRequest,
} from "./report";
