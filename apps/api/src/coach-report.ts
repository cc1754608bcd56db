/**
 * Coach report workflow: gathers a coach's failure records and the master
 * data, and turns the preparer's edits into a rendered inspection report.
 */
import { isoDatePart } from "@spring-shop/shared";
import type { CoachReportRequest, InspectionRow, Inspector, SpringFailure } from "@spring-shop/shared";
import {
  buildDefaultChecklist,
  CHECKLIST_STATUS_OPTIONS,
  DEFAULT_CHECKLIST_STATUS,
  finalizeChecklist,
} from "./checklist";
import { failureToDefectRecord, partitionDefects } from "./defects";
import { DomainErrorCode } from "./errors";
import { getFailuresForCoach } from "./failures";
import { extendLogContext } from "./log-context";
import { logInfo } from "./logger";
import { defectCodeToName, inspectorName, type MasterDataResult, type MasterDataSnapshot } from "./master-data";
import type { InspectionReport, SignatureImages } from "./report-document";
import { renderInspectionReport } from "./report-pdf";
import { normalizeSignatureDate } from "./signature-date";
import { inferCoachType, resolveSpringConfiguration, type SpringConfiguration } from "./spring-config";

export const DEFAULT_SECONDARY_TYPE = "Air Spring";
export const DEFAULT_BOGIE1_LABEL = "Bogie 1";

export interface CoachIdentity {
  coachNumber: string;
  coachCode: string;
  coachType: string;
  secondaryType: string;
  receiptDate: string;
  /** Bogie number on the first failure record, shown as a hint to the preparer. */
  recordedBogie: string;
}

export interface ReportChecklists {
  visualBogie1: InspectionRow[];
  visualBogie2: InspectionRow[];
  mustDoBogie1: InspectionRow[];
  mustDoBogie2: InspectionRow[];
}

export interface CoachReportContext {
  coach: CoachIdentity;
  failures: SpringFailure[];
  springConfiguration: SpringConfiguration;
  checklists: ReportChecklists;
  statusOptions: typeof CHECKLIST_STATUS_OPTIONS;
  inspectors: Inspector[];
  masterDataError: string | null;
}

export interface GeneratedReport {
  fileName: string;
  buffer: Buffer;
  defectCount: number;
}

export function deriveCoachIdentity(
  coachNumber: string,
  failures: readonly SpringFailure[],
  today: Date = new Date()
): CoachIdentity {
  const first = failures[0];
  const coachCode = first?.coachCode ?? "";
  return {
    coachNumber,
    coachCode,
    coachType: inferCoachType(first?.coachType, coachCode),
    secondaryType: first?.secondarySuspensionType?.trim() || DEFAULT_SECONDARY_TYPE,
    receiptDate: isoDatePart(first?.receiptDate) || today.toISOString().slice(0, 10),
    recordedBogie: first?.bogieNumber ?? "",
  };
}

function defaultChecklists(snapshot: MasterDataSnapshot, config: SpringConfiguration): ReportChecklists {
  return {
    visualBogie1: buildDefaultChecklist(snapshot.visualActivities, config, DEFAULT_CHECKLIST_STATUS.VISUAL),
    visualBogie2: buildDefaultChecklist(snapshot.visualActivities, config, DEFAULT_CHECKLIST_STATUS.VISUAL),
    mustDoBogie1: buildDefaultChecklist(snapshot.mustDoActivities, config, DEFAULT_CHECKLIST_STATUS.MUST_DO),
    mustDoBogie2: buildDefaultChecklist(snapshot.mustDoActivities, config, DEFAULT_CHECKLIST_STATUS.MUST_DO),
  };
}

export async function prepareCoachReport(
  coachNumber: string,
  masterData: MasterDataResult
): Promise<CoachReportContext | null> {
  const failures = await getFailuresForCoach(coachNumber);
  if (failures.length === 0) return null;

  const { snapshot } = masterData;
  const coach = deriveCoachIdentity(coachNumber, failures);
  const springConfiguration = resolveSpringConfiguration(coach.coachType, coach.secondaryType, snapshot.springTypes);
  return {
    coach,
    failures,
    springConfiguration,
    checklists: defaultChecklists(snapshot, springConfiguration),
    statusOptions: CHECKLIST_STATUS_OPTIONS,
    inspectors: snapshot.inspectors,
    masterDataError: masterData.error,
  };
}

/** Session-only corrections keyed by failure id; the stored rows are left untouched. */
export function applyBogieCorrections(
  failures: readonly SpringFailure[],
  corrections: Readonly<Record<string, string>>
): SpringFailure[] {
  return failures.map((failure) => {
    const corrected = Object.hasOwn(corrections, failure.id) ? corrections[failure.id] : "";
    return corrected ? { ...failure, bogieNumber: corrected } : failure;
  });
}

export function reportFileName(coachCode: string, coachNumber: string): string {
  const safe = (part: string) => part.replace(/[^A-Za-z0-9._-]/g, "_");
  return `inspection_${safe(coachCode)}_${safe(coachNumber)}.pdf`;
}

export function buildInspectionReport(
  coach: CoachIdentity,
  failures: readonly SpringFailure[],
  request: CoachReportRequest,
  snapshot: MasterDataSnapshot,
  generatedAt: Date
): InspectionReport {
  const springConfiguration = resolveSpringConfiguration(coach.coachType, coach.secondaryType, snapshot.springTypes);
  const defaults = defaultChecklists(snapshot, springConfiguration);
  const edited = request.checklists;
  const corrected = applyBogieCorrections(failures, request.bogieCorrections);

  return {
    coachNumber: coach.coachNumber,
    coachCode: coach.coachCode,
    coachType: coach.coachType,
    secondaryType: coach.secondaryType,
    bogie1Number: request.bogie1Number || DEFAULT_BOGIE1_LABEL,
    bogie2Number: request.bogie2Number,
    dateOfReceipt: coach.receiptDate,
    inspectorName: inspectorName(snapshot, request.inspectorId),
    springConfiguration,
    visualBogie1: finalizeChecklist(edited.visualBogie1 ?? defaults.visualBogie1, springConfiguration, "VISUAL"),
    visualBogie2: finalizeChecklist(edited.visualBogie2 ?? defaults.visualBogie2, springConfiguration, "VISUAL"),
    mustDoBogie1: finalizeChecklist(edited.mustDoBogie1 ?? defaults.mustDoBogie1, springConfiguration, "MUST_DO"),
    mustDoBogie2: finalizeChecklist(edited.mustDoBogie2 ?? defaults.mustDoBogie2, springConfiguration, "MUST_DO"),
    defects: partitionDefects(
      corrected.map((failure) => failureToDefectRecord(failure)),
      defectCodeToName(snapshot)
    ),
    signatures: {
      shop: {
        name: request.signatures.shop.name,
        date: normalizeSignatureDate(request.signatures.shop.date),
      },
      inspection: {
        name: request.signatures.inspection.name,
        date: normalizeSignatureDate(request.signatures.inspection.date),
      },
    },
    generatedAt,
  };
}

export async function generateCoachReport(
  coachNumber: string,
  request: CoachReportRequest,
  masterData: MasterDataResult,
  images: SignatureImages = {},
  generatedAt: Date = new Date()
): Promise<GeneratedReport> {
  extendLogContext({ coachNo: coachNumber });
  const failures = await getFailuresForCoach(coachNumber);
  if (failures.length === 0) {
    throw new Error(DomainErrorCode.COACH_NOT_FOUND);
  }

  const { snapshot } = masterData;
  const coach = deriveCoachIdentity(coachNumber, failures, generatedAt);
  const report = buildInspectionReport(coach, failures, request, snapshot, generatedAt);
  const buffer = await renderInspectionReport(report, images);
  const defectCount = report.defects.bogie1.length + report.defects.bogie2.length;

  logInfo("REPORT_GENERATED", {
    coachNo: coachNumber,
    defectCount,
    bytes: buffer.length,
    masterDataError: masterData.error,
  });
  return { fileName: reportFileName(coach.coachCode, coachNumber), buffer, defectCount };
}
