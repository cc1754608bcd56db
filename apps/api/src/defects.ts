/**
 * Defect aggregator: splits a coach's failure observations between its two
 * bogies and resolves defect codes to display names.
 */
import type { SpringFailure } from "@spring-shop/shared";

export interface DefectRecord {
  springType?: string | null;
  springPositionLabel?: string | null;
  defectCode?: string | null;
  location?: string | null;
  bogieNumber?: string | null;
}

export interface BogieDefect {
  springType: string;
  springNumber: string;
  defectCode: string;
  defectDisplay: string;
  location: string;
}

export interface PartitionedDefects {
  bogie1: BogieDefect[];
  bogie2: BogieDefect[];
}

export type DefectCodeToName = ReadonlyMap<string, string>;

function displayDefect(code: string, defectCodeToName: DefectCodeToName): string {
  return defectCodeToName.get(code) ?? code;
}

// Only a literal "2" selects the second bogie; blanks and anything else stay on bogie 1.
function isSecondBogie(bogieNumber: string | null | undefined): boolean {
  return (bogieNumber ?? "").trim() === "2";
}

export function partitionDefects(
  defectRecords: readonly DefectRecord[],
  defectCodeToName: DefectCodeToName
): PartitionedDefects {
  const result: PartitionedDefects = { bogie1: [], bogie2: [] };
  for (const record of defectRecords) {
    const defectCode = record.defectCode ?? "";
    const entry: BogieDefect = {
      springType: record.springType ?? "",
      springNumber: record.springPositionLabel ?? "",
      defectCode,
      defectDisplay: displayDefect(defectCode, defectCodeToName),
      location: record.location ?? "",
    };
    (isSecondBogie(record.bogieNumber) ? result.bogie2 : result.bogie1).push(entry);
  }
  return result;
}

export function failureToDefectRecord(failure: SpringFailure, bogieOverride?: string): DefectRecord {
  return {
    springType: failure.springType,
    springPositionLabel: failure.locationInBogie,
    defectCode: failure.failureType,
    location: failure.location,
    bogieNumber: bogieOverride ?? failure.bogieNumber,
  };
}
