/**
 * Dashboard aggregates over failure records. Blank and missing values are
 * left out of every count.
 */
import type { SpringFailure } from "@spring-shop/shared";

export interface ValueCount {
  value: string;
  count: number;
}

export interface CrossTab {
  rowLabels: string[];
  columnLabels: string[];
  /** counts[row][column] */
  counts: number[][];
}

export interface CoachTypeDefects {
  coachType: string;
  defects: ValueCount[];
}

export interface FailureSummary {
  totalFailures: number;
  totalDefectCount: number;
  uniqueCoachCodes: number;
  failureTypeCount: number;
  springTypeCount: number;
  topDefectTypes: ValueCount[];
  bySpringType: ValueCount[];
  byCoachType: ValueCount[];
  bySpringColour: ValueCount[];
  bySecondarySuspensionType: ValueCount[];
  coachTypeByFailureType: CrossTab;
  springTypeByFailureType: CrossTab;
  defectsByCoachType: CoachTypeDefects[];
}

type Dimension = "coachCode" | "coachType" | "springType" | "springColour" | "secondarySuspensionType" | "failureType";

const TOP_DEFECT_LIMIT = 10;

function present(value: string | null): string | null {
  if (value === null) return null;
  const trimmed = value.trim();
  return trimmed === "" ? null : trimmed;
}

/** Count desc; ties keep first-seen order. */
export function valueCounts(failures: readonly SpringFailure[], dimension: Dimension): ValueCount[] {
  const counts = new Map<string, number>();
  for (const failure of failures) {
    const value = present(failure[dimension]);
    if (value === null) continue;
    counts.set(value, (counts.get(value) ?? 0) + 1);
  }
  return Array.from(counts, ([value, count]) => ({ value, count })).sort((a, b) => b.count - a.count);
}

function distinctCount(failures: readonly SpringFailure[], dimension: Dimension): number {
  return valueCounts(failures, dimension).length;
}

function sortedLabels(values: Iterable<string>): string[] {
  return Array.from(new Set(values)).sort();
}

export function crossTabulate(
  failures: readonly SpringFailure[],
  rowDimension: Dimension,
  columnDimension: Dimension
): CrossTab {
  const pairs: Array<[string, string]> = [];
  for (const failure of failures) {
    const row = present(failure[rowDimension]);
    const column = present(failure[columnDimension]);
    if (row !== null && column !== null) pairs.push([row, column]);
  }

  const rowLabels = sortedLabels(pairs.map(([row]) => row));
  const columnLabels = sortedLabels(pairs.map(([, column]) => column));
  const counts = rowLabels.map(() => columnLabels.map(() => 0));
  for (const [row, column] of pairs) {
    counts[rowLabels.indexOf(row)][columnLabels.indexOf(column)] += 1;
  }
  return { rowLabels, columnLabels, counts };
}

export function summarizeFailures(failures: readonly SpringFailure[]): FailureSummary {
  const coachTypes = sortedLabels(
    failures.flatMap((failure) => {
      const coachType = present(failure.coachType);
      return coachType === null ? [] : [coachType];
    })
  );

  return {
    totalFailures: failures.length,
    totalDefectCount: failures.reduce((sum, failure) => sum + failure.defectCount, 0),
    uniqueCoachCodes: distinctCount(failures, "coachCode"),
    failureTypeCount: distinctCount(failures, "failureType"),
    springTypeCount: distinctCount(failures, "springType"),
    topDefectTypes: valueCounts(failures, "failureType").slice(0, TOP_DEFECT_LIMIT),
    bySpringType: valueCounts(failures, "springType"),
    byCoachType: valueCounts(failures, "coachType"),
    bySpringColour: valueCounts(failures, "springColour"),
    bySecondarySuspensionType: valueCounts(failures, "secondarySuspensionType"),
    coachTypeByFailureType: crossTabulate(failures, "coachType", "failureType"),
    springTypeByFailureType: crossTabulate(failures, "springType", "failureType"),
    defectsByCoachType: coachTypes.map((coachType) => ({
      coachType,
      defects: valueCounts(
        failures.filter((failure) => present(failure.coachType) === coachType),
        "failureType"
      ),
    })),
  };
}
