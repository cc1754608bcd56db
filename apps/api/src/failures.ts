/**
 * Spring failure record store (`spring_failures`).
 */
import { Readable } from "stream";
import { v4 as uuidv4 } from "uuid";
import { SpringFailureInputSchema } from "@spring-shop/shared";
import type {
  SpringFailure,
  SpringFailureDraft,
  SpringFailureFilter,
  SpringFailureInput,
  SpringFailureUpdate,
} from "@spring-shop/shared";
import { query } from "./db";
import { DomainErrorCode } from "./errors";

export type SpringFailureRow = {
  id: string;
  coach_no: string;
  coach_code: string | null;
  coach_type: string | null;
  schedule: string | null;
  division: string | null;
  bogie_number: string | null;
  receipt_date: string | null;
  secondary_suspension_type: string | null;
  type_of_spring: string | null;
  colour_of_spring: string | null;
  type_of_failure: string | null;
  location: string | null;
  location_in_bogie: string | null;
  remarks: string | null;
  mfg: string | null;
  defect_count: number | null;
  created_at: Date | null;
  updated_at: Date | null;
};

// receipt_date is a DATE column; read it as text so no timezone shift applies.
const SELECT_COLUMNS = `id, coach_no, coach_code, coach_type, schedule, division, bogie_number,
  to_char(receipt_date, 'YYYY-MM-DD') AS receipt_date, secondary_suspension_type,
  type_of_spring, colour_of_spring, type_of_failure, location, location_in_bogie,
  remarks, mfg, defect_count, created_at, updated_at`;

/** API field → column for every writable field. */
const COLUMN_BY_FIELD = {
  coachNo: "coach_no",
  coachCode: "coach_code",
  coachType: "coach_type",
  schedule: "schedule",
  division: "division",
  bogieNumber: "bogie_number",
  receiptDate: "receipt_date",
  secondarySuspensionType: "secondary_suspension_type",
  springType: "type_of_spring",
  springColour: "colour_of_spring",
  failureType: "type_of_failure",
  location: "location",
  locationInBogie: "location_in_bogie",
  remarks: "remarks",
  mfg: "mfg",
  defectCount: "defect_count",
} as const satisfies Record<keyof SpringFailureInput, string>;

type FailureField = keyof typeof COLUMN_BY_FIELD;

function isFailureField(field: string): field is FailureField {
  return Object.hasOwn(COLUMN_BY_FIELD, field);
}

export const SUGGESTION_COLUMNS = [
  "coachNo",
  "coachCode",
  "schedule",
  "division",
  "secondarySuspensionType",
  "springType",
  "springColour",
  "failureType",
  "location",
  "locationInBogie",
] as const satisfies readonly FailureField[];

export type SuggestionColumn = (typeof SUGGESTION_COLUMNS)[number];

function isSuggestionColumn(column: string): column is SuggestionColumn {
  return SUGGESTION_COLUMNS.some((candidate) => candidate === column);
}

export function rowToFailure(row: SpringFailureRow): SpringFailure {
  return {
    id: row.id,
    coachNo: row.coach_no,
    coachCode: row.coach_code,
    coachType: row.coach_type,
    schedule: row.schedule,
    division: row.division,
    bogieNumber: row.bogie_number,
    receiptDate: row.receipt_date,
    secondarySuspensionType: row.secondary_suspension_type,
    springType: row.type_of_spring,
    springColour: row.colour_of_spring,
    failureType: row.type_of_failure,
    location: row.location,
    locationInBogie: row.location_in_bogie,
    remarks: row.remarks,
    mfg: row.mfg,
    defectCount: row.defect_count ?? 1,
    createdAt: row.created_at,
    updatedAt: row.updated_at,
  };
}

function buildFilterClause(filter: SpringFailureFilter): { where: string; params: unknown[] } {
  const conditions: string[] = [];
  const params: unknown[] = [];
  const lists: Array<[string, string[] | undefined]> = [
    ["coach_no", filter.coachNos],
    ["type_of_failure", filter.failureTypes],
    ["type_of_spring", filter.springTypes],
    ["coach_type", filter.coachTypes],
  ];
  for (const [column, values] of lists) {
    if (values && values.length > 0) {
      params.push(values);
      conditions.push(`${column} = ANY($${params.length}::text[])`);
    }
  }
  return { where: conditions.length > 0 ? `WHERE ${conditions.join(" AND ")}` : "", params };
}

export async function listFailures(filter: SpringFailureFilter = {}): Promise<SpringFailure[]> {
  const { where, params } = buildFilterClause(filter);
  const result = await query<SpringFailureRow>(
    `SELECT ${SELECT_COLUMNS} FROM spring_failures ${where} ORDER BY created_at DESC, id`,
    params
  );
  return result.rows.map(rowToFailure);
}

export async function getFailuresForCoach(coachNo: string): Promise<SpringFailure[]> {
  const result = await query<SpringFailureRow>(
    `SELECT ${SELECT_COLUMNS} FROM spring_failures WHERE coach_no = $1 ORDER BY created_at ASC, id ASC`,
    [coachNo]
  );
  return result.rows.map(rowToFailure);
}

export async function listCoachNumbers(): Promise<string[]> {
  const result = await query<{ coach_no: string }>(
    "SELECT DISTINCT coach_no FROM spring_failures ORDER BY coach_no"
  );
  return result.rows.map((row) => row.coach_no);
}

export async function getFailureById(id: string): Promise<SpringFailure | null> {
  const result = await query<SpringFailureRow>(
    `SELECT ${SELECT_COLUMNS} FROM spring_failures WHERE id = $1`,
    [id]
  );
  return result.rows[0] ? rowToFailure(result.rows[0]) : null;
}

/** Trims text, stores blanks as NULL; throws a ZodError on invalid input. */
export async function createFailure(draft: SpringFailureDraft): Promise<SpringFailure> {
  const input = SpringFailureInputSchema.parse(draft);
  const fields = Object.keys(COLUMN_BY_FIELD).filter(isFailureField);
  const columns = ["id", ...fields.map((field) => COLUMN_BY_FIELD[field])];
  const values: unknown[] = [uuidv4(), ...fields.map((field) => input[field] ?? null)];
  const placeholders = values.map((_, index) => `$${index + 1}`);

  const result = await query<SpringFailureRow>(
    `INSERT INTO spring_failures (${columns.join(", ")}, created_at, updated_at)
     VALUES (${placeholders.join(", ")}, NOW(), NOW())
     RETURNING ${SELECT_COLUMNS}`,
    values
  );
  return rowToFailure(result.rows[0]);
}

export async function updateFailure(id: string, patch: SpringFailureUpdate): Promise<SpringFailure> {
  const assignments: string[] = [];
  const params: unknown[] = [];
  for (const [field, value] of Object.entries(patch)) {
    if (value === undefined || !isFailureField(field)) continue;
    const column = COLUMN_BY_FIELD[field];
    params.push(value);
    assignments.push(`${column} = $${params.length}`);
  }

  if (assignments.length === 0) {
    const existing = await getFailureById(id);
    if (!existing) throw new Error(DomainErrorCode.FAILURE_NOT_FOUND);
    return existing;
  }

  params.push(id);
  const result = await query<SpringFailureRow>(
    `UPDATE spring_failures SET ${assignments.join(", ")}, updated_at = NOW()
     WHERE id = $${params.length}
     RETURNING ${SELECT_COLUMNS}`,
    params
  );
  if (!result.rows[0]) throw new Error(DomainErrorCode.FAILURE_NOT_FOUND);
  return rowToFailure(result.rows[0]);
}

export async function deleteFailure(id: string): Promise<void> {
  const result = await query<{ id: string }>("DELETE FROM spring_failures WHERE id = $1 RETURNING id", [id]);
  if (result.rows.length === 0) throw new Error(DomainErrorCode.FAILURE_NOT_FOUND);
}

/** Distinct non-blank values of a whitelisted column, for combobox suggestions. */
export async function getDistinctValues(column: string): Promise<string[]> {
  if (!isSuggestionColumn(column)) {
    throw new Error(DomainErrorCode.INVALID_SUGGESTION_COLUMN);
  }
  const dbColumn = COLUMN_BY_FIELD[column];
  const result = await query<{ value: string }>(
    `SELECT DISTINCT ${dbColumn}::text AS value FROM spring_failures
     WHERE ${dbColumn} IS NOT NULL AND ${dbColumn}::text <> ''`
  );
  return result.rows.map((row) => row.value).sort();
}

// ---------------------------------------------------------------------------
// CSV export
// ---------------------------------------------------------------------------

const CSV_HEADERS = [
  "id",
  "coach_no",
  "coach_code",
  "coach_type",
  "schedule",
  "division",
  "bogie_number",
  "receipt_date",
  "secondary_suspension_type",
  "type_of_spring",
  "colour_of_spring",
  "type_of_failure",
  "location",
  "location_in_bogie",
  "remarks",
  "mfg",
  "defect_count",
];

export function escapeCsvValue(raw: string | number | null | undefined): string {
  const value = String(raw ?? "");
  // Prevent CSV formula execution when opened in spreadsheet software.
  const safeValue = /^[=+\-@\t\r]/.test(value) ? `'${value}` : value;
  return /[",\n\r]/.test(safeValue) ? `"${safeValue.replace(/"/g, '""')}"` : safeValue;
}

function failureToCsvRow(failure: SpringFailure): string {
  return [
    failure.id,
    failure.coachNo,
    failure.coachCode,
    failure.coachType,
    failure.schedule,
    failure.division,
    failure.bogieNumber,
    failure.receiptDate,
    failure.secondarySuspensionType,
    failure.springType,
    failure.springColour,
    failure.failureType,
    failure.location,
    failure.locationInBogie,
    failure.remarks,
    failure.mfg,
    failure.defectCount,
  ]
    .map(escapeCsvValue)
    .join(",");
}

export function csvFileName(now: Date = new Date()): string {
  const pad = (value: number) => String(value).padStart(2, "0");
  const date = `${now.getFullYear()}${pad(now.getMonth() + 1)}${pad(now.getDate())}`;
  const time = `${pad(now.getHours())}${pad(now.getMinutes())}${pad(now.getSeconds())}`;
  return `spring_failures_${date}_${time}.csv`;
}

export async function exportFailuresToCSV(filter: SpringFailureFilter = {}): Promise<Readable> {
  const failures = await listFailures(filter);
  function* lines(): Generator<string> {
    yield CSV_HEADERS.join(",") + "\n";
    for (const failure of failures) {
      yield failureToCsvRow(failure) + "\n";
    }
  }
  return Readable.from(lines());
}
