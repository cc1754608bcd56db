import type { QueryResult, QueryResultRow } from "pg";
import type { SpringFailureRow } from "./failures";

export function queryResult<R extends QueryResultRow>(rows: R[], command = "SELECT"): QueryResult<R> {
  return { rows, rowCount: rows.length, command, oid: 0, fields: [] };
}

export function failureRow(overrides: Partial<SpringFailureRow> = {}): SpringFailureRow {
  return {
    id: "5b0e7f36-3a51-4b8f-9c1e-6f6c2f0a1d01",
    coach_no: "204512",
    coach_code: "LWSCN",
    coach_type: "LHB",
    schedule: "IOH",
    division: "Central",
    bogie_number: "1",
    receipt_date: "2024-01-15",
    secondary_suspension_type: "Air Spring",
    type_of_spring: "Primary",
    colour_of_spring: "Green",
    type_of_failure: "BRK",
    location: "Axle box",
    location_in_bogie: "L1",
    remarks: null,
    mfg: null,
    defect_count: 1,
    created_at: new Date("2024-01-15T09:00:00Z"),
    updated_at: new Date("2024-01-15T09:00:00Z"),
    ...overrides,
  };
}
