import { describe, expect, it } from "vitest";
import type { InspectionActivity, InspectionRow } from "@spring-shop/shared";
import {
  activitiesOfKind,
  buildDefaultChecklist,
  DEFAULT_CHECKLIST_STATUS,
  finalizeChecklist,
} from "./checklist";

const config = new Map<string, number>([
  ["Primary", 4],
  ["Secondary Outer", 2],
]);

const activities: InspectionActivity[] = [
  { id: 1, text: "Check for cracks", sequenceNumber: 1, kind: "VISUAL", active: true },
  { id: 2, text: "Measure free height", sequenceNumber: 2, kind: "MUST_DO", active: true },
  { id: 3, text: "Retired check", sequenceNumber: 3, kind: "VISUAL", active: false },
];

describe("buildDefaultChecklist", () => {
  it("creates one row per activity with every position set to the default", () => {
    const rows = buildDefaultChecklist(activities.slice(0, 1), config, DEFAULT_CHECKLIST_STATUS.VISUAL);
    expect(rows).toEqual([
      {
        activityId: 1,
        activityText: "Check for cracks",
        remarks: "",
        answers: { primary: "Satisfactory", secondaryouter: "Satisfactory" },
      },
    ]);
  });

  it("returns no rows without activities", () => {
    expect(buildDefaultChecklist([], config, "Done")).toEqual([]);
  });
});

describe("finalizeChecklist", () => {
  it("fills cleared and missing answers with the kind default and keeps edits", () => {
    const edited: InspectionRow[] = [
      {
        activityId: 2,
        activityText: "Measure free height",
        remarks: "re-measured",
        answers: { primary: "Not Done", secondaryouter: "", stale: "Done" },
      },
      { activityId: null, activityText: "Added by preparer", remarks: "", answers: {} },
    ];

    const finalized = finalizeChecklist(edited, config, "MUST_DO");

    expect(finalized).toEqual([
      {
        activityId: 2,
        activityText: "Measure free height",
        remarks: "re-measured",
        answers: { primary: "Not Done", secondaryouter: "Done" },
      },
      {
        activityId: null,
        activityText: "Added by preparer",
        remarks: "",
        answers: { primary: "Done", secondaryouter: "Done" },
      },
    ]);
  });

  it("uses Satisfactory for visual checklists", () => {
    const [row] = finalizeChecklist(
      [{ activityId: 1, activityText: "Check", remarks: "", answers: { primary: "" } }],
      config,
      "VISUAL"
    );
    expect(row.answers).toEqual({ primary: "Satisfactory", secondaryouter: "Satisfactory" });
  });

  it("does not mutate the edited rows", () => {
    const rows: InspectionRow[] = [
      { activityId: 1, activityText: "Check", remarks: "", answers: { primary: "" } },
    ];
    finalizeChecklist(rows, config, "VISUAL");
    expect(rows[0].answers).toEqual({ primary: "" });
  });
});

describe("activitiesOfKind", () => {
  it("keeps active activities of the requested kind", () => {
    expect(activitiesOfKind(activities, "VISUAL").map((a) => a.id)).toEqual([1]);
    expect(activitiesOfKind(activities, "MUST_DO").map((a) => a.id)).toEqual([2]);
  });
});
