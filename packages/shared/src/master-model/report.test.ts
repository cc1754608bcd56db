import { describe, expect, it } from "vitest";
import { parseCoachReportRequest } from "./report";
import { SpringFailureInputSchema } from "./failures";

describe("parseCoachReportRequest", () => {
  it("fills defaults for an empty request", () => {
    const parsed = parseCoachReportRequest({});
    expect(parsed.success).toBe(true);
    if (!parsed.success) return;
    expect(parsed.data).toEqual({
      bogie1Number: "",
      bogie2Number: "",
      inspectorId: null,
      bogieCorrections: {},
      signatures: {
        shop: { name: "", date: "" },
        inspection: { name: "", date: "" },
      },
      checklists: {},
    });
  });

  it("accepts visual rows with closed statuses and blank cells", () => {
    const parsed = parseCoachReportRequest({
      checklists: {
        visualBogie1: [
          { activityId: 1, activityText: "Check coils", answers: { primary: "Unsatisfactory", secondaryouter: "" } },
        ],
      },
    });
    expect(parsed.success).toBe(true);
    if (!parsed.success) return;
    expect(parsed.data.checklists.visualBogie1?.[0]).toEqual({
      activityId: 1,
      activityText: "Check coils",
      remarks: "",
      answers: { primary: "Unsatisfactory", secondaryouter: "" },
    });
  });

  it("rejects must-do statuses on a visual checklist", () => {
    const parsed = parseCoachReportRequest({
      checklists: { visualBogie2: [{ answers: { primary: "Done" } }] },
    });
    expect(parsed.success).toBe(false);
  });

  it("rejects unknown top-level fields", () => {
    expect(parseCoachReportRequest({ persist: true }).success).toBe(false);
  });
});

describe("SpringFailureInputSchema", () => {
  it("trims text and stores blanks as null", () => {
    const parsed = SpringFailureInputSchema.parse({
      coachNo: " 45001 ",
      coachType: "VB",
      coachCode: "  ",
      receiptDate: "2024-05-01",
      springType: " Primary ",
    });
    expect(parsed.coachNo).toBe("45001");
    expect(parsed.coachCode).toBeNull();
    expect(parsed.springType).toBe("Primary");
    expect(parsed.defectCount).toBe(1);
  });

  it("requires a coach number", () => {
    const parsed = SpringFailureInputSchema.safeParse({
      coachNo: "   ",
      coachType: "LHB",
      receiptDate: "2024-05-01",
    });
    expect(parsed.success).toBe(false);
  });
});
