import { deflateSync } from "zlib";
import { beforeEach, describe, expect, it, vi } from "vitest";
import { mm, renderInspectionReport, renderReportPdf } from "./report-pdf";
import { buildInspectionReport, rgbaPng } from "./report-fixtures.test-helpers";

vi.mock("./observability/metrics", () => ({
  recordReportGenerated: vi.fn(),
  recordSignatureEmbedFailure: vi.fn(),
}));

import { recordReportGenerated, recordSignatureEmbedFailure } from "./observability/metrics";

// Two rows of filter byte 0 followed by two RGBA pixels.
const RGBA_ROWS = Buffer.from([0, 255, 0, 0, 255, 0, 0, 255, 128, 0, 0, 0, 0, 255, 255, 255, 255, 0]);

describe("renderInspectionReport", () => {
  beforeEach(() => {
    vi.mocked(recordSignatureEmbedFailure).mockClear();
  });

  it("produces a complete PDF document", async () => {
    const buffer = await renderInspectionReport(buildInspectionReport());
    expect(buffer.subarray(0, 5).toString("latin1")).toBe("%PDF-");
    expect(buffer.toString("latin1").trimEnd().endsWith("%%EOF")).toBe(true);
    expect(recordReportGenerated).toHaveBeenCalledWith(true, expect.any(Number));
  });

  it("still renders when a signature image cannot be embedded", async () => {
    const warn = vi.spyOn(console, "warn").mockImplementation(() => undefined);
    const buffer = await renderInspectionReport(buildInspectionReport(), {
      shop: Buffer.from("not-an-image"),
    });
    expect(buffer.subarray(0, 5).toString("latin1")).toBe("%PDF-");
    expect(recordSignatureEmbedFailure).toHaveBeenCalledWith("shop");
    expect(warn).toHaveBeenCalledTimes(1);
    warn.mockRestore();
  });

  it("embeds an RGBA signature image", async () => {
    const buffer = await renderInspectionReport(buildInspectionReport(), {
      inspection: rgbaPng(2, 2, deflateSync(RGBA_ROWS)),
    });
    expect(buffer.toString("latin1")).toContain("/Subtype /Image");
    expect(recordSignatureEmbedFailure).not.toHaveBeenCalled();
  });

  it("skips an RGBA signature whose pixel data does not inflate", async () => {
    const warn = vi.spyOn(console, "warn").mockImplementation(() => undefined);
    const buffer = await renderInspectionReport(buildInspectionReport(), {
      inspection: rgbaPng(2, 2, Buffer.from("garbage-not-zlib")),
    });
    expect(buffer.subarray(0, 5).toString("latin1")).toBe("%PDF-");
    expect(buffer.toString("latin1")).not.toContain("/Subtype /Image");
    expect(recordSignatureEmbedFailure).toHaveBeenCalledWith("inspection");
    expect(warn).toHaveBeenCalledTimes(1);
    warn.mockRestore();
  });

  it("skips an RGBA signature with an unknown scanline filter", async () => {
    const warn = vi.spyOn(console, "warn").mockImplementation(() => undefined);
    const rows = Buffer.from(RGBA_ROWS);
    rows[9] = 7;
    const buffer = await renderInspectionReport(buildInspectionReport(), {
      shop: rgbaPng(2, 2, deflateSync(rows)),
    });
    expect(buffer.toString("latin1")).not.toContain("/Subtype /Image");
    expect(recordSignatureEmbedFailure).toHaveBeenCalledWith("shop");
    warn.mockRestore();
  });

  it("paginates long checklists", async () => {
    const rows = Array.from({ length: 120 }, (_, index) => ({
      activityId: index,
      activityText: `Activity ${index}`,
      remarks: "",
      answers: { primary: "Satisfactory" as const, secondaryouter: "Satisfactory" as const },
    }));
    const buffer = await renderInspectionReport(buildInspectionReport({ visualBogie1: rows }));
    const pageCount = buffer.toString("latin1").match(/\/Type \/Page\b/g)?.length ?? 0;
    expect(pageCount).toBeGreaterThan(1);
  });
});

describe("renderReportPdf", () => {
  it("renders an empty document", async () => {
    const buffer = await renderReportPdf({ title: "Empty", creationDate: new Date(0), blocks: [] });
    expect(buffer.subarray(0, 5).toString("latin1")).toBe("%PDF-");
  });
});

describe("mm", () => {
  it("converts millimetres to points", () => {
    expect(mm(25.4)).toBeCloseTo(72);
  });
});
