import { describe, expect, it } from "vitest";
import {
  assembleReportDocument,
  checklistColumnWidthsMm,
  NO_DEFECTS_NOTICE,
  type ReportBlock,
  type TableBlock,
} from "./report-document";
import { SIGNATURE_PLACEHOLDER } from "./report-text";
import { buildInspectionReport } from "./report-fixtures.test-helpers";

function tables(blocks: ReportBlock[]): TableBlock[] {
  return blocks.filter((block): block is TableBlock => block.kind === "table");
}

function headings(blocks: ReportBlock[]): string[] {
  return blocks.flatMap((block) => (block.kind === "heading" ? [block.text] : []));
}

function tableAfterHeading(blocks: ReportBlock[], heading: string): TableBlock | undefined {
  const index = blocks.findIndex((block) => block.kind === "heading" && block.text === heading);
  return tables(blocks.slice(index + 1))[0];
}

describe("assembleReportDocument", () => {
  it("lays sections out in fixed order", () => {
    const document = assembleReportDocument(buildInspectionReport());

    expect(document.blocks[0]).toEqual({ kind: "title", text: "SPRING INSPECTION REPORT" });
    expect(headings(document.blocks)).toEqual([
      "Spring Configuration",
      "Defects Summary",
      "Visual Inspection - Bogie 1",
      "Visual Inspection - Bogie 2",
      "Must Do - Bogie 1",
      "Must Do - Bogie 2",
      "Signatures",
    ]);
    expect(document.title).toBe("Spring Inspection Report 204512");
    expect(document.creationDate.toISOString()).toBe("2024-01-16T08:00:00.000Z");
  });

  it("fills the coach identity grid with the receipt date cut to ten characters", () => {
    const [grid] = tables(assembleReportDocument(buildInspectionReport()).blocks);
    expect(grid.columnWidthsMm).toEqual([30, 70, 30, 70]);
    expect(grid.style.background).toBe("#f1f8e9");
    expect(grid.rows).toEqual([
      ["Coach Number:", "204512", "Coach Code:", "LWSCN"],
      ["Coach Type:", "LHB", "Secondary Type:", "Air Spring"],
      ["Bogie 1 No.:", "B-101", "Bogie 2 No.:", ""],
      ["Date of Receipt:", "2024-01-15", "Inspector:", "A. Kumar"],
    ]);
  });

  it("lists the spring configuration per bogie", () => {
    const table = tableAfterHeading(assembleReportDocument(buildInspectionReport()).blocks, "Spring Configuration");
    expect(table?.header).toEqual(["Spring Type", "Qty / Bogie"]);
    expect(table?.rows).toEqual([
      ["Primary", "4 per bogie"],
      ["Secondary Outer", "2 per bogie"],
    ]);
  });

  it("omits the configuration section when there are no positions", () => {
    const document = assembleReportDocument(
      buildInspectionReport({ springConfiguration: new Map() })
    );
    expect(headings(document.blocks)).not.toContain("Spring Configuration");
  });

  it("summarizes and tabulates defects with bogie labels and display names", () => {
    const blocks = assembleReportDocument(buildInspectionReport()).blocks;
    const summary = blocks.find((block) => block.kind === "paragraph");
    expect(summary).toEqual({
      kind: "paragraph",
      runs: [
        { text: "Bogie1: " },
        { text: "1", bold: true },
        { text: "    Bogie2: " },
        { text: "1", bold: true },
        { text: "    Total: " },
        { text: "2", bold: true },
      ],
    });

    const table = tableAfterHeading(blocks, "Defects Summary");
    expect(table?.columnWidthsMm).toEqual([25, 50, 25, 60, 40]);
    expect(table?.repeatHeader).toBe(true);
    expect(table?.rows).toEqual([
      ["B-101", "Primary", "L1", "Broken", "Axle box"],
      ["Bogie 2", "Secondary Outer", "R2", "Cracked", "Centre"],
    ]);
  });

  it("prints the aggregated display name rather than the defect code", () => {
    const blocks = assembleReportDocument(
      buildInspectionReport({
        defects: {
          bogie1: [
            { springType: "Primary", springNumber: "L3", defectCode: "BRK", defectDisplay: "Broken coil", location: "" },
          ],
          bogie2: [],
        },
      })
    ).blocks;
    expect(tableAfterHeading(blocks, "Defects Summary")?.rows).toEqual([["B-101", "Primary", "L3", "Broken coil", ""]]);
  });

  it("prints a notice and no defect table without defects", () => {
    const blocks = assembleReportDocument(
      buildInspectionReport({ defects: { bogie1: [], bogie2: [] } })
    ).blocks;
    expect(blocks).toContainEqual({ kind: "paragraph", runs: [{ text: NO_DEFECTS_NOTICE, italic: true }] });
    expect(tables(blocks).some((table) => table.header?.[0] === "Bogie")).toBe(false);
  });

  it("reads checklist cells by position key", () => {
    const blocks = assembleReportDocument(buildInspectionReport()).blocks;
    const visual = tableAfterHeading(blocks, "Visual Inspection - Bogie 1");
    expect(visual?.header).toEqual(["Activity", "Primary", "Secondary Outer", "Remarks"]);
    expect(visual?.rows).toEqual([["Check for cracks", "Satisfactory", "Unsatisfactory", ""]]);
    expect(visual?.style.headerBackground).toBe("#2e7d32");

    const mustDo = tableAfterHeading(blocks, "Must Do - Bogie 2");
    expect(mustDo?.rows).toEqual([["Measure free height", "Done", "Done", "ok"]]);
    expect(mustDo?.style.headerBackground).toBe("#1565c0");
  });

  it("fills blank signature fields with the placeholder and skips the image row without images", () => {
    const blocks = assembleReportDocument(buildInspectionReport()).blocks;
    const signatures = tableAfterHeading(blocks, "Signatures");
    expect(signatures?.rows).toEqual([
      ["Prepared By (SSE SPRING SHOP)", "", "Checked By (SSE / INSPECTION)", ""],
      ["Name & Signature:", "R. Sharma", "Name & Signature:", SIGNATURE_PLACEHOLDER],
      ["Date:", "2024-01-16", "Date:", SIGNATURE_PLACEHOLDER],
    ]);
    expect(blocks.some((block) => block.kind === "signatureImages")).toBe(false);
  });

  it("adds an image row with both slots when one role has an image", () => {
    const image = Buffer.from("fake");
    const blocks = assembleReportDocument(buildInspectionReport(), { inspection: image }).blocks;
    const last = blocks[blocks.length - 1];
    expect(last).toEqual({
      kind: "signatureImages",
      columnWidthsMm: [50, 70, 50, 70],
      fitMm: { width: 45, height: 20 },
      slots: [
        { role: "shop", column: 0, image: null },
        { role: "inspection", column: 2, image },
      ],
    });
  });
});

describe("checklistColumnWidthsMm", () => {
  it("splits the remaining width evenly over positions", () => {
    expect(checklistColumnWidthsMm(4)).toEqual([80, 35, 35, 35, 35, 40]);
    expect(checklistColumnWidthsMm(0)).toEqual([80, 40]);
  });
});
