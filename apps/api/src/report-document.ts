/**
 * Report document assembler: lays an InspectionReport out as an ordered list
 * of blocks (title, headings, text runs, tables, signature images). The
 * result is a plain value; painting it is report-pdf.ts's job.
 */
import { formatQuantityPerBogie, isoDatePart, springPositionKey } from "@spring-shop/shared";
import type { InspectionRow } from "@spring-shop/shared";
import type { PartitionedDefects } from "./defects";
import type { SpringConfiguration } from "./spring-config";
import { orPlaceholder, toCellText } from "./report-text";

export type SignatureRole = "shop" | "inspection";

export const SIGNATURE_ROLE_TITLES: Record<SignatureRole, string> = {
  shop: "Prepared By (SSE SPRING SHOP)",
  inspection: "Checked By (SSE / INSPECTION)",
};

export interface SignatureMeta {
  name: string;
  date: string | null;
}

export interface InspectionReport {
  coachNumber: string;
  coachCode: string;
  coachType: string;
  secondaryType: string;
  bogie1Number: string;
  bogie2Number: string;
  dateOfReceipt: string;
  inspectorName: string;
  springConfiguration: SpringConfiguration;
  visualBogie1: InspectionRow[];
  visualBogie2: InspectionRow[];
  mustDoBogie1: InspectionRow[];
  mustDoBogie2: InspectionRow[];
  defects: PartitionedDefects;
  signatures: Record<SignatureRole, SignatureMeta>;
  generatedAt: Date;
}

export type SignatureImages = Partial<Record<SignatureRole, Buffer | null>>;

export interface TextRun {
  text: string;
  bold?: boolean;
  italic?: boolean;
}

export interface TableStyle {
  fontSize: number;
  /** Grid line width in points; 0 draws no grid. */
  gridWidth: number;
  verticalAlign: "top" | "middle";
  background?: string;
  headerBackground?: string;
  headerTextColor?: string;
}

export interface TableBlock {
  kind: "table";
  columnWidthsMm: number[];
  header: string[] | null;
  rows: string[][];
  style: TableStyle;
  /** Repeat the header row at the top of every page the table spans. */
  repeatHeader: boolean;
}

export interface SignatureImageSlot {
  role: SignatureRole;
  column: number;
  image: Buffer | null;
}

export type ReportBlock =
  | { kind: "title"; text: string }
  | { kind: "heading"; text: string }
  | { kind: "paragraph"; runs: TextRun[] }
  | TableBlock
  | {
      kind: "signatureImages";
      columnWidthsMm: number[];
      fitMm: { width: number; height: number };
      slots: SignatureImageSlot[];
    }
  | { kind: "spacer"; heightPt: number };

export interface ReportDocument {
  title: string;
  creationDate: Date;
  blocks: ReportBlock[];
}

export const REPORT_TITLE = "SPRING INSPECTION REPORT";
export const NO_DEFECTS_NOTICE = "No defects reported.";

const BODY_FONT_SIZE = 8;
const GRID_WIDTH = 0.3;
const CHECKLIST_TOTAL_WIDTH_MM = 260;
const CHECKLIST_ACTIVITY_WIDTH_MM = 80;
const CHECKLIST_REMARKS_WIDTH_MM = 40;
const SIGNATURE_COLUMNS_MM = [50, 70, 50, 70];

export const SECTION_COLORS = {
  coachGrid: "#f1f8e9",
  springConfiguration: "#1976d2",
  defects: "#c62828",
  visual: "#2e7d32",
  mustDo: "#1565c0",
} as const;

function coachIdentityBlock(report: InspectionReport): TableBlock {
  const cells: Array<[string, unknown, string, unknown]> = [
    ["Coach Number:", report.coachNumber, "Coach Code:", report.coachCode],
    ["Coach Type:", report.coachType, "Secondary Type:", report.secondaryType],
    ["Bogie 1 No.:", report.bogie1Number, "Bogie 2 No.:", report.bogie2Number],
    ["Date of Receipt:", isoDatePart(report.dateOfReceipt), "Inspector:", report.inspectorName],
  ];
  return {
    kind: "table",
    columnWidthsMm: [30, 70, 30, 70],
    header: null,
    rows: cells.map((row) => row.map(toCellText)),
    style: {
      fontSize: BODY_FONT_SIZE,
      gridWidth: GRID_WIDTH,
      verticalAlign: "middle",
      background: SECTION_COLORS.coachGrid,
    },
    repeatHeader: false,
  };
}

function springConfigurationBlocks(config: SpringConfiguration): ReportBlock[] {
  if (config.size === 0) return [];
  return [
    { kind: "heading", text: "Spring Configuration" },
    {
      kind: "table",
      columnWidthsMm: [110, 30],
      header: ["Spring Type", "Qty / Bogie"],
      rows: Array.from(config, ([name, quantity]) => [toCellText(name), formatQuantityPerBogie(quantity)]),
      style: {
        fontSize: BODY_FONT_SIZE,
        gridWidth: GRID_WIDTH,
        verticalAlign: "top",
        headerBackground: SECTION_COLORS.springConfiguration,
        headerTextColor: "#ffffff",
      },
      repeatHeader: false,
    },
    { kind: "spacer", heightPt: 8 },
  ];
}

function defectBlocks(report: InspectionReport): ReportBlock[] {
  const { bogie1, bogie2 } = report.defects;
  const total = bogie1.length + bogie2.length;
  const blocks: ReportBlock[] = [
    { kind: "heading", text: "Defects Summary" },
    {
      kind: "paragraph",
      runs: [
        { text: "Bogie1: " },
        { text: String(bogie1.length), bold: true },
        { text: "    Bogie2: " },
        { text: String(bogie2.length), bold: true },
        { text: "    Total: " },
        { text: String(total), bold: true },
      ],
    },
    { kind: "spacer", heightPt: 6 },
  ];

  if (total === 0) {
    blocks.push({ kind: "paragraph", runs: [{ text: NO_DEFECTS_NOTICE, italic: true }] });
    return blocks;
  }

  const bogie1Label = report.bogie1Number || "Bogie 1";
  const bogie2Label = report.bogie2Number || "Bogie 2";
  const rows = [
    ...bogie1.map((defect) => ({ label: bogie1Label, defect })),
    ...bogie2.map((defect) => ({ label: bogie2Label, defect })),
  ].map(({ label, defect }) => [
    toCellText(label),
    toCellText(defect.springType),
    toCellText(defect.springNumber),
    toCellText(defect.defectDisplay),
    toCellText(defect.location),
  ]);

  blocks.push({
    kind: "table",
    columnWidthsMm: [25, 50, 25, 60, 40],
    header: ["Bogie", "Spring Type", "Spring No.", "Defect Type", "Location"],
    rows,
    style: {
      fontSize: BODY_FONT_SIZE,
      gridWidth: GRID_WIDTH,
      verticalAlign: "top",
      headerBackground: SECTION_COLORS.defects,
      headerTextColor: "#ffffff",
    },
    repeatHeader: true,
  });
  return blocks;
}

export function checklistColumnWidthsMm(positionCount: number): number[] {
  const springWidth =
    (CHECKLIST_TOTAL_WIDTH_MM - CHECKLIST_ACTIVITY_WIDTH_MM - CHECKLIST_REMARKS_WIDTH_MM) /
    Math.max(1, positionCount);
  return [
    CHECKLIST_ACTIVITY_WIDTH_MM,
    ...Array.from({ length: positionCount }, () => springWidth),
    CHECKLIST_REMARKS_WIDTH_MM,
  ];
}

function checklistBlocks(
  title: string,
  rows: readonly InspectionRow[],
  config: SpringConfiguration,
  headerBackground: string
): ReportBlock[] {
  const names = Array.from(config.keys());
  const keys = names.map(springPositionKey);
  return [
    { kind: "heading", text: title },
    {
      kind: "table",
      columnWidthsMm: checklistColumnWidthsMm(names.length),
      header: ["Activity", ...names.map(toCellText), "Remarks"],
      rows: rows.map((row) => [
        toCellText(row.activityText),
        ...keys.map((key) => toCellText(row.answers[key])),
        toCellText(row.remarks),
      ]),
      style: {
        fontSize: BODY_FONT_SIZE,
        gridWidth: 0.25,
        verticalAlign: "top",
        headerBackground,
        headerTextColor: "#ffffff",
      },
      repeatHeader: true,
    },
    { kind: "spacer", heightPt: 8 },
  ];
}

function signatureBlocks(report: InspectionReport, images: SignatureImages): ReportBlock[] {
  const { shop, inspection } = report.signatures;
  const blocks: ReportBlock[] = [
    { kind: "spacer", heightPt: 12 },
    { kind: "heading", text: "Signatures" },
    {
      kind: "table",
      columnWidthsMm: SIGNATURE_COLUMNS_MM,
      header: null,
      rows: [
        [SIGNATURE_ROLE_TITLES.shop, "", SIGNATURE_ROLE_TITLES.inspection, ""],
        ["Name & Signature:", orPlaceholder(shop.name), "Name & Signature:", orPlaceholder(inspection.name)],
        ["Date:", orPlaceholder(shop.date), "Date:", orPlaceholder(inspection.date)],
      ],
      style: { fontSize: 9, gridWidth: 0, verticalAlign: "middle" },
      repeatHeader: false,
    },
  ];

  const shopImage = images.shop ?? null;
  const inspectionImage = images.inspection ?? null;
  if (shopImage || inspectionImage) {
    blocks.push(
      { kind: "spacer", heightPt: 6 },
      {
        kind: "signatureImages",
        columnWidthsMm: SIGNATURE_COLUMNS_MM,
        fitMm: { width: 45, height: 20 },
        slots: [
          { role: "shop", column: 0, image: shopImage },
          { role: "inspection", column: 2, image: inspectionImage },
        ],
      }
    );
  }
  return blocks;
}

export function assembleReportDocument(report: InspectionReport, images: SignatureImages = {}): ReportDocument {
  const config = report.springConfiguration;
  const blocks: ReportBlock[] = [
    { kind: "title", text: REPORT_TITLE },
    { kind: "spacer", heightPt: 6 },
    coachIdentityBlock(report),
    { kind: "spacer", heightPt: 8 },
    ...springConfigurationBlocks(config),
    ...defectBlocks(report),
    { kind: "spacer", heightPt: 10 },
    ...checklistBlocks("Visual Inspection - Bogie 1", report.visualBogie1, config, SECTION_COLORS.visual),
    ...checklistBlocks("Visual Inspection - Bogie 2", report.visualBogie2, config, SECTION_COLORS.visual),
    ...checklistBlocks("Must Do - Bogie 1", report.mustDoBogie1, config, SECTION_COLORS.mustDo),
    ...checklistBlocks("Must Do - Bogie 2", report.mustDoBogie2, config, SECTION_COLORS.mustDo),
    ...signatureBlocks(report, images),
  ];

  return {
    title: `Spring Inspection Report ${toCellText(report.coachNumber)}`,
    creationDate: report.generatedAt,
    blocks,
  };
}
