/**
 * PDF painter for report documents (pdfkit, landscape A4, 12 mm margins).
 * Tables break across pages row by row and repeat their header where asked.
 */
import PDFDocument from "pdfkit";
import { inflateSync } from "zlib";
import { logWarn } from "./logger";
import { recordReportGenerated, recordSignatureEmbedFailure } from "./observability/metrics";
import { withReportSpan } from "./observability/tracing";
import {
  assembleReportDocument,
  type InspectionReport,
  type ReportBlock,
  type ReportDocument,
  type SignatureImages,
  type TableBlock,
  type TextRun,
} from "./report-document";
import { errorMessage } from "./errors";

type PdfDoc = PDFKit.PDFDocument;

const PT_PER_MM = 72 / 25.4;
const MARGIN_PT = 12 * PT_PER_MM;
const CELL_PADDING_PT = 3;
const GRID_COLOR = "#808080";
const TEXT_COLOR = "#000000";

export function mm(value: number): number {
  return value * PT_PER_MM;
}

function fontFor(run: { bold?: boolean; italic?: boolean }): string {
  if (run.bold && run.italic) return "Helvetica-BoldOblique";
  if (run.bold) return "Helvetica-Bold";
  if (run.italic) return "Helvetica-Oblique";
  return "Helvetica";
}

function pageBottom(doc: PdfDoc): number {
  return doc.page.height - doc.page.margins.bottom;
}

function contentWidth(doc: PdfDoc): number {
  return doc.page.width - doc.page.margins.left - doc.page.margins.right;
}

/** Starts a new page when `height` does not fit below the cursor. */
function ensureSpace(doc: PdfDoc, height: number): void {
  if (doc.y + height > pageBottom(doc)) {
    doc.addPage();
  }
}

function drawTitle(doc: PdfDoc, text: string): void {
  doc.font("Helvetica-Bold").fontSize(16).fillColor(TEXT_COLOR);
  const height = doc.heightOfString(text, { width: contentWidth(doc) });
  ensureSpace(doc, height);
  doc.text(text, doc.page.margins.left, doc.y, { width: contentWidth(doc), align: "center" });
  doc.y += 6;
}

function drawHeading(doc: PdfDoc, text: string): void {
  doc.font("Helvetica-Bold").fontSize(11).fillColor(TEXT_COLOR);
  // Keep a heading together with at least a line of what follows it.
  ensureSpace(doc, doc.heightOfString(text, { width: contentWidth(doc) }) + 24);
  doc.text(text, doc.page.margins.left, doc.y, { width: contentWidth(doc) });
  doc.y += 4;
}

function drawParagraph(doc: PdfDoc, runs: readonly TextRun[]): void {
  doc.fontSize(8).fillColor(TEXT_COLOR);
  ensureSpace(doc, doc.currentLineHeight(true));
  const x = doc.page.margins.left;
  const y = doc.y;
  runs.forEach((run, index) => {
    doc.font(fontFor(run));
    const continued = index < runs.length - 1;
    if (index === 0) {
      doc.text(run.text, x, y, { width: contentWidth(doc), continued });
    } else {
      doc.text(run.text, { continued });
    }
  });
}

function rowHeight(doc: PdfDoc, cells: readonly string[], widths: readonly number[], bold: boolean): number {
  doc.font(bold ? "Helvetica-Bold" : "Helvetica");
  let tallest = doc.currentLineHeight(true);
  cells.forEach((cell, index) => {
    const width = Math.max(1, (widths[index] ?? 0) - 2 * CELL_PADDING_PT);
    tallest = Math.max(tallest, doc.heightOfString(cell || " ", { width }));
  });
  return tallest + 2 * CELL_PADDING_PT;
}

function drawRow(
  doc: PdfDoc,
  table: TableBlock,
  cells: readonly string[],
  widths: readonly number[],
  y: number,
  height: number,
  isHeader: boolean
): void {
  const { style } = table;
  const background = isHeader ? style.headerBackground ?? style.background : style.background;
  const textColor = isHeader && style.headerTextColor ? style.headerTextColor : TEXT_COLOR;
  let x = doc.page.margins.left;

  widths.forEach((width, index) => {
    if (background) {
      doc.save().rect(x, y, width, height).fill(background).restore();
    }
    if (style.gridWidth > 0) {
      doc.save().lineWidth(style.gridWidth).strokeColor(GRID_COLOR).rect(x, y, width, height).stroke().restore();
    }
    const text = cells[index] ?? "";
    if (text) {
      const textWidth = Math.max(1, width - 2 * CELL_PADDING_PT);
      doc.font(isHeader ? "Helvetica-Bold" : "Helvetica").fillColor(textColor);
      let textY = y + CELL_PADDING_PT;
      if (style.verticalAlign === "middle") {
        const textHeight = doc.heightOfString(text, { width: textWidth });
        textY = y + (height - textHeight) / 2;
      }
      doc.text(text, x + CELL_PADDING_PT, textY, { width: textWidth });
    }
    x += width;
  });
}

function drawTable(doc: PdfDoc, table: TableBlock): void {
  const widths = table.columnWidthsMm.map(mm);
  doc.fontSize(table.style.fontSize);

  const header = table.header;
  const headerHeight = header ? rowHeight(doc, header, widths, true) : 0;
  const firstRowHeight = table.rows.length > 0 ? rowHeight(doc, table.rows[0], widths, false) : 0;

  ensureSpace(doc, headerHeight + firstRowHeight);
  let y = doc.y;
  if (header) {
    drawRow(doc, table, header, widths, y, headerHeight, true);
    y += headerHeight;
  }

  for (const row of table.rows) {
    const height = rowHeight(doc, row, widths, false);
    if (y + height > pageBottom(doc)) {
      doc.addPage();
      y = doc.page.margins.top;
      if (header && table.repeatHeader) {
        drawRow(doc, table, header, widths, y, headerHeight, true);
        y += headerHeight;
      }
    }
    drawRow(doc, table, row, widths, y, height, false);
    y += height;
  }

  doc.x = doc.page.margins.left;
  doc.y = y;
}

const PNG_SIGNATURE = Buffer.from([0x89, 0x50, 0x4e, 0x47, 0x0d, 0x0a, 0x1a, 0x0a]);
const PNG_CHANNELS: Record<number, number> = { 0: 1, 2: 3, 3: 1, 4: 2, 6: 4 };
// Adam7 passes as [xStart, yStart, xStep, yStep].
const ADAM7_PASSES = [
  [0, 0, 8, 8],
  [4, 0, 8, 8],
  [0, 4, 4, 8],
  [2, 0, 4, 4],
  [0, 2, 2, 4],
  [1, 0, 2, 2],
  [0, 1, 1, 2],
] as const;

/**
 * pdfkit inflates alpha and interlaced PNG pixels in a zlib callback, where a
 * decode error escapes every caller. Inflate and walk the scanlines up front so
 * a corrupt image throws here instead.
 */
function assertDecodablePng(image: Buffer): void {
  if (image.length < PNG_SIGNATURE.length || !image.subarray(0, PNG_SIGNATURE.length).equals(PNG_SIGNATURE)) {
    return;
  }

  let header: Buffer | undefined;
  const imageData: Buffer[] = [];
  let offset = PNG_SIGNATURE.length;
  while (offset + 8 <= image.length) {
    const length = image.readUInt32BE(offset);
    const type = image.toString("latin1", offset + 4, offset + 8);
    const dataEnd = offset + 8 + length;
    if (dataEnd > image.length) throw new Error(`PNG chunk ${type} is truncated`);
    const data = image.subarray(offset + 8, dataEnd);
    if (type === "IHDR") header = data;
    if (type === "IDAT") imageData.push(data);
    if (type === "IEND") break;
    offset = dataEnd + 4;
  }
  if (!header || header.length < 13) throw new Error("PNG has no image header");
  if (imageData.length === 0) throw new Error("PNG has no image data");

  const width = header.readUInt32BE(0);
  const height = header.readUInt32BE(4);
  const bitDepth = header[8];
  const channels = PNG_CHANNELS[header[9]];
  if (!channels) throw new Error(`PNG colour type ${header[9]} is not supported`);
  const bitsPerPixel = channels * bitDepth;

  const pixels = inflateSync(Buffer.concat(imageData));
  const passes = header[12] === 1 ? ADAM7_PASSES : ([[0, 0, 1, 1]] as const);
  let position = 0;
  for (const [x0, y0, dx, dy] of passes) {
    const passWidth = width > x0 ? Math.ceil((width - x0) / dx) : 0;
    const passHeight = height > y0 ? Math.ceil((height - y0) / dy) : 0;
    if (passWidth === 0 || passHeight === 0) continue;
    const rowBytes = Math.ceil((passWidth * bitsPerPixel) / 8);
    for (let row = 0; row < passHeight; row += 1) {
      const filter = pixels[position];
      if (filter === undefined) throw new Error("PNG image data is shorter than its dimensions");
      if (filter > 4) throw new Error(`PNG scanline filter ${filter} is invalid`);
      position += 1 + rowBytes;
    }
  }
}

function drawSignatureImages(doc: PdfDoc, block: Extract<ReportBlock, { kind: "signatureImages" }>): void {
  const widths = block.columnWidthsMm.map(mm);
  const fit: [number, number] = [mm(block.fitMm.width), mm(block.fitMm.height)];
  ensureSpace(doc, fit[1]);
  const y = doc.y;

  for (const slot of block.slots) {
    if (!slot.image) continue;
    const x = doc.page.margins.left + widths.slice(0, slot.column).reduce((sum, width) => sum + width, 0);
    try {
      assertDecodablePng(slot.image);
      doc.image(slot.image, x, y, { fit });
    } catch (error) {
      logWarn("SIGNATURE_IMAGE_EMBED_FAILED", { role: slot.role, error: errorMessage(error) });
      recordSignatureEmbedFailure(slot.role);
    }
  }

  doc.x = doc.page.margins.left;
  doc.y = y + fit[1];
}

function drawBlock(doc: PdfDoc, block: ReportBlock): void {
  switch (block.kind) {
    case "title":
      drawTitle(doc, block.text);
      return;
    case "heading":
      drawHeading(doc, block.text);
      return;
    case "paragraph":
      drawParagraph(doc, block.runs);
      return;
    case "table":
      drawTable(doc, block);
      return;
    case "signatureImages":
      drawSignatureImages(doc, block);
      return;
    case "spacer":
      doc.y += block.heightPt;
      return;
  }
}

/** Resolves with the finished PDF; rejects on any render error, never with partial output. */
export function renderReportPdf(document: ReportDocument): Promise<Buffer> {
  return new Promise((resolve, reject) => {
    const doc = new PDFDocument({
      size: "A4",
      layout: "landscape",
      margins: { top: MARGIN_PT, bottom: MARGIN_PT, left: MARGIN_PT, right: MARGIN_PT },
      info: {
        Title: document.title,
        CreationDate: document.creationDate,
        ModDate: document.creationDate,
      },
    });
    const chunks: Buffer[] = [];
    doc.on("data", (chunk: Buffer) => chunks.push(chunk));
    doc.on("end", () => resolve(Buffer.concat(chunks)));
    doc.on("error", reject);

    for (const block of document.blocks) {
      drawBlock(doc, block);
    }
    doc.end();
  });
}

export async function renderInspectionReport(
  report: InspectionReport,
  signatureImages: SignatureImages = {}
): Promise<Buffer> {
  return withReportSpan("report.render", { "coach.number": report.coachNumber }, async () => {
    const startedAt = process.hrtime.bigint();
    try {
      const buffer = await renderReportPdf(assembleReportDocument(report, signatureImages));
      recordReportGenerated(true, Number(process.hrtime.bigint() - startedAt) / 1e9);
      return buffer;
    } catch (error) {
      recordReportGenerated(false);
      throw error;
    }
  });
}
