/**
 * Cell text preparation for the printed report. pdfkit draws strings
 * literally, so the only work left is flattening structured values and
 * stripping characters the standard fonts cannot show.
 */

// C0 controls and DEL, except TAB and LF.
const CONTROL_CHARACTERS = /[\u0000-\u0008\u000B-\u001F\u007F]/g;

function isPlainObject(value: unknown): value is Record<string, unknown> {
  if (value === null || typeof value !== "object") return false;
  const proto = Object.getPrototypeOf(value);
  return proto === Object.prototype || proto === null;
}

export function toCellText(value: unknown): string {
  if (value === null || value === undefined) return "";
  const text = Array.isArray(value) || isPlainObject(value) ? JSON.stringify(value, null, 1) : String(value);
  return text.replace(/\r\n?/g, "\n").replace(CONTROL_CHARACTERS, "");
}

export const SIGNATURE_PLACEHOLDER = "__________________";

export function orPlaceholder(value: string | null | undefined): string {
  const text = toCellText(value);
  return text === "" ? SIGNATURE_PLACEHOLDER : text;
}
