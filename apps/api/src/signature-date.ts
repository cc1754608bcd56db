/**
 * Signature date normalization. Dates typed into the signature block are
 * free text; well-formed ISO dates and datetimes are canonicalized, anything
 * else is printed as typed.
 */

const ISO_DATETIME =
  /^(\d{4})-(\d{2})-(\d{2})[T ](\d{2}):(\d{2})(?::(\d{2})(?:[.,](\d{1,6}))?)?(Z|[+-]\d{2}:\d{2})?$/;

const DAYS_IN_MONTH = [31, 28, 31, 30, 31, 30, 31, 31, 30, 31, 30, 31];

function isCalendarDate(year: number, month: number, day: number): boolean {
  if (year < 1 || month < 1 || month > 12 || day < 1) return false;
  const leap = (year % 4 === 0 && year % 100 !== 0) || year % 400 === 0;
  const limit = month === 2 ? (leap ? 29 : 28) : DAYS_IN_MONTH[month - 1];
  return day <= limit;
}

function canonicalOffset(offset: string | undefined): string | null {
  if (!offset) return "";
  if (offset === "Z") return "+00:00";
  const hours = Number(offset.slice(1, 3));
  const minutes = Number(offset.slice(4, 6));
  if (hours > 23 || minutes > 59) return null;
  return offset;
}

function canonicalDateTime(text: string): string | null {
  const match = ISO_DATETIME.exec(text);
  if (!match) return null;
  const [, year, month, day, hour, minute, second = "00", fraction = "", offset] = match;
  if (!isCalendarDate(Number(year), Number(month), Number(day))) return null;
  if (Number(hour) > 23 || Number(minute) > 59 || Number(second) > 59) return null;
  const zone = canonicalOffset(offset);
  if (zone === null) return null;
  const micros = fraction.padEnd(6, "0");
  const fractionPart = /^0*$/.test(micros) ? "" : `.${micros}`;
  return `${year}-${month}-${day}T${hour}:${minute}:${second}${fractionPart}${zone}`;
}

export function normalizeSignatureDate(text: string | null | undefined): string | null {
  if (text === null || text === undefined) return null;
  const trimmed = String(text).trim();
  if (trimmed === "") return null;
  // Ten characters or fewer (a bare date at most) pass through as typed, unchecked.
  if (trimmed.length <= 10) return trimmed;
  return canonicalDateTime(trimmed) ?? trimmed;
}
