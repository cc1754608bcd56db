import { describe, expect, it } from "vitest";
import { normalizeSignatureDate } from "./signature-date";

describe("normalizeSignatureDate", () => {
  it("returns null for absent or blank input", () => {
    expect(normalizeSignatureDate(undefined)).toBeNull();
    expect(normalizeSignatureDate(null)).toBeNull();
    expect(normalizeSignatureDate("")).toBeNull();
    expect(normalizeSignatureDate("   ")).toBeNull();
  });

  it("keeps a valid ISO date", () => {
    expect(normalizeSignatureDate("2024-01-15")).toBe("2024-01-15");
    expect(normalizeSignatureDate(" 2024-02-29 ")).toBe("2024-02-29");
  });

  it("canonicalizes ISO datetimes", () => {
    expect(normalizeSignatureDate("2024-01-15 09:30")).toBe("2024-01-15T09:30:00");
    expect(normalizeSignatureDate("2024-01-15T09:30:05.5Z")).toBe("2024-01-15T09:30:05.500000+00:00");
    expect(normalizeSignatureDate("2024-01-15T09:30:05.000+05:30")).toBe("2024-01-15T09:30:05+05:30");
  });

  it("returns free text unchanged apart from trimming", () => {
    expect(normalizeSignatureDate("not-a-date")).toBe("not-a-date");
    expect(normalizeSignatureDate(" 15/01/2024 ")).toBe("15/01/2024");
    expect(normalizeSignatureDate("2023-02-29")).toBe("2023-02-29");
    expect(normalizeSignatureDate("2024-01-15T25:00")).toBe("2024-01-15T25:00");
    expect(normalizeSignatureDate("next monday morning")).toBe("next monday morning");
  });
});
