import { describe, expect, it } from "vitest";
import { orPlaceholder, SIGNATURE_PLACEHOLDER, toCellText } from "./report-text";

describe("toCellText", () => {
  it("renders absent values as empty text", () => {
    expect(toCellText(null)).toBe("");
    expect(toCellText(undefined)).toBe("");
  });

  it("stringifies scalars", () => {
    expect(toCellText(4)).toBe("4");
    expect(toCellText(false)).toBe("false");
  });

  it("renders arrays and plain objects as indented JSON", () => {
    expect(toCellText(["a", 1])).toBe('[\n "a",\n 1\n]');
    expect(toCellText({ note: "Löst" })).toBe('{\n "note": "Löst"\n}');
  });

  it("keeps markup characters literally", () => {
    expect(toCellText("<b>A & B</b>")).toBe("<b>A & B</b>");
  });

  it("normalizes line endings and strips control characters", () => {
    expect(toCellText("line1\r\nline2\rline3")).toBe("line1\nline2\nline3");
    expect(toCellText("a\u0000b\u0007c\td")).toBe("abc\td");
  });
});

describe("orPlaceholder", () => {
  it("substitutes the placeholder for blank values", () => {
    expect(orPlaceholder("")).toBe(SIGNATURE_PLACEHOLDER);
    expect(orPlaceholder(null)).toBe(SIGNATURE_PLACEHOLDER);
    expect(orPlaceholder("R. Sharma")).toBe("R. Sharma");
  });
});
