import { describe, expect, it } from "vitest";
import { isUploadError, signatureRoleForField, validateMagicBytes } from "./signature-upload";

describe("validateMagicBytes", () => {
  it("accepts PNG and JPEG headers matching the declared type", () => {
    expect(validateMagicBytes(Buffer.from([0x89, 0x50, 0x4e, 0x47, 0x0d, 0x0a, 0x1a, 0x0a]), "image/png")).toBe(true);
    expect(validateMagicBytes(Buffer.from([0xff, 0xd8, 0xff, 0xe0]), "image/jpeg")).toBe(true);
  });

  it("rejects a header that belongs to another type", () => {
    expect(validateMagicBytes(Buffer.from([0xff, 0xd8, 0xff, 0xe0]), "image/png")).toBe(false);
  });

  it("rejects truncated headers and unlisted types", () => {
    expect(validateMagicBytes(Buffer.from([0x89, 0x50]), "image/png")).toBe(false);
    expect(validateMagicBytes(Buffer.from("GIF89a"), "image/gif")).toBe(false);
  });
});

describe("signatureRoleForField", () => {
  it("maps the two signature fields to their roles", () => {
    expect(signatureRoleForField("shopSignature")).toBe("shop");
    expect(signatureRoleForField("inspectionSignature")).toBe("inspection");
    expect(signatureRoleForField("toString")).toBeNull();
  });
});

describe("isUploadError", () => {
  it("recognizes upload error codes only", () => {
    expect(isUploadError("MIME_MISMATCH")).toBe(true);
    expect(isUploadError("COACH_NOT_FOUND")).toBe(false);
  });
});
