/**
 * Signature image uploads for report generation. Images are held in memory
 * for one render and never persisted.
 */
import type { MultipartFile } from "@fastify/multipart";
import type { SignatureRole } from "./report-document";

export const UploadErrorCode = {
  /** Uploaded file has zero bytes. */
  EMPTY_FILE: "EMPTY_FILE",
  /** Declared MIME type is not PNG or JPEG. */
  INVALID_FILE_TYPE: "INVALID_FILE_TYPE",
  /** Magic bytes in the file header do not match the declared MIME type. */
  MIME_MISMATCH: "MIME_MISMATCH",
  /** File exceeds the configured signature size limit. */
  FILE_TOO_LARGE: "FILE_TOO_LARGE",
  /** File part under a field name other than shopSignature / inspectionSignature. */
  UNKNOWN_FILE_FIELD: "UNKNOWN_FILE_FIELD",
} as const;

export type UploadErrorCodeValue = (typeof UploadErrorCode)[keyof typeof UploadErrorCode];

export const UPLOAD_ERROR_DESCRIPTIONS: Record<UploadErrorCodeValue, string> = {
  EMPTY_FILE: "The uploaded file is empty (zero bytes).",
  INVALID_FILE_TYPE: "Only JPEG and PNG signature images are allowed.",
  MIME_MISMATCH: "The file content does not match its declared type.",
  FILE_TOO_LARGE: "The signature image exceeds the maximum allowed size.",
  UNKNOWN_FILE_FIELD: "Signature files must be sent as shopSignature or inspectionSignature.",
};

export function isUploadError(message: string): message is UploadErrorCodeValue {
  return Object.hasOwn(UPLOAD_ERROR_DESCRIPTIONS, message);
}

export const SIGNATURE_FIELD_ROLES: Readonly<Record<string, SignatureRole>> = {
  shopSignature: "shop",
  inspectionSignature: "inspection",
};

const MAGIC_BYTES: Array<{ mime: string; bytes: number[] }> = [
  { mime: "image/jpeg", bytes: [0xff, 0xd8, 0xff] }, // JPEG SOI
  { mime: "image/png", bytes: [0x89, 0x50, 0x4e, 0x47, 0x0d, 0x0a] }, // PNG signature
];

export const ALLOWED_SIGNATURE_MIME_TYPES = MAGIC_BYTES.map((rule) => rule.mime);

/** True when the first bytes of `header` match the signature of `declaredMime`. */
export function validateMagicBytes(header: Buffer, declaredMime: string): boolean {
  const rule = MAGIC_BYTES.find((candidate) => candidate.mime === declaredMime);
  if (!rule) return false;
  if (header.length < rule.bytes.length) return false;
  return rule.bytes.every((byte, index) => header[index] === byte);
}

export function signatureRoleForField(fieldname: string): SignatureRole | null {
  return Object.hasOwn(SIGNATURE_FIELD_ROLES, fieldname) ? SIGNATURE_FIELD_ROLES[fieldname] : null;
}

function isFileTooLargeError(error: unknown): boolean {
  return (
    typeof error === "object" &&
    error !== null &&
    "code" in error &&
    error.code === "FST_REQ_FILE_TOO_LARGE"
  );
}

/**
 * Buffers one signature part and checks it. Throws `new Error(UploadErrorCode.*)`.
 */
export async function readSignatureImage(part: MultipartFile): Promise<Buffer> {
  if (!ALLOWED_SIGNATURE_MIME_TYPES.includes(part.mimetype)) {
    // Drain the stream so the multipart parser can move on to the next part.
    part.file.resume();
    throw new Error(UploadErrorCode.INVALID_FILE_TYPE);
  }

  let buffer: Buffer;
  try {
    buffer = await part.toBuffer();
  } catch (error) {
    if (isFileTooLargeError(error)) throw new Error(UploadErrorCode.FILE_TOO_LARGE);
    throw error;
  }

  if (buffer.length === 0) throw new Error(UploadErrorCode.EMPTY_FILE);
  if (!validateMagicBytes(buffer, part.mimetype)) throw new Error(UploadErrorCode.MIME_MISMATCH);
  return buffer;
}
