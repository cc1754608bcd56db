import type { InspectionReport } from "./report-document";

export function buildInspectionReport(overrides: Partial<InspectionReport> = {}): InspectionReport {
  return {
    coachNumber: "204512",
    coachCode: "LWSCN",
    coachType: "LHB",
    secondaryType: "Air Spring",
    bogie1Number: "B-101",
    bogie2Number: "",
    dateOfReceipt: "2024-01-15T10:20:00",
    inspectorName: "A. Kumar",
    springConfiguration: new Map([
      ["Primary", 4],
      ["Secondary Outer", 2],
    ]),
    visualBogie1: [
      {
        activityId: 1,
        activityText: "Check for cracks",
        remarks: "",
        answers: { primary: "Satisfactory", secondaryouter: "Unsatisfactory" },
      },
    ],
    visualBogie2: [],
    mustDoBogie1: [],
    mustDoBogie2: [
      { activityId: 7, activityText: "Measure free height", remarks: "ok", answers: { primary: "Done", secondaryouter: "Done" } },
    ],
    defects: {
      bogie1: [
        { springType: "Primary", springNumber: "L1", defectCode: "BRK", defectDisplay: "Broken", location: "Axle box" },
      ],
      bogie2: [
        { springType: "Secondary Outer", springNumber: "R2", defectCode: "CRK", defectDisplay: "Cracked", location: "Centre" },
      ],
    },
    signatures: {
      shop: { name: "R. Sharma", date: "2024-01-16" },
      inspection: { name: "", date: null },
    },
    generatedAt: new Date("2024-01-16T08:00:00Z"),
    ...overrides,
  };
}

const CRC_TABLE = Array.from({ length: 256 }, (_, n) => {
  let c = n;
  for (let k = 0; k < 8; k += 1) c = c & 1 ? 0xedb88320 ^ (c >>> 1) : c >>> 1;
  return c >>> 0;
});

function crc32(bytes: Buffer): number {
  let crc = 0xffffffff;
  for (const byte of bytes) crc = CRC_TABLE[(crc ^ byte) & 0xff] ^ (crc >>> 8);
  return (crc ^ 0xffffffff) >>> 0;
}

function pngChunk(type: string, data: Buffer): Buffer {
  const length = Buffer.alloc(4);
  length.writeUInt32BE(data.length);
  const body = Buffer.concat([Buffer.from(type, "latin1"), data]);
  const crc = Buffer.alloc(4);
  crc.writeUInt32BE(crc32(body));
  return Buffer.concat([length, body, crc]);
}

/** 8-bit RGBA PNG (colour type 6) carrying `imageData` as its single IDAT chunk. */
export function rgbaPng(width: number, height: number, imageData: Buffer): Buffer {
  const header = Buffer.alloc(13);
  header.writeUInt32BE(width, 0);
  header.writeUInt32BE(height, 4);
  header[8] = 8;
  header[9] = 6;
  return Buffer.concat([
    Buffer.from([0x89, 0x50, 0x4e, 0x47, 0x0d, 0x0a, 0x1a, 0x0a]),
    pngChunk("IHDR", header),
    pngChunk("IDAT", imageData),
    pngChunk("IEND", Buffer.alloc(0)),
  ]);
}
