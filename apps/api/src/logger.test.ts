import { describe, expect, it } from "vitest";
import { setLogContext } from "./log-context";
import { formatLogLine } from "./logger";

describe("formatLogLine", () => {
  it("redacts secrets and summarizes binary fields", () => {
    const line = JSON.parse(
      formatLogLine("warn", "SIGNATURE_IMAGE_EMBED_FAILED", {
        role: "shop",
        password: "test-secret",
        signatureImage: "raw",
        upload: { bytes: Buffer.from("abc"), apiToken: "test-token" },
        error: new Error("boom"),
      })
    );
    expect(line).toMatchObject({
      level: "warn",
      message: "SIGNATURE_IMAGE_EMBED_FAILED",
      traceId: null,
      spanId: null,
      role: "shop",
      password: "[REDACTED]",
      signatureImage: "[REDACTED]",
      upload: { bytes: "[BUFFER 3 bytes]", apiToken: "[REDACTED]" },
      error: { name: "Error", message: "boom" },
    });
  });

  it("carries the request and coach from the log context", () => {
    setLogContext({ requestId: "req-7", coachNo: "204512" });
    const line = JSON.parse(formatLogLine("info", "REPORT_GENERATED"));
    expect(line.requestId).toBe("req-7");
    expect(line.coachNo).toBe("204512");
  });
});
