import { getLogContext } from "./log-context";
import { trace } from "@opentelemetry/api";

type LogLevel = "info" | "warn" | "error";

type LogFields = Record<string, unknown>;

// Signature images and database credentials must never reach log sinks.
const REDACT_KEY_PATTERN = /(password|token|secret|authorization|cookie|imagebytes|signatureimage|connectionstring)/i;
const MAX_REDACTION_DEPTH = 6;

function redactValue(value: unknown, depth = 0): unknown {
  if (depth >= MAX_REDACTION_DEPTH) return "[MAX_DEPTH]";
  if (value == null) return value;
  if (Buffer.isBuffer(value)) return `[BUFFER ${value.length} bytes]`;
  if (value instanceof Error) {
    return { name: value.name, message: value.message };
  }
  if (Array.isArray(value)) {
    return value.map((entry) => redactValue(entry, depth + 1));
  }
  if (typeof value === "object") {
    const output: Record<string, unknown> = {};
    for (const [key, entry] of Object.entries(value)) {
      if (REDACT_KEY_PATTERN.test(key)) {
        output[key] = "[REDACTED]";
      } else {
        output[key] = redactValue(entry, depth + 1);
      }
    }
    return output;
  }
  return value;
}

export function formatLogLine(level: LogLevel, message: string, fields?: LogFields): string {
  const context = getLogContext();
  const spanContext = trace.getActiveSpan()?.spanContext();
  const redacted = fields ? redactValue(fields) : undefined;
  const payload = {
    timestamp: new Date().toISOString(),
    level,
    message,
    requestId: context?.requestId ?? null,
    coachNo: context?.coachNo ?? null,
    traceId: spanContext?.traceId ?? null,
    spanId: spanContext?.spanId ?? null,
    ...(redacted && typeof redacted === "object" ? redacted : {}),
  };
  return JSON.stringify(payload);
}

function write(level: LogLevel, message: string, fields?: LogFields): void {
  const line = formatLogLine(level, message, fields);
  if (level === "error") {
    console.error(line);
    return;
  }
  if (level === "warn") {
    console.warn(line);
    return;
  }
  console.log(line);
}

export function logInfo(message: string, fields?: LogFields): void {
  write("info", message, fields);
}

export function logWarn(message: string, fields?: LogFields): void {
  write("warn", message, fields);
}

export function logError(message: string, fields?: LogFields): void {
  write("error", message, fields);
}
