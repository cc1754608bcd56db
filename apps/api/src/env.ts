import dotenv from "dotenv";
import path from "path";

// Load .env for local dev; deployed environments inject variables directly
dotenv.config({ path: path.resolve(__dirname, "..", "..", "..", ".env") });

export function isTestRuntime(): boolean {
  return process.env.NODE_ENV === "test" || process.env.VITEST === "true";
}

export function parsePositiveIntEnv(rawValue: string | undefined, fallback: number): number {
  const parsed = Number.parseInt(rawValue || "", 10);
  return Number.isFinite(parsed) && parsed > 0 ? parsed : fallback;
}

/** Comma-separated env list, trimmed, blanks dropped. */
export function parseListEnv(rawValue: string | undefined): string[] {
  return (rawValue || "")
    .split(",")
    .map((entry) => entry.trim())
    .filter(Boolean);
}
