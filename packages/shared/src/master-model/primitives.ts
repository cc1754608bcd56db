/**
 * Primitive / reusable Zod types for the spring shop master model.
 */
import { z } from "zod";

// ---------------------------------------------------------------------------
// Scalars
// ---------------------------------------------------------------------------

export const NonEmptyString = z.string().trim().min(1);
export const ISODate = z.string().date();           // "YYYY-MM-DD"

/** Optional form text that is stored as NULL when blank. */
export const OptionalFormText = z
  .string()
  .trim()
  .nullish()
  .transform((value) => (value ? value : null));
