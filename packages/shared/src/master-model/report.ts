/**
 * Report request bundle: everything the preparer supplies on top of the
 * stored failure rows when generating a coach inspection report.
 */
import { z } from "zod";
import { MustDoChecklistRowSchema, VisualChecklistRowSchema } from "./inspection";

export const SignatureInputSchema = z
  .object({
    name: z.string().trim().default(""),
    date: z.string().default(""),
  })
  .strict();

export const CoachReportRequestSchema = z
  .object({
    bogie1Number: z.string().trim().default(""),
    bogie2Number: z.string().trim().default(""),
    inspectorId: z.number().int().nullable().default(null),
    /** Session-only bogie corrections keyed by failure id; never written back. */
    bogieCorrections: z.record(z.string(), z.string().trim()).default({}),
    signatures: z
      .object({
        shop: SignatureInputSchema.default({}),
        inspection: SignatureInputSchema.default({}),
      })
      .strict()
      .default({}),
    checklists: z
      .object({
        visualBogie1: z.array(VisualChecklistRowSchema).optional(),
        visualBogie2: z.array(VisualChecklistRowSchema).optional(),
        mustDoBogie1: z.array(MustDoChecklistRowSchema).optional(),
        mustDoBogie2: z.array(MustDoChecklistRowSchema).optional(),
      })
      .strict()
      .default({}),
  })
  .strict();

export type SignatureInput = z.infer<typeof SignatureInputSchema>;
export type CoachReportRequest = z.infer<typeof CoachReportRequestSchema>;

export function parseCoachReportRequest(input: unknown) {
  return CoachReportRequestSchema.safeParse(input);
}
