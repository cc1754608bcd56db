/**
 * Spring failure records: one row per observed spring defect on a coach.
 */
import { z } from "zod";
import { CoachTypeEnum } from "./spring-types";
import { ISODate, NonEmptyString, OptionalFormText } from "./primitives";

export const SpringFailureInputSchema = z
  .object({
    coachNo: NonEmptyString,
    coachType: CoachTypeEnum,
    coachCode: OptionalFormText,
    schedule: OptionalFormText,
    division: OptionalFormText,
    bogieNumber: OptionalFormText,
    receiptDate: ISODate,
    secondarySuspensionType: OptionalFormText,
    springType: OptionalFormText,
    springColour: OptionalFormText,
    failureType: OptionalFormText,
    location: OptionalFormText,
    locationInBogie: OptionalFormText,
    remarks: OptionalFormText,
    mfg: OptionalFormText,
    defectCount: z.number().int().min(1).default(1),
  })
  .strict();

export const SpringFailureUpdateSchema = z
  .object({
    coachNo: NonEmptyString,
    coachType: CoachTypeEnum,
    bogieNumber: OptionalFormText,
    springType: z.string().trim(),
    springColour: z.string().trim(),
    secondarySuspensionType: z.string().trim(),
    failureType: z.string().trim(),
    location: OptionalFormText,
    locationInBogie: OptionalFormText,
    remarks: OptionalFormText,
  })
  .partial()
  .strict();

export type SpringFailureInput = z.infer<typeof SpringFailureInputSchema>;
/** Shape accepted before normalization (optional fields may be omitted). */
export type SpringFailureDraft = z.input<typeof SpringFailureInputSchema>;
export type SpringFailureUpdate = z.infer<typeof SpringFailureUpdateSchema>;

export interface SpringFailure {
  id: string;
  coachNo: string;
  coachCode: string | null;
  coachType: string | null;
  schedule: string | null;
  division: string | null;
  bogieNumber: string | null;
  receiptDate: string | null;
  secondarySuspensionType: string | null;
  springType: string | null;
  springColour: string | null;
  failureType: string | null;
  location: string | null;
  locationInBogie: string | null;
  remarks: string | null;
  mfg: string | null;
  defectCount: number;
  createdAt: Date | null;
  updatedAt: Date | null;
}

export interface SpringFailureFilter {
  coachNos?: string[];
  failureTypes?: string[];
  springTypes?: string[];
  coachTypes?: string[];
}
