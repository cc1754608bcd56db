/**
 * Spring master data: spring type catalogue, defect codes, inspectors.
 */
import { z } from "zod";
import { NonEmptyString } from "./primitives";

export const CoachTypeEnum = z.enum(["VB", "LHB"]);

export const SpringTypeDefinitionSchema = z.object({
  id: z.number().int(),
  name: z.string(),
  applicableCoachTypes: z.array(z.string()).default([]),
  /** Springs of this type per bogie; consumers fall back to 4 when null. */
  maxPerBogie: z.number().int().min(0).nullable().default(null),
});

export const DefectTypeSchema = z.object({
  code: NonEmptyString,
  name: z.string(),
});

export const InspectorSchema = z.object({
  id: z.number().int(),
  name: NonEmptyString,
});

export type CoachType = z.infer<typeof CoachTypeEnum>;
export type SpringTypeDefinition = z.infer<typeof SpringTypeDefinitionSchema>;
export type DefectType = z.infer<typeof DefectTypeSchema>;
export type Inspector = z.infer<typeof InspectorSchema>;
