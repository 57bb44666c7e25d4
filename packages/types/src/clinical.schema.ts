import { z } from 'zod';

/**
 * Clinical risk schemas
 *
 * ClinicalInputSchema applies the documented defaults, so a parsed input is
 * always complete before it reaches the scorer.
 */

export const SmokingStatusSchema = z.enum(['Non-Smoker', 'Former Smoker', 'Current Smoker']);

export const FamilyHistorySchema = z.enum(['yes', 'no']);

export const RiskLevelSchema = z.enum(['Low', 'Medium', 'High']);

export const UrgencySchema = z.enum(['ROUTINE', 'MODERATE', 'HIGH', 'CRITICAL']);

/**
 * Optional field that takes its default when omitted or sent as null
 */
function withDefault<T extends z.ZodTypeAny>(schema: T, fallback: z.output<T>) {
  return schema.nullish().transform((value): z.output<T> => value ?? fallback);
}

export const ClinicalInputSchema = z
  .object({
    age: z.number().int().nonnegative(),
    systolicBp: z.number().int(),
    diastolicBp: withDefault(z.number().int(), 80),
    /** mg/dL */
    bloodSugar: z.number(),
    bmi: withDefault(z.number(), 0),
    cholesterol: withDefault(z.number(), 0),
    smoking: withDefault(SmokingStatusSchema, 'Non-Smoker'),
    heartRate: withDefault(z.number().int(), 75),
    familyHistoryCvd: withDefault(FamilyHistorySchema, 'no'),
    symptoms: withDefault(z.string(), ''),
    medications: withDefault(z.string(), ''),
    gender: withDefault(z.string(), 'Unknown'),
  })
  .readonly();

export const RiskBreakdownSchema = z.object({
  cardiovascular: z.number().int().nonnegative(),
  metabolic: z.number().int().nonnegative(),
});

export const RiskResultSchema = z.object({
  score: z.number().int().nonnegative(),
  level: RiskLevelSchema,
  urgency: UrgencySchema,
  factors: z.array(z.string()),
  explanations: z.array(z.string()),
  breakdown: RiskBreakdownSchema,
});

/**
 * Payload accepted from an enrichment provider. Field names follow the
 * provider's JSON contract; every field is optional and overrides the
 * baseline only when present.
 */
export const RiskEnrichmentSchema = z.object({
  risk_level: RiskLevelSchema.optional(),
  urgency: UrgencySchema.optional(),
  score: z.number().int().min(0).max(100).optional(),
  key_findings: z.array(z.string()).optional(),
  clinical_explanation: z.string().optional(),
  recommendations: z.array(z.string()).optional(),
});

/**
 * Final assessment after optional enrichment
 */
export const RiskAssessmentSchema = z.object({
  score: z.number().int().nonnegative(),
  level: RiskLevelSchema,
  urgency: UrgencySchema,
  factors: z.array(z.string()),
  explanations: z.array(z.string()),
  recommendations: z.array(z.string()),
  isAiEnhanced: z.boolean(),
  breakdown: RiskBreakdownSchema,
});

export type SmokingStatus = z.infer<typeof SmokingStatusSchema>;
export type FamilyHistory = z.infer<typeof FamilyHistorySchema>;
export type RiskLevel = z.infer<typeof RiskLevelSchema>;
export type Urgency = z.infer<typeof UrgencySchema>;
export type ClinicalInput = z.infer<typeof ClinicalInputSchema>;
export type ClinicalInputData = z.input<typeof ClinicalInputSchema>;
export type RiskBreakdown = z.infer<typeof RiskBreakdownSchema>;
export type RiskResult = z.infer<typeof RiskResultSchema>;
export type RiskEnrichment = z.infer<typeof RiskEnrichmentSchema>;
export type RiskAssessment = z.infer<typeof RiskAssessmentSchema>;
