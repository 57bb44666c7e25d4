import { z } from 'zod';

/**
 * Minimal FHIR R4 MedicationRequest subset produced by prescription
 * standardization.
 */

export const RXNORM_SYSTEM = 'http://www.nlm.nih.gov/research/umls/rxnorm';

const ReferenceDisplaySchema = z.object({ display: z.string() });

export const CodingSchema = z.object({
  system: z.string(),
  code: z.string(),
  display: z.string(),
});

export const DosageInstructionSchema = z.object({
  text: z.string(),
  timing: z
    .object({
      repeat: z.object({
        frequency: z.number().int().positive(),
        period: z.number().positive(),
        periodUnit: z.enum(['h', 'd', 'wk']),
      }),
    })
    .optional(),
});

export const MedicationRequestSchema = z.object({
  resourceType: z.literal('MedicationRequest'),
  id: z.string(),
  status: z.enum(['active', 'on-hold', 'cancelled', 'completed', 'stopped', 'draft']),
  intent: z.enum(['proposal', 'plan', 'order']),
  subject: ReferenceDisplaySchema,
  medicationCodeableConcept: z.object({
    coding: z.array(CodingSchema).min(1),
  }),
  dosageInstruction: z.array(DosageInstructionSchema),
  prescriber: ReferenceDisplaySchema.optional(),
  meta: z
    .object({
      source: z.string(),
      created: z.string(),
    })
    .optional(),
});

export type Coding = z.infer<typeof CodingSchema>;
export type DosageInstruction = z.infer<typeof DosageInstructionSchema>;
export type MedicationRequest = z.infer<typeof MedicationRequestSchema>;
