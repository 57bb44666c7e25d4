import { z } from 'zod';

export const KnowledgeSourceSchema = z.object({
  title: z.string().min(1),
  url: z.string().url(),
  organization: z.string().min(1),
});

export const KnowledgeEntrySchema = z.object({
  key: z.string().min(1),
  answer: z.string().min(1),
  sources: z.array(KnowledgeSourceSchema),
});

export const LookupConfidenceSchema = z.enum(['High', 'Moderate']);

export const LookupStageSchema = z.enum(['exact', 'alias', 'token', 'fallback']);

export const LookupResultSchema = z.object({
  answer: z.string(),
  sources: z.array(KnowledgeSourceSchema),
  confidence: LookupConfidenceSchema,
  /** Canonical key that answered the query; null for the templated fallback */
  matchedKey: z.string().nullable(),
  stage: LookupStageSchema,
});

export type KnowledgeSource = z.infer<typeof KnowledgeSourceSchema>;
export type KnowledgeEntry = z.infer<typeof KnowledgeEntrySchema>;
export type LookupConfidence = z.infer<typeof LookupConfidenceSchema>;
export type LookupStage = z.infer<typeof LookupStageSchema>;
export type LookupResult = z.infer<typeof LookupResultSchema>;
