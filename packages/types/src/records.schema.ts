import { z } from 'zod';

import { ClinicalInputSchema, RiskAssessmentSchema, RiskLevelSchema, UrgencySchema } from './clinical.schema.js';
import { LookupConfidenceSchema } from './knowledge.schema.js';
import { MedicationRequestSchema } from './fhir.schema.js';

/**
 * Persisted record schemas
 * Every collection validates its file contents against one of these on load.
 */

const TimestampSchema = z.string().min(1);
const OwnerSchema = z.string().min(1).nullable();

// =============================================================================
// PRESCRIPTIONS
// =============================================================================

export const PrescriptionRecordSchema = z.object({
  id: z.string().min(1),
  patient: z.string(),
  physician: z.string(),
  timestamp: TimestampSchema,
  userId: OwnerSchema,
  filename: z.string().nullable(),
  fileSize: z.number().int().nonnegative(),
  notes: z.string(),
  fhir: MedicationRequestSchema,
  modifiedAt: TimestampSchema.optional(),
});

export const PrescriptionTextSchema = z.object({
  text: z.string().min(1),
  patientName: z.string().min(1).default('Unknown Patient'),
  physician: z.string().min(1).default('Unknown Physician'),
});

export const PrescriptionUploadSchema = z.object({
  filename: z.string().min(1),
  fileSize: z.number().int().nonnegative().default(0),
  patientName: z.string().default(''),
  physician: z.string().default(''),
  notes: z.string().default(''),
});

export const PrescriptionPatchSchema = z
  .object({
    notes: z.string(),
    physician: z.string(),
    patient: z.string(),
  })
  .partial();

// =============================================================================
// SCANS
// =============================================================================

export const ScanTypeSchema = z.enum(['mri', 'ct', 'xray', 'ultrasound', 'pet', 'other']);

export const ScanRecordSchema = z.object({
  id: z.string().min(1),
  patient: z.string(),
  patientId: z.string(),
  type: ScanTypeSchema,
  region: z.string(),
  notes: z.string(),
  physician: z.string(),
  date: TimestampSchema,
  userId: OwnerSchema,
  filename: z.string().optional(),
  modifiedAt: TimestampSchema.optional(),
});

export const ScanInputSchema = z.object({
  patient: z.string().min(1),
  patientId: z.string().default(''),
  type: ScanTypeSchema.default('other'),
  region: z.string().min(1).default('Unknown'),
  notes: z.string().default(''),
  physician: z.string().default(''),
  filename: z.string().min(1).optional(),
});

export const ScanPatchSchema = z
  .object({
    notes: z.string(),
    region: z.string().min(1),
  })
  .partial();

// =============================================================================
// WELLNESS
// =============================================================================

export const ChatTurnSchema = z.object({
  type: z.enum(['user', 'bot']),
  content: z.string(),
  timestamp: TimestampSchema,
});

export const WellnessSessionSchema = z.object({
  id: z.string().min(1),
  userId: OwnerSchema,
  messagePreview: z.string(),
  topic: z.string(),
  timestamp: TimestampSchema,
  messages: z.array(ChatTurnSchema).default([]),
});

export const ChatMessageSchema = z.object({
  message: z.string().min(1).max(2000),
});

// =============================================================================
// RISK
// =============================================================================

export const RiskPredictionRecordSchema = z.object({
  id: z.string().min(1),
  userId: OwnerSchema,
  input: ClinicalInputSchema,
  result: RiskAssessmentSchema,
  timestamp: TimestampSchema,
});

export const UrgentCaseSchema = z.object({
  id: z.string().min(1),
  age: z.number().int().nonnegative(),
  systolicBp: z.number().int(),
  bloodSugar: z.number(),
  score: z.number().int().nonnegative(),
  level: RiskLevelSchema,
  urgency: UrgencySchema,
  symptoms: z.string(),
  timestamp: TimestampSchema,
});

// =============================================================================
// DRUG SAFETY
// =============================================================================

export const InteractionSeveritySchema = z.enum(['critical', 'moderate', 'minor']);

export const InteractionCheckRequestSchema = z.object({
  drug1: z.string().min(1),
  drug2: z.string().min(1),
  patientAge: z.number().int().nonnegative().optional(),
  conditions: z.string().default(''),
});

export const InteractionCheckRecordSchema = z.object({
  id: z.string().min(1),
  userId: OwnerSchema,
  drug1: z.string(),
  drug2: z.string(),
  interactionFound: z.boolean(),
  severity: z.union([InteractionSeveritySchema, z.literal('none')]),
  timestamp: TimestampSchema,
});

export const AdverseReactionInputSchema = z.object({
  drug: z.string().min(1),
  patientId: z.string().min(1).default('Unknown'),
  reaction: z.string().min(1),
  severity: z.string().min(1),
});

export const AdverseReactionReportSchema = z.object({
  id: z.string().min(1),
  drug: z.string(),
  patientId: z.string(),
  reaction: z.string(),
  severity: z.string(),
  userId: OwnerSchema,
  timestamp: TimestampSchema,
});

// =============================================================================
// KNOWLEDGE QUERIES
// =============================================================================

export const KnowledgeQueryRecordSchema = z.object({
  id: z.string().min(1),
  userId: OwnerSchema,
  query: z.string(),
  answerPreview: z.string(),
  confidence: LookupConfidenceSchema,
  timestamp: TimestampSchema,
});

export const KnowledgeQuerySchema = z.object({
  query: z.string().trim().max(500),
});

// =============================================================================
// REPORTS
// =============================================================================

export const ReportOptionsSchema = z.object({
  includePrescriptions: z.boolean().default(true),
  includeRisk: z.boolean().default(true),
  includeChatbot: z.boolean().default(true),
  includeAdr: z.boolean().default(true),
  includeScans: z.boolean().default(true),
});

export type PrescriptionRecord = z.infer<typeof PrescriptionRecordSchema>;
export type PrescriptionText = z.infer<typeof PrescriptionTextSchema>;
export type PrescriptionTextInput = z.input<typeof PrescriptionTextSchema>;
export type PrescriptionUpload = z.input<typeof PrescriptionUploadSchema>;
export type PrescriptionPatch = z.infer<typeof PrescriptionPatchSchema>;
export type ScanType = z.infer<typeof ScanTypeSchema>;
export type ScanRecord = z.infer<typeof ScanRecordSchema>;
export type ScanInput = z.input<typeof ScanInputSchema>;
export type ScanPatch = z.infer<typeof ScanPatchSchema>;
export type ChatTurn = z.infer<typeof ChatTurnSchema>;
export type WellnessSession = z.infer<typeof WellnessSessionSchema>;
export type RiskPredictionRecord = z.infer<typeof RiskPredictionRecordSchema>;
export type UrgentCase = z.infer<typeof UrgentCaseSchema>;
export type InteractionSeverity = z.infer<typeof InteractionSeveritySchema>;
export type InteractionCheckRequest = z.input<typeof InteractionCheckRequestSchema>;
export type InteractionCheckRecord = z.infer<typeof InteractionCheckRecordSchema>;
export type AdverseReactionInput = z.input<typeof AdverseReactionInputSchema>;
export type AdverseReactionReport = z.infer<typeof AdverseReactionReportSchema>;
export type KnowledgeQueryRecord = z.infer<typeof KnowledgeQueryRecordSchema>;
export type ReportOptions = z.input<typeof ReportOptionsSchema>;
