/**
 * Clinical Risk Scoring Service
 *
 * Deterministic additive scoring over two accumulators (cardiovascular and
 * metabolic) with an urgency override, plus an optional enrichment provider
 * whose validated output may replace parts of the baseline.
 *
 * @module domain/risk
 */

import { createLogger } from '@medisync/core';
import {
  RiskEnrichmentSchema,
  type ClinicalInput,
  type RiskAssessment,
  type RiskLevel,
  type RiskResult,
  type Urgency,
} from '@medisync/types';

const logger = createLogger({ name: 'risk-scoring' });

// ============================================================================
// INTERFACES
// ============================================================================

/**
 * External collaborator producing an enriched assessment for the same input.
 * The returned payload is untrusted and validated before use.
 */
export interface RiskEnrichmentProvider {
  enrich(input: ClinicalInput): Promise<unknown>;
}

/**
 * Service dependencies
 */
export interface RiskScoringServiceDeps {
  readonly enrichment?: RiskEnrichmentProvider | undefined;
}

interface Band {
  readonly min: number;
  readonly points: number;
  readonly label: string;
  readonly explanation?: string;
}

interface BloodPressureBand {
  readonly systolic: number;
  readonly diastolic: number;
  readonly points: number;
  readonly label: string;
  readonly explanation?: string;
}

interface SymptomGroup {
  readonly phrases: readonly string[];
  readonly points: number;
  readonly label: string;
  readonly explanation: string;
}

// ============================================================================
// SCORING RULES
// ============================================================================

const AGE_BANDS: readonly Band[] = Object.freeze([
  {
    min: 75,
    points: 25,
    label: 'Age ≥ 75',
    explanation: 'Very advanced age: critical CVD risk factor (+25pts)',
  },
  { min: 65, points: 15, label: 'Age 65–74' },
  { min: 45, points: 8, label: 'Age 45–64' },
]);

/** Evaluated top-down; either reading reaching a band selects it */
const BLOOD_PRESSURE_BANDS: readonly BloodPressureBand[] = Object.freeze([
  {
    systolic: 180,
    diastolic: 120,
    points: 40,
    label: 'Hypertensive Crisis (BP ≥ 180/120)',
    explanation: 'EMERGENCY: Hypertensive crisis. Immediate medical review required (+40pts)',
  },
  { systolic: 160, diastolic: 100, points: 20, label: 'Stage 2 Hypertension' },
  { systolic: 140, diastolic: 90, points: 12, label: 'Stage 1 Hypertension' },
  { systolic: 130, diastolic: 80, points: 6, label: 'Elevated Blood Pressure' },
]);

const CHOLESTEROL_BANDS: readonly Band[] = Object.freeze([
  { min: 240, points: 15, label: 'Hypercholesterolemia (≥240)' },
  { min: 200, points: 7, label: 'Borderline High Cholesterol' },
]);

const HEART_RATE_BANDS: readonly Band[] = Object.freeze([
  { min: 120, points: 15, label: 'Severe Tachycardia (HR ≥ 120)' },
  { min: 100, points: 6, label: 'Mild Tachycardia (100–119)' },
]);

const BLOOD_SUGAR_BANDS: readonly Band[] = Object.freeze([
  {
    min: 250,
    points: 35,
    label: 'Severe Hyperglycemia (≥250)',
    explanation: 'CRITICAL: Extreme blood sugar levels risk DKA/HHS (+35pts)',
  },
  { min: 126, points: 20, label: 'Diabetic Range (≥126)' },
  { min: 100, points: 10, label: 'Pre-diabetic Range (100–125)' },
]);

const BMI_BANDS: readonly Band[] = Object.freeze([
  { min: 40, points: 20, label: 'Class III Obesity (BMI ≥40)' },
  { min: 35, points: 14, label: 'Class II Obesity (BMI 35–39.9)' },
  { min: 30, points: 8, label: 'Obesity (BMI 30–34.9)' },
]);

const SMOKING_POINTS = Object.freeze({
  'Current Smoker': Object.freeze({
    points: 20,
    label: 'Current Smoker',
    explanation: 'Smoking: major reversible CVD risk factor (+20pts)',
  }),
  'Former Smoker': Object.freeze({ points: 8, label: 'Former Smoker', explanation: undefined }),
  'Non-Smoker': null,
} as const);

const FAMILY_HISTORY = Object.freeze({ points: 12, label: 'Family History of CVD' } as const);

const SYMPTOM_GROUPS: readonly SymptomGroup[] = Object.freeze([
  {
    phrases: Object.freeze(['chest pain', 'pressure', 'angina']),
    points: 30,
    label: 'Acute Chest Pain',
    explanation: 'RED FLAG: Chest pain indicates high risk of ACS/MI (+30pts)',
  },
  {
    phrases: Object.freeze(['shortness of breath', 'dyspnoea', 'difficulty breathing']),
    points: 20,
    label: 'Acute Dyspnoea',
    explanation:
      'RED FLAG: Shortness of breath can indicate cardiac or respiratory failure (+20pts)',
  },
  {
    phrases: Object.freeze(['syncope', 'fainted', 'blackout', 'passed out']),
    points: 25,
    label: 'Syncopal Episode',
    explanation: 'RED FLAG: Loss of consciousness requires cardiac/neurological rule-out (+25pts)',
  },
]);

/** Either accumulator alone at or above this escalates to CRITICAL */
export const ACCUMULATOR_OVERRIDE_THRESHOLD = 50;

const URGENCY_THRESHOLDS = Object.freeze([
  { min: 70, urgency: 'CRITICAL', level: 'High' },
  { min: 45, urgency: 'HIGH', level: 'High' },
  { min: 20, urgency: 'MODERATE', level: 'Medium' },
] as const);

export const DEFAULT_RECOMMENDATIONS: readonly string[] = Object.freeze([
  'Seek medical advice for accurate diagnosis',
  'Monitor vital signs regularly',
  'Maintain a balanced diet and regular exercise',
]);

// ============================================================================
// HELPERS
// ============================================================================

function firstBand(bands: readonly Band[], value: number): Band | undefined {
  return bands.find((band) => value >= band.min);
}

/**
 * Map accumulator totals to urgency tier and risk level
 */
export function classifyUrgency(
  cardiovascular: number,
  metabolic: number
): { urgency: Urgency; level: RiskLevel } {
  if (
    cardiovascular >= ACCUMULATOR_OVERRIDE_THRESHOLD ||
    metabolic >= ACCUMULATOR_OVERRIDE_THRESHOLD
  ) {
    return { urgency: 'CRITICAL', level: 'High' };
  }

  const total = cardiovascular + metabolic;
  const threshold = URGENCY_THRESHOLDS.find((t) => total >= t.min);
  return threshold
    ? { urgency: threshold.urgency, level: threshold.level }
    : { urgency: 'ROUTINE', level: 'Low' };
}

// ============================================================================
// RISK SCORING SERVICE
// ============================================================================

/**
 * RiskScoringService - rule-based clinical risk scoring with optional enrichment
 *
 * @example
 * ```typescript
 * const scorer = new RiskScoringService();
 * const input = ClinicalInputSchema.parse({ age: 80, systolicBp: 190, bloodSugar: 90 });
 *
 * scorer.score(input).urgency; // 'CRITICAL'
 * ```
 */
export class RiskScoringService {
  private readonly enrichment: RiskEnrichmentProvider | undefined;

  constructor(deps: RiskScoringServiceDeps = {}) {
    this.enrichment = deps.enrichment;
  }

  /**
   * Deterministic baseline score. No randomness, no I/O.
   */
  score(input: ClinicalInput): RiskResult {
    let cardiovascular = 0;
    let metabolic = 0;
    const factors: string[] = [];
    const explanations: string[] = [];

    const apply = (
      rule: { points: number; label: string; explanation?: string | undefined } | undefined,
      accumulator: 'cardiovascular' | 'metabolic'
    ): void => {
      if (!rule) return;
      if (accumulator === 'cardiovascular') {
        cardiovascular += rule.points;
      } else {
        metabolic += rule.points;
      }
      factors.push(rule.label);
      if (rule.explanation) {
        explanations.push(rule.explanation);
      }
    };

    // Cardiovascular
    apply(firstBand(AGE_BANDS, input.age), 'cardiovascular');
    apply(
      BLOOD_PRESSURE_BANDS.find(
        (band) => input.systolicBp >= band.systolic || input.diastolicBp >= band.diastolic
      ),
      'cardiovascular'
    );
    apply(firstBand(CHOLESTEROL_BANDS, input.cholesterol), 'cardiovascular');
    apply(SMOKING_POINTS[input.smoking] ?? undefined, 'cardiovascular');
    apply(firstBand(HEART_RATE_BANDS, input.heartRate), 'cardiovascular');
    if (input.familyHistoryCvd === 'yes') {
      apply(FAMILY_HISTORY, 'cardiovascular');
    }

    // Metabolic
    apply(firstBand(BLOOD_SUGAR_BANDS, input.bloodSugar), 'metabolic');
    apply(firstBand(BMI_BANDS, input.bmi), 'metabolic');

    // Acute symptoms, each group checked independently
    const symptoms = input.symptoms.toLowerCase();
    if (symptoms) {
      for (const group of SYMPTOM_GROUPS) {
        if (group.phrases.some((phrase) => symptoms.includes(phrase))) {
          apply(group, 'cardiovascular');
        }
      }
    }

    const { urgency, level } = classifyUrgency(cardiovascular, metabolic);

    return {
      score: cardiovascular + metabolic,
      level,
      urgency,
      factors,
      explanations,
      breakdown: { cardiovascular, metabolic },
    };
  }

  /**
   * Baseline score with optional enrichment overrides.
   * Enrichment failures never propagate: the baseline is returned instead.
   */
  async assess(input: ClinicalInput): Promise<RiskAssessment> {
    const baseline = this.score(input);
    const enrichment = await this.tryEnrich(input);

    if (!enrichment) {
      return {
        ...baseline,
        recommendations: [...DEFAULT_RECOMMENDATIONS],
        isAiEnhanced: false,
      };
    }

    return {
      score: enrichment.score ?? baseline.score,
      level: enrichment.risk_level ?? baseline.level,
      urgency: enrichment.urgency ?? baseline.urgency,
      factors: enrichment.key_findings ?? baseline.factors,
      explanations:
        enrichment.clinical_explanation !== undefined
          ? [enrichment.clinical_explanation]
          : baseline.explanations,
      recommendations: enrichment.recommendations ?? [],
      isAiEnhanced: true,
      breakdown: baseline.breakdown,
    };
  }

  // ==========================================================================
  // PRIVATE METHODS
  // ==========================================================================

  private async tryEnrich(input: ClinicalInput) {
    if (!this.enrichment) {
      return null;
    }

    try {
      const raw = await this.enrichment.enrich(input);
      const parsed = RiskEnrichmentSchema.safeParse(raw);
      if (!parsed.success) {
        logger.warn(
          { issues: parsed.error.issues.length },
          'Risk enrichment returned malformed data, using baseline'
        );
        return null;
      }
      return parsed.data;
    } catch (error) {
      logger.warn({ err: error }, 'Risk enrichment failed, using baseline');
      return null;
    }
  }
}
