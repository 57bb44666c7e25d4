/**
 * @fileoverview Risk Assessment Service
 *
 * Scores clinical input, records the prediction and routes HIGH and CRITICAL
 * results to the urgent review queue.
 *
 * @module application/use-cases/risk/RiskAssessmentService
 */

import { createLogger, generateRecordId } from '@medisync/core';
import type { RiskScoringService } from '@medisync/domain';
import {
  ClinicalInputSchema,
  type ClinicalInput,
  type ClinicalInputData,
  type RiskAssessment,
  type RiskLevel,
  type RiskPredictionRecord,
  type UrgentCase,
  type Urgency,
} from '@medisync/types';
import type { RecordCollection } from '../../ports/secondary/persistence/RecordCollection.js';
import type { UrgentQueue } from '../../ports/secondary/messaging/UrgentQueue.js';
import { parseInput } from '../../shared/validation.js';
import { systemClock, type Clock } from '../../shared/clock.js';
import { ownerOf, type RequestContext } from '../../shared/ownership.js';

// =============================================================================
// LOGGER
// =============================================================================

const logger = createLogger({ name: 'RiskAssessmentService' });

// =============================================================================
// TYPES
// =============================================================================

export interface RiskAssessmentServiceDeps {
  readonly scorer: RiskScoringService;
  readonly riskPredictions: RecordCollection<RiskPredictionRecord>;
  readonly urgentQueue: UrgentQueue;
  readonly clock?: Clock;
}

export interface TreatmentSearchLinks {
  readonly google: string;
  readonly pubmed: string;
}

export interface RiskAssessmentResponse extends RiskAssessment {
  readonly id: string;
  readonly treatmentSearch: TreatmentSearchLinks;
  readonly timestamp: string;
}

export interface UrgentQueueView {
  readonly count: number;
  readonly patients: readonly UrgentCase[];
}

const URGENT_TIERS: ReadonlySet<Urgency> = new Set(['HIGH', 'CRITICAL']);

export function treatmentSearchLinks(level: RiskLevel): TreatmentSearchLinks {
  const term = level.toLowerCase();
  return {
    google: `https://www.google.com/search?q=${term}+cardiovascular+risk+treatment+guidelines`,
    pubmed: `https://pubmed.ncbi.nlm.nih.gov/?term=${term}+risk+management+cardiology`,
  };
}

// =============================================================================
// SERVICE
// =============================================================================

export class RiskAssessmentService {
  private readonly scorer: RiskScoringService;
  private readonly riskPredictions: RecordCollection<RiskPredictionRecord>;
  private readonly urgentQueue: UrgentQueue;
  private readonly clock: Clock;

  constructor(deps: RiskAssessmentServiceDeps) {
    this.scorer = deps.scorer;
    this.riskPredictions = deps.riskPredictions;
    this.urgentQueue = deps.urgentQueue;
    this.clock = deps.clock ?? systemClock;
  }

  /**
   * Assess clinical input, applying documented defaults to missing fields
   *
   * @throws ValidationError when required fields are missing or malformed
   */
  async assess(
    data: ClinicalInputData,
    context: RequestContext = {}
  ): Promise<RiskAssessmentResponse> {
    const input = parseInput(ClinicalInputSchema, data, 'clinical input');
    const assessment = await this.scorer.assess(input);
    const timestamp = this.clock();
    const id = generateRecordId('risk');

    await this.riskPredictions.append({
      id,
      userId: ownerOf(context),
      input,
      result: assessment,
      timestamp,
    });

    logger.info(
      {
        predictionId: id,
        score: assessment.score,
        urgency: assessment.urgency,
        isAiEnhanced: assessment.isAiEnhanced,
      },
      'Risk assessment recorded'
    );

    if (URGENT_TIERS.has(assessment.urgency)) {
      await this.enqueueUrgent(input, assessment, timestamp);
    }

    return {
      ...assessment,
      id,
      treatmentSearch: treatmentSearchLinks(assessment.level),
      timestamp,
    };
  }

  /**
   * Queued urgent cases, highest score first
   */
  async listUrgent(): Promise<UrgentQueueView> {
    const cases = await this.urgentQueue.list();
    const patients = [...cases].sort((a, b) => b.score - a.score);
    return { count: patients.length, patients };
  }

  // ===========================================================================
  // PRIVATE METHODS
  // ===========================================================================

  /**
   * Queue failures are logged and never reach the caller
   */
  private async enqueueUrgent(
    input: ClinicalInput,
    assessment: RiskAssessment,
    timestamp: string
  ): Promise<void> {
    const urgentCase: UrgentCase = {
      id: generateRecordId('URG', 6),
      age: input.age,
      systolicBp: input.systolicBp,
      bloodSugar: input.bloodSugar,
      score: assessment.score,
      level: assessment.level,
      urgency: assessment.urgency,
      symptoms: input.symptoms,
      timestamp,
    };

    try {
      await this.urgentQueue.enqueue(urgentCase);
      logger.warn(
        { caseId: urgentCase.id, urgency: urgentCase.urgency, score: urgentCase.score },
        'Urgent case queued for review'
      );
    } catch (error) {
      logger.error({ err: error, caseId: urgentCase.id }, 'Failed to queue urgent case');
    }
  }
}
