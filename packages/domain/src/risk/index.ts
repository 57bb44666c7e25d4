export {
  RiskScoringService,
  classifyUrgency,
  ACCUMULATOR_OVERRIDE_THRESHOLD,
  DEFAULT_RECOMMENDATIONS,
  type RiskEnrichmentProvider,
  type RiskScoringServiceDeps,
} from './risk-scoring-service.js';
