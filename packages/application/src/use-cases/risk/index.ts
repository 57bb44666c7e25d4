export {
  RiskAssessmentService,
  treatmentSearchLinks,
  type RiskAssessmentServiceDeps,
  type RiskAssessmentResponse,
  type TreatmentSearchLinks,
  type UrgentQueueView,
} from './RiskAssessmentService.js';
