import type {
  AdverseReactionReport,
  InteractionCheckRecord,
  KnowledgeQueryRecord,
  PrescriptionRecord,
  RiskPredictionRecord,
  ScanRecord,
  WellnessSession,
} from '@medisync/types';
import type { RecordCollection } from './RecordCollection.js';
import type { UrgentQueue } from '../messaging/UrgentQueue.js';

/**
 * Every store the use cases read or write, built once by the composition root
 */
export interface ClinicalStores {
  readonly prescriptions: RecordCollection<PrescriptionRecord>;
  readonly scans: RecordCollection<ScanRecord>;
  readonly wellnessSessions: RecordCollection<WellnessSession>;
  readonly riskPredictions: RecordCollection<RiskPredictionRecord>;
  readonly interactionChecks: RecordCollection<InteractionCheckRecord>;
  readonly adverseReactions: RecordCollection<AdverseReactionReport>;
  readonly knowledgeQueries: RecordCollection<KnowledgeQueryRecord>;
  readonly urgentQueue: UrgentQueue;
}
