/**
 * @fileoverview Platform composition root
 *
 * Builds every store, domain service and use case once from validated
 * configuration. AI collaborators are created only when an API key is
 * configured and their feature flag is on.
 *
 * @module @medisync/infrastructure/platform
 */

import { createLogger, logSecretsStatus, validateEnv, type AppEnv } from '@medisync/core';
import {
  ActivityService,
  DrugSafetyService,
  KnowledgeSearchService,
  PrescriptionService,
  RiskAssessmentService,
  ScanService,
  WellnessChatService,
  type ClinicalStores,
  type Clock,
} from '@medisync/application';
import {
  DrugInteractionChecker,
  KnowledgeLookupService,
  PrescriptionStandardizer,
  RiskScoringService,
  WellnessIntentMatcher,
} from '@medisync/domain';
import {
  OpenAIRiskEnricher,
  OpenAIWellnessResponder,
  createOpenAIClient,
  type ChatCompletionClient,
} from '@medisync/integrations';
import { createJsonFileStores } from './persistence/clinical-stores.js';

const logger = createLogger({ name: 'platform' });

// =============================================================================
// TYPES
// =============================================================================

export interface PlatformOptions {
  /** Environment to validate (default: process.env) */
  readonly env?: NodeJS.ProcessEnv;
  /** Replaces the JSON file stores under DATA_DIR */
  readonly stores?: ClinicalStores;
  /** Replaces the OpenAI client built from OPENAI_API_KEY */
  readonly chatClient?: ChatCompletionClient;
  readonly clock?: Clock;
}

export interface Platform {
  readonly config: AppEnv;
  readonly stores: ClinicalStores;
  readonly riskAssessment: RiskAssessmentService;
  readonly knowledgeSearch: KnowledgeSearchService;
  readonly prescriptions: PrescriptionService;
  readonly scans: ScanService;
  readonly wellnessChat: WellnessChatService;
  readonly drugSafety: DrugSafetyService;
  readonly activity: ActivityService;
  /** Which optional AI collaborators were wired */
  readonly aiFeatures: {
    readonly riskEnrichment: boolean;
    readonly wellnessReplies: boolean;
  };
}

// =============================================================================
// FACTORY
// =============================================================================

function createChatClient(config: AppEnv): ChatCompletionClient | null {
  if (!config.OPENAI_API_KEY) {
    return null;
  }
  return createOpenAIClient({ apiKey: config.OPENAI_API_KEY, model: config.OPENAI_MODEL });
}

/**
 * Create the platform services
 *
 * @throws Error when the environment fails validation
 */
export function createPlatform(options: PlatformOptions = {}): Platform {
  const source = options.env ?? process.env;
  const config = validateEnv(source);
  logSecretsStatus(logger, source);

  const stores = options.stores ?? createJsonFileStores(config.DATA_DIR);
  const chatClient = options.chatClient ?? createChatClient(config);
  const enrichment =
    chatClient && config.RISK_AI_ENRICHMENT ? new OpenAIRiskEnricher(chatClient) : undefined;
  const responder =
    chatClient && config.WELLNESS_AI_REPLIES ? new OpenAIWellnessResponder(chatClient) : undefined;
  const clock = options.clock;

  const platform: Platform = {
    config,
    stores,
    riskAssessment: new RiskAssessmentService({
      scorer: new RiskScoringService({ enrichment }),
      riskPredictions: stores.riskPredictions,
      urgentQueue: stores.urgentQueue,
      ...(clock && { clock }),
    }),
    knowledgeSearch: new KnowledgeSearchService({
      lookup: new KnowledgeLookupService(),
      knowledgeQueries: stores.knowledgeQueries,
      ...(clock && { clock }),
    }),
    prescriptions: new PrescriptionService({
      standardizer: new PrescriptionStandardizer(),
      prescriptions: stores.prescriptions,
      ...(clock && { clock }),
    }),
    scans: new ScanService({ scans: stores.scans, ...(clock && { clock }) }),
    wellnessChat: new WellnessChatService({
      matcher: new WellnessIntentMatcher(),
      wellnessSessions: stores.wellnessSessions,
      responder,
      ...(clock && { clock }),
    }),
    drugSafety: new DrugSafetyService({
      checker: new DrugInteractionChecker(),
      interactionChecks: stores.interactionChecks,
      adverseReactions: stores.adverseReactions,
      ...(clock && { clock }),
    }),
    activity: new ActivityService({ stores, ...(clock && { clock }) }),
    aiFeatures: {
      riskEnrichment: enrichment !== undefined,
      wellnessReplies: responder !== undefined,
    },
  };

  logger.info(
    {
      service: config.SERVICE_NAME,
      dataDir: options.stores ? null : config.DATA_DIR,
      aiFeatures: platform.aiFeatures,
    },
    'Platform initialized'
  );
  return platform;
}
