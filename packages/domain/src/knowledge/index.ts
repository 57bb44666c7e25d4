export {
  KnowledgeLookupService,
  tokenize,
  titleCase,
} from './knowledge-lookup-service.js';
export {
  loadKnowledgeBase,
  FallbackTemplatesSchema,
  type KnowledgeBaseData,
  type FallbackTemplates,
} from './knowledge-base.js';
