export {
  KnowledgeSearchService,
  knowledgeSearchLinks,
  type KnowledgeSearchServiceDeps,
  type KnowledgeSearchResponse,
} from './KnowledgeSearchService.js';
