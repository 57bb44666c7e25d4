export {
  DrugInteractionChecker,
  loadDrugInteractions,
  type DrugInteraction,
  type InteractionCheckResult,
  type InteractionFound,
  type InteractionNotFound,
} from './drug-interaction-checker.js';
