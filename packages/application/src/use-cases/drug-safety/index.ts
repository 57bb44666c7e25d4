export {
  DrugSafetyService,
  type DrugSafetyServiceDeps,
  type AdverseReactionReceipt,
  type AdverseReactionLog,
} from './DrugSafetyService.js';
