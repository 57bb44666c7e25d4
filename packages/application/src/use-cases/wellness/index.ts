export {
  WellnessChatService,
  type WellnessChatServiceDeps,
  type WellnessChatResponse,
} from './WellnessChatService.js';
