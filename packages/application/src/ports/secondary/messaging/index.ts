export type { UrgentQueue } from './UrgentQueue.js';
