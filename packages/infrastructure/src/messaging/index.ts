export { InMemoryUrgentQueue } from './InMemoryUrgentQueue.js';
