export type { Identified, RecordCollection } from './RecordCollection.js';
export type { ClinicalStores } from './ClinicalStores.js';
