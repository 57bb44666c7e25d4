/**
 * @medisync/types
 * Zod schemas and inferred types shared across the clinical core
 */

export * from './clinical.schema.js';
export * from './knowledge.schema.js';
export * from './fhir.schema.js';
export * from './records.schema.js';
