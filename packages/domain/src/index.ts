/**
 * @medisync/domain
 * Clinical risk scoring, knowledge lookup and supporting domain services
 */

export * from './risk/index.js';
export * from './knowledge/index.js';
export * from './wellness/index.js';
export * from './interactions/index.js';
export * from './prescriptions/index.js';
export * from './shared/index.js';
