/**
 * @fileoverview Use Cases Index
 *
 * @module application/use-cases
 */

export * from './risk/index.js';
export * from './knowledge/index.js';
export * from './prescriptions/index.js';
export * from './scans/index.js';
export * from './wellness/index.js';
export * from './drug-safety/index.js';
export * from './activity/index.js';
