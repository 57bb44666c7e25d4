/**
 * @fileoverview Secondary Ports Index
 *
 * Secondary ports define what the application needs from infrastructure.
 *
 * @module application/ports/secondary
 */

// Messaging ports
export * from './messaging/index.js';

// Persistence ports
export * from './persistence/index.js';
