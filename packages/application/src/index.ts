/**
 * @fileoverview Application Layer Package
 *
 * Use cases for clinical record keeping, composed over the domain services
 * and the secondary ports below.
 *
 * - **Secondary Ports**: storage and urgent-queue interfaces the use cases need
 * - **Use Cases**: risk assessment, knowledge search, prescriptions, scans,
 *   wellness chat, drug safety and activity views
 *
 * @module @medisync/application
 */

export * from './ports/secondary/index.js';
export * from './use-cases/index.js';
export * from './shared/index.js';
