/**
 * @fileoverview Infrastructure Layer Package
 *
 * Adapters for the application layer's secondary ports and the composition
 * root that wires them to the use cases.
 *
 * @module @medisync/infrastructure
 *
 * ## Architecture Overview
 *
 * ```
 *    APPLICATION LAYER                    INFRASTRUCTURE LAYER
 *   ┌─────────────────┐                  ┌─────────────────────┐
 *   │  Record         │─────implements──▶│  JSON file / memory │
 *   │  Collection     │                  │  collections        │
 *   │                 │                  │                     │
 *   │  Urgent         │─────implements──▶│  In-memory queue    │
 *   │  Queue          │                  │                     │
 *   └─────────────────┘                  └─────────────────────┘
 * ```
 */

export * from './persistence/index.js';
export * from './messaging/index.js';
export { createPlatform, type Platform, type PlatformOptions } from './platform.js';
