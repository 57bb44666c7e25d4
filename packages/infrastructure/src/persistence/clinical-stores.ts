/**
 * @fileoverview Store construction for the composition root
 *
 * @module @medisync/infrastructure/persistence/clinical-stores
 */

import { readFileSync } from 'fs';
import { join } from 'path';
import { fileURLToPath } from 'url';
import { z } from 'zod';
import { StoreOperationError, toError } from '@medisync/core';
import type { ClinicalStores } from '@medisync/application';
import {
  AdverseReactionReportSchema,
  InteractionCheckRecordSchema,
  KnowledgeQueryRecordSchema,
  PrescriptionRecordSchema,
  RiskPredictionRecordSchema,
  ScanRecordSchema,
  WellnessSessionSchema,
  type AdverseReactionReport,
  type InteractionCheckRecord,
  type KnowledgeQueryRecord,
  type PrescriptionRecord,
  type RiskPredictionRecord,
  type ScanRecord,
  type WellnessSession,
} from '@medisync/types';
import { JsonFileCollection } from './JsonFileCollection.js';
import { InMemoryCollection } from './InMemoryCollection.js';
import { InMemoryUrgentQueue } from '../messaging/InMemoryUrgentQueue.js';

/** File name of each collection inside the data directory */
export const STORE_FILES = {
  prescriptions: 'prescriptions.json',
  scans: 'scans.json',
  wellnessSessions: 'wellness-sessions.json',
  riskPredictions: 'risk-predictions.json',
  interactionChecks: 'interaction-checks.json',
  adverseReactions: 'adverse-reactions.json',
  knowledgeQueries: 'knowledge-queries.json',
} as const;

export interface JsonFileStoresOptions {
  /** Start empty collections from the bundled sample records (default: true) */
  readonly seed?: boolean;
}

/**
 * Read a bundled seed file
 */
export function loadSeed<T>(fileName: string, schema: z.ZodType<T, z.ZodTypeDef, unknown>): T[] {
  const path = fileURLToPath(new URL(`../../seed/${fileName}`, import.meta.url));
  try {
    return z.array(schema).parse(JSON.parse(readFileSync(path, 'utf-8')));
  } catch (error) {
    throw new StoreOperationError(fileName, 'load', 'seed file is invalid', toError(error));
  }
}

/**
 * One JSON file per collection under `dataDir`
 */
export function createJsonFileStores(
  dataDir: string,
  options: JsonFileStoresOptions = {}
): ClinicalStores {
  const seed = options.seed ?? true;
  const file = (name: keyof typeof STORE_FILES): string => join(dataDir, STORE_FILES[name]);

  return {
    prescriptions: new JsonFileCollection({
      name: 'prescriptions',
      filePath: file('prescriptions'),
      schema: PrescriptionRecordSchema,
      seed: seed ? loadSeed(STORE_FILES.prescriptions, PrescriptionRecordSchema) : [],
    }),
    scans: new JsonFileCollection({
      name: 'scans',
      filePath: file('scans'),
      schema: ScanRecordSchema,
      seed: seed ? loadSeed(STORE_FILES.scans, ScanRecordSchema) : [],
    }),
    wellnessSessions: new JsonFileCollection({
      name: 'wellness sessions',
      filePath: file('wellnessSessions'),
      schema: WellnessSessionSchema,
    }),
    riskPredictions: new JsonFileCollection({
      name: 'risk predictions',
      filePath: file('riskPredictions'),
      schema: RiskPredictionRecordSchema,
    }),
    interactionChecks: new JsonFileCollection({
      name: 'interaction checks',
      filePath: file('interactionChecks'),
      schema: InteractionCheckRecordSchema,
    }),
    adverseReactions: new JsonFileCollection({
      name: 'adverse reactions',
      filePath: file('adverseReactions'),
      schema: AdverseReactionReportSchema,
    }),
    knowledgeQueries: new JsonFileCollection({
      name: 'knowledge queries',
      filePath: file('knowledgeQueries'),
      schema: KnowledgeQueryRecordSchema,
    }),
    urgentQueue: new InMemoryUrgentQueue(),
  };
}

/**
 * Process-local stores; nothing reaches disk
 */
export function createInMemoryStores(): ClinicalStores {
  return {
    prescriptions: new InMemoryCollection<PrescriptionRecord>('prescriptions'),
    scans: new InMemoryCollection<ScanRecord>('scans'),
    wellnessSessions: new InMemoryCollection<WellnessSession>('wellness sessions'),
    riskPredictions: new InMemoryCollection<RiskPredictionRecord>('risk predictions'),
    interactionChecks: new InMemoryCollection<InteractionCheckRecord>('interaction checks'),
    adverseReactions: new InMemoryCollection<AdverseReactionReport>('adverse reactions'),
    knowledgeQueries: new InMemoryCollection<KnowledgeQueryRecord>('knowledge queries'),
    urgentQueue: new InMemoryUrgentQueue(),
  };
}
