import { NotFoundError } from '@medisync/core';
import type {
  AdverseReactionReport,
  InteractionCheckRecord,
  KnowledgeQueryRecord,
  PrescriptionRecord,
  RiskPredictionRecord,
  ScanRecord,
  UrgentCase,
  WellnessSession,
} from '@medisync/types';
import type { ClinicalStores } from '../../ports/secondary/persistence/ClinicalStores.js';
import type {
  Identified,
  RecordCollection,
} from '../../ports/secondary/persistence/RecordCollection.js';
import type { UrgentQueue } from '../../ports/secondary/messaging/UrgentQueue.js';
import type { Clock } from '../../shared/clock.js';

/**
 * Test doubles for the secondary ports
 */

export class FakeCollection<T extends Identified> implements RecordCollection<T> {
  readonly records: T[] = [];

  constructor(readonly name: string) {}

  async list(): Promise<readonly T[]> {
    return [...this.records];
  }

  async findById(id: string): Promise<T | undefined> {
    return this.records.find((record) => record.id === id);
  }

  async append(record: T): Promise<void> {
    this.records.push(record);
  }

  async update(id: string, changes: Partial<T>): Promise<T> {
    const index = this.records.findIndex((record) => record.id === id);
    const existing = this.records[index];
    if (!existing) {
      throw new NotFoundError(this.name);
    }
    const updated = { ...existing, ...changes };
    this.records[index] = updated;
    return updated;
  }

  async count(): Promise<number> {
    return this.records.length;
  }
}

export class FakeUrgentQueue implements UrgentQueue {
  readonly cases: UrgentCase[] = [];
  failWith: Error | undefined;

  async enqueue(urgentCase: UrgentCase): Promise<void> {
    if (this.failWith) {
      throw this.failWith;
    }
    this.cases.push(urgentCase);
  }

  async list(): Promise<readonly UrgentCase[]> {
    return [...this.cases];
  }

  async size(): Promise<number> {
    return this.cases.length;
  }
}

export interface FakeStores extends ClinicalStores {
  readonly prescriptions: FakeCollection<PrescriptionRecord>;
  readonly scans: FakeCollection<ScanRecord>;
  readonly wellnessSessions: FakeCollection<WellnessSession>;
  readonly riskPredictions: FakeCollection<RiskPredictionRecord>;
  readonly interactionChecks: FakeCollection<InteractionCheckRecord>;
  readonly adverseReactions: FakeCollection<AdverseReactionReport>;
  readonly knowledgeQueries: FakeCollection<KnowledgeQueryRecord>;
  readonly urgentQueue: FakeUrgentQueue;
}

export function createFakeStores(): FakeStores {
  return {
    prescriptions: new FakeCollection('prescriptions'),
    scans: new FakeCollection('scans'),
    wellnessSessions: new FakeCollection('wellness sessions'),
    riskPredictions: new FakeCollection('risk predictions'),
    interactionChecks: new FakeCollection('interaction checks'),
    adverseReactions: new FakeCollection('adverse reactions'),
    knowledgeQueries: new FakeCollection('knowledge queries'),
    urgentQueue: new FakeUrgentQueue(),
  };
}

export function fixedClock(iso: string): Clock {
  return () => iso;
}

/**
 * Advances one minute per call from 2026-03-01T09:00:00.000Z
 */
export function steppingClock(start = Date.parse('2026-03-01T09:00:00.000Z')): Clock {
  let calls = 0;
  return () => new Date(start + calls++ * 60_000).toISOString();
}
