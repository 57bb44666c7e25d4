/**
 * @fileoverview In-Memory Urgent Queue (Infrastructure Layer)
 *
 * Holds urgent cases for the lifetime of the process.
 *
 * @module @medisync/infrastructure/messaging/in-memory-urgent-queue
 */

import { createLogger } from '@medisync/core';
import type { UrgentQueue } from '@medisync/application';
import type { UrgentCase } from '@medisync/types';

const logger = createLogger({ name: 'in-memory-urgent-queue' });

export class InMemoryUrgentQueue implements UrgentQueue {
  private readonly cases: UrgentCase[] = [];

  async enqueue(urgentCase: UrgentCase): Promise<void> {
    this.cases.push(urgentCase);
    logger.debug({ caseId: urgentCase.id, size: this.cases.length }, 'Urgent case enqueued');
  }

  async list(): Promise<readonly UrgentCase[]> {
    return [...this.cases];
  }

  async size(): Promise<number> {
    return this.cases.length;
  }
}
