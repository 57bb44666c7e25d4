/**
 * @fileoverview Secondary Port - UrgentQueue
 *
 * Receives high-urgency risk assessments for clinician follow-up.
 *
 * @module application/ports/secondary/messaging/UrgentQueue
 */

import type { UrgentCase } from '@medisync/types';

export interface UrgentQueue {
  enqueue(urgentCase: UrgentCase): Promise<void>;

  /** Cases in arrival order */
  list(): Promise<readonly UrgentCase[]>;

  size(): Promise<number>;
}
