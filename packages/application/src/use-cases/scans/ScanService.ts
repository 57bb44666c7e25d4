/**
 * @fileoverview Scan Service
 *
 * Keeps imaging scan metadata per user. Image files themselves are not stored.
 *
 * @module application/use-cases/scans/ScanService
 */

import { createLogger, generateRecordId, NotFoundError } from '@medisync/core';
import {
  ScanInputSchema,
  ScanPatchSchema,
  type ScanInput,
  type ScanPatch,
  type ScanRecord,
  type ScanType,
} from '@medisync/types';
import type { RecordCollection } from '../../ports/secondary/persistence/RecordCollection.js';
import { parseInput } from '../../shared/validation.js';
import { systemClock, type Clock } from '../../shared/clock.js';
import { isOwnedBy, ownerOf, type RequestContext } from '../../shared/ownership.js';

const logger = createLogger({ name: 'ScanService' });

export interface ScanServiceDeps {
  readonly scans: RecordCollection<ScanRecord>;
  readonly clock?: Clock;
}

export interface ScanList {
  readonly count: number;
  readonly scans: readonly ScanRecord[];
  readonly typeSummary: Partial<Record<ScanType, number>>;
}

export class ScanService {
  private readonly scans: RecordCollection<ScanRecord>;
  private readonly clock: Clock;

  constructor(deps: ScanServiceDeps) {
    this.scans = deps.scans;
    this.clock = deps.clock ?? systemClock;
  }

  /**
   * Record scan metadata; a patient ID is generated when none is given
   */
  async record(data: ScanInput, context: RequestContext = {}): Promise<ScanRecord> {
    const input = parseInput(ScanInputSchema, data, 'scan');
    const id = generateRecordId('SCN', 8, { uppercase: true });

    const record: ScanRecord = {
      id,
      patient: input.patient,
      patientId: input.patientId || generateRecordId('PT', 5, { uppercase: true }),
      type: input.type,
      region: input.region,
      notes: input.notes,
      physician: input.physician,
      date: this.clock(),
      userId: ownerOf(context),
      ...(input.filename !== undefined && { filename: input.filename }),
    };

    await this.scans.append(record);
    logger.info({ scanId: id, type: record.type }, 'Scan recorded');
    return record;
  }

  /**
   * Amend notes or region on a scan the user owns
   *
   * @throws NotFoundError when the scan is missing or owned by someone else
   */
  async update(id: string, patch: ScanPatch, userId: string): Promise<ScanRecord> {
    const changes = parseInput(ScanPatchSchema, patch, 'scan changes');
    await this.get(id, userId);

    const fields: Partial<ScanRecord> = { modifiedAt: this.clock() };
    if (changes.notes !== undefined) fields.notes = changes.notes;
    if (changes.region !== undefined) fields.region = changes.region;

    const updated = await this.scans.update(id, fields);
    logger.info({ scanId: id }, 'Scan updated');
    return updated;
  }

  /**
   * The user's scans with a count per scan type
   */
  async list(userId: string): Promise<ScanList> {
    const all = await this.scans.list();
    const scans = all.filter((scan) => isOwnedBy(scan, userId));
    const typeSummary: Partial<Record<ScanType, number>> = {};
    for (const scan of scans) {
      typeSummary[scan.type] = (typeSummary[scan.type] ?? 0) + 1;
    }
    return { count: scans.length, scans, typeSummary };
  }

  /**
   * @throws NotFoundError when the scan is missing or owned by someone else
   */
  async get(id: string, userId: string): Promise<ScanRecord> {
    const scan = await this.scans.findById(id);
    if (!scan || !isOwnedBy(scan, userId)) {
      throw new NotFoundError('Scan');
    }
    return scan;
  }
}
