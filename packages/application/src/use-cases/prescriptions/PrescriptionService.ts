/**
 * @fileoverview Prescription Service
 *
 * Standardizes typed prescriptions to FHIR, registers uploaded prescription
 * documents by metadata and lets owners amend their records.
 *
 * @module application/use-cases/prescriptions/PrescriptionService
 */

import { createLogger, generateRecordId, NotFoundError } from '@medisync/core';
import type { PrescriptionStandardizer } from '@medisync/domain';
import {
  PrescriptionPatchSchema,
  PrescriptionTextSchema,
  PrescriptionUploadSchema,
  type PrescriptionPatch,
  type PrescriptionRecord,
  type PrescriptionTextInput,
  type PrescriptionUpload,
} from '@medisync/types';
import type { RecordCollection } from '../../ports/secondary/persistence/RecordCollection.js';
import { parseInput } from '../../shared/validation.js';
import { systemClock, type Clock } from '../../shared/clock.js';
import { isOwnedBy, ownerOf, type RequestContext } from '../../shared/ownership.js';

const logger = createLogger({ name: 'PrescriptionService' });

export interface PrescriptionServiceDeps {
  readonly standardizer: PrescriptionStandardizer;
  readonly prescriptions: RecordCollection<PrescriptionRecord>;
  readonly clock?: Clock;
}

/** Uploading user; the display name fills blank patient and physician fields */
export interface Uploader {
  readonly userId: string;
  readonly displayName?: string | undefined;
}

export interface PrescriptionList {
  readonly count: number;
  readonly prescriptions: readonly PrescriptionRecord[];
}

function isVisibleTo(record: PrescriptionRecord, userId: string): boolean {
  return record.userId === null || isOwnedBy(record, userId);
}

export class PrescriptionService {
  private readonly standardizer: PrescriptionStandardizer;
  private readonly prescriptions: RecordCollection<PrescriptionRecord>;
  private readonly clock: Clock;

  constructor(deps: PrescriptionServiceDeps) {
    this.standardizer = deps.standardizer;
    this.prescriptions = deps.prescriptions;
    this.clock = deps.clock ?? systemClock;
  }

  /**
   * Convert prescription text to a FHIR MedicationRequest and keep the record
   */
  async standardize(
    data: PrescriptionTextInput,
    context: RequestContext = {}
  ): Promise<PrescriptionRecord> {
    const input = parseInput(PrescriptionTextSchema, data, 'prescription text');
    const id = generateRecordId('rx');
    const timestamp = this.clock();

    const record: PrescriptionRecord = {
      id,
      patient: input.patientName,
      physician: input.physician,
      timestamp,
      userId: ownerOf(context),
      filename: null,
      fileSize: 0,
      notes: '',
      fhir: this.standardizer.standardize(input, id, { createdAt: timestamp }),
    };

    await this.prescriptions.append(record);
    logger.info(
      { prescriptionId: id, code: record.fhir.medicationCodeableConcept.coding[0]?.code },
      'Prescription standardized'
    );
    return record;
  }

  /**
   * Record an uploaded prescription document; its contents are not parsed
   */
  async register(data: PrescriptionUpload, uploader: Uploader): Promise<PrescriptionRecord> {
    const upload = parseInput(PrescriptionUploadSchema, data, 'prescription upload');
    const id = generateRecordId('rx', 8, { uppercase: true });
    const timestamp = this.clock();
    const fallbackName = uploader.displayName ?? uploader.userId;
    const patient = upload.patientName || fallbackName;
    const physician = upload.physician || fallbackName;

    const record: PrescriptionRecord = {
      id,
      patient,
      physician,
      timestamp,
      userId: uploader.userId,
      filename: upload.filename,
      fileSize: upload.fileSize,
      notes: upload.notes,
      fhir: this.standardizer.fromUpload(
        { patient, physician, filename: upload.filename },
        id,
        { createdAt: timestamp }
      ),
    };

    await this.prescriptions.append(record);
    logger.info({ prescriptionId: id, fileSize: upload.fileSize }, 'Prescription upload registered');
    return record;
  }

  /**
   * Amend notes, physician or patient on a record the user owns
   *
   * @throws NotFoundError when the record is missing or owned by someone else
   */
  async update(id: string, patch: PrescriptionPatch, userId: string): Promise<PrescriptionRecord> {
    const changes = parseInput(PrescriptionPatchSchema, patch, 'prescription changes');
    const existing = await this.prescriptions.findById(id);
    if (!existing || !isOwnedBy(existing, userId)) {
      throw new NotFoundError('Prescription');
    }

    const fields: Partial<PrescriptionRecord> = { modifiedAt: this.clock() };
    if (changes.notes !== undefined) fields.notes = changes.notes;
    if (changes.physician !== undefined) fields.physician = changes.physician;
    if (changes.patient !== undefined) fields.patient = changes.patient;

    const updated = await this.prescriptions.update(id, fields);
    logger.info({ prescriptionId: id }, 'Prescription updated');
    return updated;
  }

  /**
   * The user's own records plus records created without an owner
   */
  async list(userId: string): Promise<PrescriptionList> {
    const all = await this.prescriptions.list();
    const prescriptions = all.filter((record) => isVisibleTo(record, userId));
    return { count: prescriptions.length, prescriptions };
  }

  /**
   * @throws NotFoundError when the record is missing or not visible to the user
   */
  async get(id: string, userId: string): Promise<PrescriptionRecord> {
    const record = await this.prescriptions.findById(id);
    if (!record || !isVisibleTo(record, userId)) {
      throw new NotFoundError('Prescription');
    }
    return record;
  }
}
