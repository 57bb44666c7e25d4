import { z } from 'zod';
import { RXNORM_SYSTEM, type MedicationRequest, type PrescriptionText } from '@medisync/types';
import { deepFreeze, loadDataFile } from '../shared/data-loader.js';

/**
 * Prescription standardization
 * Maps free prescription text to a FHIR MedicationRequest using the bundled
 * medication table (keyed by lowercase generic name).
 */

const MedicationSchema = z.object({
  code: z.string().min(1),
  display: z.string().min(1),
  dose: z.string().min(1),
  frequency: z.number().int().positive(),
  frequencyText: z.string().min(1),
});

const MedicationTableSchema = z.record(z.string().min(1), MedicationSchema);

export type Medication = z.infer<typeof MedicationSchema>;
export type MedicationTable = Readonly<Record<string, Medication>>;

/** Used when no known medication name appears in the text */
export const UNRECOGNIZED_MEDICATION: Medication = Object.freeze({
  code: 'AUTO',
  display: 'AI-Extracted Medication',
  dose: 'As prescribed',
  frequency: 1,
  frequencyText: 'as directed',
});

export const FHIR_META_SOURCE = 'MediSync-Standardizer';

let cachedTable: MedicationTable | undefined;

export function loadMedicationTable(): MedicationTable {
  cachedTable ??= deepFreeze(loadDataFile('medications.json', MedicationTableSchema));
  return cachedTable;
}

export interface StandardizeOptions {
  /** ISO timestamp recorded in resource meta */
  readonly createdAt: string;
}

export class PrescriptionStandardizer {
  private readonly medications: MedicationTable;

  constructor(medications: MedicationTable = loadMedicationTable()) {
    this.medications = medications;
  }

  /**
   * First table medication whose name appears in the text
   */
  identify(text: string): Medication {
    const lower = text.toLowerCase();
    const match = Object.entries(this.medications).find(([name]) => lower.includes(name));
    return match ? match[1] : UNRECOGNIZED_MEDICATION;
  }

  standardize(input: PrescriptionText, id: string, options: StandardizeOptions): MedicationRequest {
    const medication = this.identify(input.text);

    return {
      resourceType: 'MedicationRequest',
      id,
      status: 'active',
      intent: 'order',
      subject: { display: input.patientName },
      medicationCodeableConcept: {
        coding: [{ system: RXNORM_SYSTEM, code: medication.code, display: medication.display }],
      },
      dosageInstruction: [
        {
          text: `${medication.dose} ${medication.frequencyText}`,
          timing: { repeat: { frequency: medication.frequency, period: 1, periodUnit: 'd' } },
        },
      ],
      prescriber: { display: input.physician },
      meta: { source: FHIR_META_SOURCE, created: options.createdAt },
    };
  }

  /**
   * Placeholder resource for an uploaded document whose contents are not parsed
   */
  fromUpload(
    upload: { patient: string; physician: string; filename: string },
    id: string,
    options: StandardizeOptions
  ): MedicationRequest {
    return {
      resourceType: 'MedicationRequest',
      id,
      status: 'active',
      intent: 'order',
      subject: { display: upload.patient },
      medicationCodeableConcept: {
        coding: [
          {
            system: RXNORM_SYSTEM,
            code: UNRECOGNIZED_MEDICATION.code,
            display: UNRECOGNIZED_MEDICATION.display,
          },
        ],
      },
      dosageInstruction: [{ text: 'As extracted from uploaded document' }],
      prescriber: { display: upload.physician },
      meta: { source: upload.filename, created: options.createdAt },
    };
  }
}
