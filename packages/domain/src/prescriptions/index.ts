export {
  PrescriptionStandardizer,
  loadMedicationTable,
  UNRECOGNIZED_MEDICATION,
  FHIR_META_SOURCE,
  type Medication,
  type MedicationTable,
  type StandardizeOptions,
} from './prescription-standardizer.js';
