// Ingestion module - entry points for speed measurements into the store

export {
  recordObservation,
  recordObservations,
  queryObservations,
  listObservations,
  countObservations,
  type RecordObservationInput,
  type RecordObservationOptions,
  type RecordObservationOutcome,
  type RecordObservationsResult,
} from './observation.js';
