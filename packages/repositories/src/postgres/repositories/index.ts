export { PgSegmentRepository } from './segment-repository.js';
export { PgSpeedObservationRepository } from './observation-repository.js';
export { createPgRepositoryContext } from './context.js';
export {
  rowToSegment,
  rowToObservation,
  toNumeric,
  fromNumeric,
  type SegmentRow,
  type SpeedObservationRow,
} from './mappers.js';
