// Repository interfaces
// These define the contracts for data access, enabling substrate independence.

export type {
  SegmentRepository,
  CreateSegmentInput,
  UpdateSegmentInput,
} from './segment-repository.js';

export type {
  SpeedObservationRepository,
  AppendSpeedObservationInput,
  ObservationCountFilter,
} from './observation-repository.js';

export type {
  RepositoryContext,
} from './repository-context.js';
