// @roadspeed/runtime
// Segment registry, observation ingestion and the latest-speed view

// Error types
export {
  RuntimeError,
  ValidationError,
  UnknownSegmentError,
  SegmentInUseError,
  StoreUnavailableError,
  RefreshCancelledError,
  ConfigError,
} from './errors.js';

// Logging
export {
  createConsoleLogger,
  consoleLogger,
  silentLogger,
  createCapturingLogger,
  type Logger,
  type LogLevel,
  type LogEntry,
} from './logging.js';

// Configuration
export { loadConfig, REFRESH_POLICIES, type Config, type Env, type RefreshPolicy } from './config.js';

// Store failure classification
export { guardStore, isConnectionError, type GuardStoreOptions } from './store.js';

// Segment registry
export {
  createSegment,
  getSegment,
  listSegments,
  updateSegment,
  deleteSegment,
  type CreateSegmentInput,
  type UpdateSegmentInput,
} from './segments/index.js';

// Ingestion
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
} from './ingestion/index.js';

// Latest-speed view
export {
  LatestSpeedMaterializer,
  createLatestSpeedMaterializer,
  createRefreshScheduler,
  summarizeLatest,
  type LatestSpeedMaterializerOptions,
  type RefreshOptions,
  type RefreshScheduler,
  type RefreshSchedulerOptions,
  type RefreshTarget,
} from './materializer/index.js';

// Provider adapters
export {
  parseRouteMatrixResponse,
  observationsFromRouteMatrix,
  ingestRouteMatrix,
  isRouteMatrixCellOk,
  routeMatrixCellSchema,
  type RouteMatrixCell,
  type RouteMatrixSegment,
  type RouteMatrixObservationOptions,
  type IngestRouteMatrixInput,
} from './providers/index.js';

// Export
export { latestToFeatureCollection } from './export/index.js';
