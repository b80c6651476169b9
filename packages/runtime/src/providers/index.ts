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
} from './route-matrix.js';
