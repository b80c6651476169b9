// Latest-speed view

export {
  LatestSpeedMaterializer,
  createLatestSpeedMaterializer,
  type LatestSpeedMaterializerOptions,
  type RefreshOptions,
} from './materializer.js';

export {
  createRefreshScheduler,
  type RefreshScheduler,
  type RefreshSchedulerOptions,
  type RefreshTarget,
} from './scheduler.js';

export { summarizeLatest } from './summary.js';
