export { parseDurationSeconds, estimateSpeedKmh, roundTo } from './estimate.js';
export {
  gradeSpeed,
  SPEED_BANDS,
  UNKNOWN_SPEED_GRADE,
  type SpeedGrade,
  type SpeedLevel,
} from './grade.js';
