// Segment registry

export {
  createSegment,
  getSegment,
  listSegments,
  updateSegment,
  deleteSegment,
  type CreateSegmentInput,
  type UpdateSegmentInput,
} from './registry.js';
