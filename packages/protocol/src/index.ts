// @roadspeed/protocol
// Shared types and pure helpers for road segment speed data.

export * from './types/index.js';
export * from './speed/index.js';
