// Re-export all schema tables
export * from './segments.js';
export * from './observations.js';
