// Re-export all protocol types

export * from './common.js';
export * from './segments.js';
export * from './observations.js';
export * from './latest.js';
export * from './geojson.js';
