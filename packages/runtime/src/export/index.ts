export { latestToFeatureCollection } from './geojson.js';
