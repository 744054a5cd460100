// Materializer module exports

export { attachAsides, materialize } from './materializer.js';
