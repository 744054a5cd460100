// OLX import/export entry points

export { RoundTripEntry, createScopeIds, exportBlock, importBlock, parseOlx, roundTripBlocks } from './olx.js';

export * from '../../xml/src/index.js';
export * from '../../fields/src/index.js';
export * from '../../pointer/src/index.js';
export * from '../../loader/src/index.js';
export * from '../../metadata/src/index.js';
export * from '../../blocks/src/index.js';
export * from '../../runtime/src/index.js';
export * from '../../materializer/src/index.js';
export { ExportResult } from '../../exporter/src/index.js';
export * from '../../shared/src/errors.js';
export * from '../../shared/src/result.js';
export * from '../../shared/src/json.js';
