// Exporter module exports

export { ExportResult, exportBlock } from './exporter.js';
