// Loader module exports

export {
  ContentExtractor,
  Definition,
  DefinitionSource,
  ExtractedContent,
  FilenamePair,
  LoadContext,
  cleanMetadataFromXml,
  extractAsides,
  loadDefinition,
  loadDefinitionXml,
  loadXmlFile,
  readContentFile
} from './definition-loader.js';
export { backcompatPaths, resolveExistingPath } from './backcompat.js';
export { ResourceStore, MemoryResourceStore, DiskResourceStore } from './resource-store.js';
