// Metadata module exports

export {
  DEFINITION_METADATA_ERROR,
  DEFINITION_METADATA_RAW,
  MetadataMapping,
  PolicyMapping,
  applyDefinitionMetadata,
  applyPolicy,
  loadMetadata,
  mergeMetadata
} from './metadata-merger.js';
export {
  PolicyDocument,
  PolicyDocumentSchema,
  PolicySource,
  StaticPolicySource,
  loadPolicyFile,
  policyKey
} from './policy-source.js';
