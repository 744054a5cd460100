import { OlxConfig } from '../../../config/olx.js';
import { deserializeField } from '../../fields/src/field-codec.js';
import { FieldSchema } from '../../fields/src/field-schema.js';
import { MalformedEmbeddedMetadata, describeError } from '../../shared/src/errors.js';
import { JsonObject, JsonValue, isJsonObject } from '../../shared/src/json.js';
import { XmlElement } from '../../xml/src/xml-tree.js';

export const DEFINITION_METADATA_RAW = 'definition_metadata_raw';
export const DEFINITION_METADATA_ERROR = 'definition_metadata_err';

export type PolicyMapping = Record<string, JsonValue>;

/**
 * Metadata gathered for one definition node. `values` holds declared fields (and the
 * embedded-metadata diagnostics); `xmlAttributes` holds everything the block type does not
 * declare, kept verbatim so that export can write it back.
 */
export interface MetadataMapping {
  values: Record<string, JsonValue>;
  xmlAttributes: JsonObject;
}

/**
 * Read metadata attributes off a definition element. Strip-listed attributes are skipped,
 * declared fields are deserialized, and the rest land in `xmlAttributes` as strings.
 */
export function loadMetadata(xml: XmlElement, schema: FieldSchema, config: OlxConfig): MetadataMapping {
  const metadata: MetadataMapping = { values: {}, xmlAttributes: {} };

  for (const [attribute, value] of xml.attributes) {
    if (config.metadataToStrip.has(attribute)) continue;

    const field = schema.get(attribute);
    if (field) {
      metadata.values[attribute] = deserializeField(field, value);
    } else {
      metadata.xmlAttributes[attribute] = value;
    }
  }

  return metadata;
}

/**
 * Layer the JSON text of an inline `<meta>` element over the attribute metadata. A parse
 * failure is recorded under `definition_metadata_err` and the import carries on.
 */
export function applyDefinitionMetadata(
  metadata: MetadataMapping,
  raw: string | null,
  correlationId: string
): void {
  if (!raw) {
    return;
  }

  metadata.values[DEFINITION_METADATA_RAW] = raw;
  try {
    const parsed: JsonValue = JSON.parse(raw);
    if (!isJsonObject(parsed)) {
      throw new MalformedEmbeddedMetadata(raw, 'Embedded metadata must be a JSON object');
    }

    for (const [key, value] of Object.entries(parsed)) {
      if (key === 'xml_attributes' && isJsonObject(value)) {
        Object.assign(metadata.xmlAttributes, value);
      } else {
        metadata.values[key] = value;
      }
    }
  } catch (error) {
    console.debug(`[${correlationId}] Error in loading metadata ${JSON.stringify(raw)}:`, error);
    metadata.values[DEFINITION_METADATA_ERROR] = describeError(error);
  }
}

/**
 * Apply the course policy for this block. Keys the block type does not declare are kept
 * in `xmlAttributes` so that they export to XML unchanged.
 */
export function applyPolicy(metadata: MetadataMapping, policy: PolicyMapping, schema: FieldSchema): void {
  for (const [attribute, value] of Object.entries(policy)) {
    if (attribute === 'xml_attributes' && isJsonObject(value)) {
      Object.assign(metadata.xmlAttributes, value);
    } else if (schema.has(attribute)) {
      metadata.values[attribute] = value;
    } else {
      metadata.xmlAttributes[attribute] = value;
    }
  }
}

/**
 * Merge the three metadata sources. Precedence, lowest first: XML attributes, embedded
 * metadata, policy.
 */
export function mergeMetadata(
  xml: XmlElement,
  schema: FieldSchema,
  config: OlxConfig,
  sources: { definitionMetadata: string | null; policy: PolicyMapping; correlationId: string }
): MetadataMapping {
  const metadata = loadMetadata(xml, schema, config);
  applyDefinitionMetadata(metadata, sources.definitionMetadata, sources.correlationId);
  applyPolicy(metadata, sources.policy, schema);
  return metadata;
}
