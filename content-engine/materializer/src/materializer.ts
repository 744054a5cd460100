import { Block, ScopeIds } from '../../blocks/src/block.js';
import { BlockType } from '../../blocks/src/block-type.js';
import { Definition } from '../../loader/src/definition-loader.js';
import { MetadataMapping } from '../../metadata/src/metadata-merger.js';
import { BlockRuntime } from '../../runtime/src/block-runtime.js';
import { FieldTypeError, OLX_ERROR_CODES } from '../../shared/src/errors.js';
import { JsonObject, JsonValue } from '../../shared/src/json.js';
import { XmlElement } from '../../xml/src/xml-tree.js';

const XML_ATTRIBUTES = 'xml_attributes';

/**
 * Field values to assign, definition content over metadata.
 */
function collectFieldData(metadata: MetadataMapping, definition: Definition): Map<string, JsonValue> {
  const fieldData = new Map<string, JsonValue>(Object.entries(metadata.values));
  for (const [name, value] of Object.entries(definition.fields)) {
    fieldData.set(name, value);
  }
  return fieldData;
}

function mergeXmlAttributes(block: Block, metadata: MetadataMapping, definition: Definition): void {
  if (!block.blockType.schema.has(XML_ATTRIBUTES)) {
    return;
  }
  const [resolvedPath, declaredFilename] = definition.filename;
  const merged: JsonObject = {
    ...block.xmlAttributes,
    ...metadata.xmlAttributes,
    filename: [resolvedPath, declaredFilename]
  };
  block.set(XML_ATTRIBUTES, merged);
}

/**
 * Attach the host's asides whose type matches one of the loaded fragments.
 */
export function attachAsides(block: Block, runtime: BlockRuntime, asideChildren: readonly XmlElement[]): void {
  if (asideChildren.length === 0) {
    return;
  }
  const tags = new Set(asideChildren.map(child => child.tag));
  for (const aside of runtime.getAsides(block)) {
    if (tags.has(aside.blockType)) {
      block.addAside(aside);
    }
  }
}

/**
 * Build a block from its merged metadata and loaded definition.
 *
 * Keys the block type does not declare are skipped with a warning, and so are values
 * the declared field type rejects.
 */
export function materialize(
  blockType: BlockType,
  runtime: BlockRuntime,
  keys: ScopeIds,
  metadata: MetadataMapping,
  definition: Definition
): Block {
  const block = runtime.constructBlock(blockType, keys);
  const correlationId = keys.usageId.toString();

  for (const [name, value] of collectFieldData(metadata, definition)) {
    const field = blockType.schema.get(name);
    if (!field) {
      console.warn(
        `[${correlationId}] ${OLX_ERROR_CODES.UNKNOWN_FIELD}: Imported ${blockType.category} block does not have field ${name} found in XML.`
      );
      continue;
    }
    if (name === XML_ATTRIBUTES) {
      continue;
    }

    try {
      block.set(name, field.fromJson(value));
    } catch (error) {
      if (!(error instanceof FieldTypeError)) {
        throw error;
      }
      console.warn(`[${correlationId}] ${error.code}: ${error.message}`);
    }
  }

  mergeXmlAttributes(block, metadata, definition);
  block.children = definition.children;
  attachAsides(block, runtime, definition.asideChildren);

  return block;
}
