import { posix } from 'path';
import { XML_NAMESPACES, notToCleanFields } from '../../../config/olx.js';
import { Block } from '../../blocks/src/block.js';
import { serializeField } from '../../fields/src/field-codec.js';
import { cleanMetadataFromXml } from '../../loader/src/definition-loader.js';
import { PolicyMapping } from '../../metadata/src/metadata-merger.js';
import { formatFilepath, nameToPathname } from '../../pointer/src/pointer-tag.js';
import { BlockRuntime } from '../../runtime/src/block-runtime.js';
import { describeError } from '../../shared/src/errors.js';
import {
  XmlElement,
  createElement,
  getAttribute,
  serializeXml,
  setAttribute
} from '../../xml/src/xml-tree.js';

export interface ExportResult {
  /** Pointer stub for side-file types, the full definition element otherwise. */
  node: XmlElement;
  /** Explicitly set fields that belong in the course policy file. */
  policy: PolicyMapping;
  /** Definition file written to the export store, if any. */
  filepath: string | null;
}

const ASIDE_WRAPPER_TAG = 'unknown_root';

function asideWrapper(): XmlElement {
  return createElement(ASIDE_WRAPPER_TAG, {
    'xmlns:option': XML_NAMESPACES.option,
    'xmlns:block': XML_NAMESPACES.block
  });
}

function appendAsides(element: XmlElement, block: Block, runtime: BlockRuntime): void {
  for (const aside of runtime.getAsides(block)) {
    if (!aside.needsSerialization()) continue;

    const node = asideWrapper();
    aside.addXmlToNode(node);
    if (getAttribute(node, 'xblock-family') === undefined) {
      setAttribute(node, 'xblock-family', runtime.config.asideFamily);
    }
    element.children.push(node);
  }
}

/**
 * Write the block's explicitly set settings onto its definition element. Returns the
 * fields routed to the policy file instead.
 */
function writeSettings(element: XmlElement, block: Block, runtime: BlockRuntime, notToClean: ReadonlySet<string>): PolicyMapping {
  const { metadataToStrip, metadataToExportToPolicy } = runtime.config;
  const policy: PolicyMapping = {};

  for (const name of block.explicitlySetFieldNames('settings').sort()) {
    if (metadataToStrip.has(name) || notToClean.has(name)) continue;

    try {
      const value = block.toJson(name);
      if (metadataToExportToPolicy.has(name)) {
        policy[name] = value;
      } else {
        setAttribute(element, name, serializeField(value));
      }
    } catch (error) {
      console.error(
        `[${block.location}] Failed to serialize metadata attribute ${name} in module ${block.urlName}: ${describeError(error)}`
      );
    }
  }

  for (const [name, value] of Object.entries(block.xmlAttributes)) {
    if (!metadataToStrip.has(name)) {
      setAttribute(element, name, serializeField(value));
    }
  }

  return policy;
}

function definitionFilepath(block: Block, extension: string): string {
  const name = block.category === 'course' ? block.location.courseKey.run : nameToPathname(block.urlName);
  return formatFilepath(block.category, name, extension);
}

/**
 * Export a block to OLX.
 *
 * Types that export to a file get their definition written to
 * `{category}/{name}.{extension}` on the export store and return a pointer stub; the
 * others return the definition element itself.
 */
export function exportBlock(block: Block, runtime: BlockRuntime): ExportResult {
  const { blockType } = block;
  const definition = blockType.definitionToXml(block, runtime.exportResources);

  appendAsides(definition, block, runtime);

  const notToClean = notToCleanFields(runtime.config, block.category);
  cleanMetadataFromXml(definition, blockType.schema, notToClean);
  definition.tag = block.category;

  const policy = writeSettings(definition, block, runtime, notToClean);

  let node: XmlElement;
  let filepath: string | null = null;
  if (blockType.exportsToFile(block)) {
    filepath = definitionFilepath(block, blockType.filenameExtension);
    runtime.exportResources.makedirs(posix.dirname(filepath));
    runtime.exportResources.writeText(filepath, `${serializeXml(definition)}\n`);
    node = createElement(block.category);
  } else {
    node = definition;
  }

  if (!getAttribute(node, 'url_name')) {
    setAttribute(node, 'url_name', block.urlName);
  }
  if (block.category === 'course') {
    setAttribute(node, 'org', block.location.courseKey.org);
    setAttribute(node, 'course', block.location.courseKey.course);
  }

  return { node, policy, filepath };
}
