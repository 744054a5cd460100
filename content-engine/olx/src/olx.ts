import { Block, ScopeIds } from '../../blocks/src/block.js';
import { ExportResult, exportBlock } from '../../exporter/src/exporter.js';
import {
  DefinitionSource,
  LoadContext,
  loadDefinition,
  loadDefinitionXml
} from '../../loader/src/definition-loader.js';
import { materialize } from '../../materializer/src/materializer.js';
import { mergeMetadata } from '../../metadata/src/metadata-merger.js';
import { isPointerTag, pointerPath } from '../../pointer/src/pointer-tag.js';
import { BlockRuntime } from '../../runtime/src/block-runtime.js';
import { OlxError } from '../../shared/src/errors.js';
import { Err, ModuleError, Ok, Result } from '../../shared/src/result.js';
import { XmlElement, getAttribute, parseXml } from '../../xml/src/xml-tree.js';

export function createScopeIds(node: XmlElement, runtime: BlockRuntime): ScopeIds {
  const defId = runtime.idGenerator.createDefinition(node.tag, getAttribute(node, 'url_name'));
  return {
    userId: null,
    blockType: node.tag,
    defId,
    usageId: runtime.idGenerator.createUsage(defId)
  };
}

/**
 * Import one OLX node, inline or pointer, into a block.
 *
 * Pointer definitions are read from `runtime.resources`. A definition that cannot be
 * found or parsed throws UnresolvedContentReference; recoverable problems are logged
 * and the import carries on.
 */
export function importBlock(node: XmlElement, runtime: BlockRuntime, keys?: ScopeIds): Block {
  const blockType = runtime.registry.get(node.tag);
  const scopeIds = keys ?? createScopeIds(node, runtime);
  const context: LoadContext = {
    store: runtime.resources,
    definitionId: scopeIds.defId,
    urlName: getAttribute(node, 'url_name') ?? scopeIds.usageId.blockId,
    config: runtime.config
  };

  const pointer = isPointerTag(node);
  const source: DefinitionSource = pointer
    ? loadDefinitionXml(node, blockType, context)
    : { kind: 'xml', xml: node, path: null, asideChildren: [] };

  const definition = loadDefinition(source, blockType, context);
  if (pointer) {
    const filepath = pointerPath(node, node.tag, blockType.filenameExtension);
    definition.filename = [filepath, filepath];
  }
  runtime.parseAsides(definition.asideChildren, scopeIds.usageId);

  const metadata = mergeMetadata(source.kind === 'xml' ? source.xml : node, blockType.schema, runtime.config, {
    definitionMetadata: definition.definitionMetadata,
    policy: runtime.getPolicy(scopeIds.usageId),
    correlationId: scopeIds.defId.toString()
  });

  return materialize(blockType, runtime, scopeIds, metadata, definition);
}

export function parseOlx(source: string, runtime: BlockRuntime, keys?: ScopeIds): Block {
  return importBlock(parseXml(source), runtime, keys);
}

export { exportBlock };

export interface RoundTripEntry {
  source: XmlElement;
  block: Block;
  exported: ExportResult;
}

function toModuleError(error: unknown, correlationId: string): ModuleError {
  if (error instanceof OlxError) {
    return { code: error.code, module: 'olx', data: { ...error.data, message: error.message }, correlationId };
  }
  const message = error instanceof Error ? error.message : String(error);
  return { code: 'E-OLX-UNEXPECTED', module: 'olx', data: { message }, correlationId };
}

/**
 * Import each node from `importRuntime` and export it through `exportRuntime`. Every node is
 * attempted; the result fails if any of them did.
 */
export function roundTripBlocks(
  nodes: readonly XmlElement[],
  importRuntime: BlockRuntime,
  exportRuntime: BlockRuntime = importRuntime
): Result<RoundTripEntry[], ModuleError[]> {
  const entries: RoundTripEntry[] = [];
  const errors: ModuleError[] = [];

  for (const source of nodes) {
    const correlationId = `${source.tag}/${getAttribute(source, 'url_name') ?? '(inline)'}`;
    try {
      const block = importBlock(source, importRuntime);
      entries.push({ source, block, exported: exportBlock(block, exportRuntime) });
    } catch (error) {
      console.error(`[${correlationId}] Round trip failed:`, error);
      errors.push(toModuleError(error, correlationId));
    }
  }

  return errors.length > 0 ? Err(errors) : Ok(entries);
}
