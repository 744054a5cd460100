import { DEFAULT_FILENAME_EXTENSION } from '../../../config/olx.js';
import { FieldSchema } from '../../fields/src/field-schema.js';
import { DefinitionKey } from '../../fields/src/opaque-keys.js';
import {
  ContentExtractor,
  DefinitionSource,
  ExtractedContent,
  LoadContext
} from '../../loader/src/definition-loader.js';
import { ResourceStore } from '../../loader/src/resource-store.js';
import { MalformedDefinition } from '../../shared/src/errors.js';
import { XmlElement } from '../../xml/src/xml-tree.js';
import { Block } from './block.js';

/**
 * A block type plugs its content extraction and its definition export into the shared
 * loader and exporter.
 */
export interface BlockType extends ContentExtractor {
  /**
   * Element carrying the block's content for export. May write side content (such as a
   * raw body file) to `store`.
   */
  definitionToXml(block: Block, store: ResourceStore): XmlElement;
  /** Whether the definition element is written to its own file behind a pointer stub. */
  exportsToFile(block: Block): boolean;
}

/**
 * Base class for all block types
 */
export abstract class BaseBlockType implements BlockType {
  abstract readonly category: string;
  abstract readonly schema: FieldSchema;

  readonly filenameExtension: string = DEFAULT_FILENAME_EXTENSION;
  readonly embeddedMetadata: boolean = true;
  readonly rawContentExtension: string | null = null;

  abstract extractContent(xml: XmlElement): ExtractedContent;
  abstract definitionToXml(block: Block, store: ResourceStore): XmlElement;

  extractRawContent(_text: string, path: string, _definitionId: DefinitionKey): ExtractedContent {
    throw new MalformedDefinition(
      `${this.category} blocks cannot load raw content from ${path}`,
      { category: this.category, path }
    );
  }

  resolveFilenameReference(
    _xml: XmlElement,
    _filename: string,
    _context: LoadContext
  ): DefinitionSource | null {
    return null;
  }

  exportsToFile(_block: Block): boolean {
    return true;
  }
}
