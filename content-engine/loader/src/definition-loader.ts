import { OlxConfig } from '../../../config/olx.js';
import { FieldSchema } from '../../fields/src/field-schema.js';
import { DefinitionKey, UsageKey } from '../../fields/src/opaque-keys.js';
import { pointerPath } from '../../pointer/src/pointer-tag.js';
import { UnresolvedContentReference } from '../../shared/src/errors.js';
import { JsonValue } from '../../shared/src/json.js';
import {
  XmlElement,
  deepCopy,
  deleteAttribute,
  findChild,
  getAttribute,
  parseXml,
  removeChild
} from '../../xml/src/xml-tree.js';
import { resolveExistingPath } from './backcompat.js';
import { ResourceStore } from './resource-store.js';

/** `[resolvedPath, declaredFilename]`, kept on the block for export bookkeeping only. */
export type FilenamePair = [string, string | null];

export interface ExtractedContent {
  fields: Record<string, JsonValue>;
  children: UsageKey[];
}

export type DefinitionSource =
  | { kind: 'xml'; xml: XmlElement; path: string | null; asideChildren: XmlElement[] }
  | { kind: 'raw'; text: string; path: string };

export interface LoadContext {
  store: ResourceStore;
  definitionId: DefinitionKey;
  urlName: string;
  config: OlxConfig;
}

/**
 * The per-type part of loading. Everything else in this module is shared by all block types.
 */
export interface ContentExtractor {
  readonly category: string;
  readonly schema: FieldSchema;
  /** Extension of pointer definition files. */
  readonly filenameExtension: string;
  /** Whether an inline `<meta>` child carries JSON metadata for this type. */
  readonly embeddedMetadata: boolean;
  /** Extension of raw content files this type can load directly, if any. */
  readonly rawContentExtension: string | null;

  extractContent(xml: XmlElement): ExtractedContent;
  extractRawContent(text: string, path: string, definitionId: DefinitionKey): ExtractedContent;
  /**
   * Resolve an old-style `filename="..."` attribute to the file it names, or null when the
   * type keeps its content inline regardless.
   */
  resolveFilenameReference(xml: XmlElement, filename: string, context: LoadContext): DefinitionSource | null;
}

export interface Definition {
  fields: Record<string, JsonValue>;
  children: UsageKey[];
  filename: FilenamePair;
  asideChildren: XmlElement[];
  /** Raw JSON text of an inline `<meta>` element. */
  definitionMetadata: string | null;
}

/**
 * Read and parse an XML definition file, adding the path and definition to any failure.
 */
export function loadXmlFile(store: ResourceStore, path: string, definitionId: DefinitionKey): XmlElement {
  try {
    return parseXml(store.readText(path));
  } catch (error) {
    throw new UnresolvedContentReference(path, definitionId.toString(), error);
  }
}

export function readContentFile(store: ResourceStore, path: string, definitionId: DefinitionKey): string {
  try {
    return store.readText(path);
  } catch (error) {
    throw new UnresolvedContentReference(path, definitionId.toString(), error);
  }
}

/**
 * Detach aside fragments (children tagged with the aside family) from a loaded definition.
 */
export function extractAsides(xml: XmlElement, config: OlxConfig): XmlElement[] {
  const asides = xml.children.filter(child => getAttribute(child, 'xblock-family') === config.asideFamily);
  for (const aside of asides) {
    removeChild(xml, aside);
  }
  return asides;
}

/**
 * Remove every attribute named for a settings-scope field, except the excluded ones.
 */
export function cleanMetadataFromXml(
  xml: XmlElement,
  schema: FieldSchema,
  excludedFields: ReadonlySet<string> = new Set()
): void {
  for (const field of schema.byScope('settings')) {
    if (!excludedFields.has(field.name) && getAttribute(xml, field.name) !== undefined) {
      deleteAttribute(xml, field.name);
    }
  }
}

function takeEmbeddedMetadata(xml: XmlElement): string | null {
  const meta = findChild(xml, 'meta');
  if (!meta) {
    return null;
  }
  removeChild(xml, meta);
  return meta.text;
}

/**
 * Load the definition a pointer node refers to, searching backcompat locations when the
 * file is not at `{category}/{url_name}.{extension}`.
 */
export function loadDefinitionXml(
  node: XmlElement,
  extractor: ContentExtractor,
  context: LoadContext
): DefinitionSource {
  const { store, definitionId, config } = context;
  const extension = extractor.filenameExtension;
  const rawExtension = extractor.rawContentExtension;

  const filepath = pointerPath(node, node.tag, extension);
  const resolved = resolveExistingPath(
    store,
    filepath,
    candidate => candidate.endsWith(`.${extension}`) || (rawExtension !== null && candidate.endsWith(`.${rawExtension}`))
  );
  if (resolved !== filepath) {
    console.warn(`[${definitionId}] Definition file ${filepath} not found, using ${resolved}`);
  }

  if (rawExtension !== null && resolved.endsWith(`.${rawExtension}`) && !resolved.endsWith(`.${extension}`)) {
    return { kind: 'raw', text: readContentFile(store, resolved, definitionId), path: resolved };
  }

  const xml = loadXmlFile(store, resolved, definitionId);
  const asideChildren = extractAsides(xml, config);
  return { kind: 'xml', xml, path: resolved, asideChildren };
}

/**
 * Build the definition record from a loaded or inline source. The source element is not
 * modified: the content is extracted from a copy with its `<meta>` element and
 * settings attributes removed.
 */
export function loadDefinition(
  source: DefinitionSource,
  extractor: ContentExtractor,
  context: LoadContext
): Definition {
  if (source.kind === 'raw') {
    return {
      ...extractor.extractRawContent(source.text, source.path, context.definitionId),
      filename: [source.path, null],
      asideChildren: [],
      definitionMetadata: null
    };
  }

  const filename = getAttribute(source.xml, 'filename') ?? null;
  const referenced = filename === null
    ? null
    : extractor.resolveFilenameReference(source.xml, filename, context);
  const asideChildren = [...source.asideChildren];

  if (referenced?.kind === 'raw') {
    return {
      ...extractor.extractRawContent(referenced.text, referenced.path, context.definitionId),
      filename: [referenced.path, filename],
      asideChildren,
      definitionMetadata: null
    };
  }

  let definitionXml: XmlElement;
  let filepath = '';
  if (referenced) {
    definitionXml = referenced.xml;
    for (const [name, value] of source.xml.attributes) {
      definitionXml.attributes.set(name, value);
    }
    asideChildren.push(...referenced.asideChildren);
    filepath = referenced.path ?? '';
  } else {
    definitionXml = deepCopy(source.xml);
  }

  const definitionMetadata = extractor.embeddedMetadata ? takeEmbeddedMetadata(definitionXml) : null;
  cleanMetadataFromXml(definitionXml, extractor.schema);

  return {
    ...extractor.extractContent(definitionXml),
    filename: [filepath, filename],
    asideChildren,
    definitionMetadata
  };
}
