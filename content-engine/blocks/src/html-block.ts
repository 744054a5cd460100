import { posix } from 'path';
import { FieldSchema } from '../../fields/src/field-schema.js';
import { DefinitionKey } from '../../fields/src/opaque-keys.js';
import { BooleanField, DictField, StringField } from '../../fields/src/field-types.js';
import { resolveExistingPath } from '../../loader/src/backcompat.js';
import {
  DefinitionSource,
  ExtractedContent,
  LoadContext,
  readContentFile
} from '../../loader/src/definition-loader.js';
import { ResourceStore } from '../../loader/src/resource-store.js';
import { nameToPathname } from '../../pointer/src/pointer-tag.js';
import { XmlParseError } from '../../shared/src/errors.js';
import { XmlElement, createElement, parseXml, stringifyChildren } from '../../xml/src/xml-tree.js';
import { Block } from './block.js';
import { BaseBlockType } from './block-type.js';

const HTML_EXTENSION = 'html';

/**
 * Rich-text block. Its body is an HTML fragment, kept inline in the OLX or in a separate
 * `.html` file referenced through a `filename` attribute. Exports always use the file.
 */
export class HtmlBlockType extends BaseBlockType {
  readonly category = 'html';
  readonly embeddedMetadata = false;
  readonly rawContentExtension = HTML_EXTENSION;

  readonly schema = new FieldSchema([
    new StringField('display_name', {
      scope: 'settings',
      defaultValue: 'Text',
      help: 'The display name for this component.'
    }),
    new StringField('data', {
      scope: 'content',
      defaultValue: '',
      help: 'Html contents to display for this block'
    }),
    new StringField('source_code', {
      scope: 'settings',
      help: 'Source code for LaTeX documents. This feature is not well-supported.'
    }),
    new BooleanField('use_latex_compiler', {
      scope: 'settings',
      defaultValue: false,
      help: 'Enable LaTeX templates?'
    }),
    new StringField('editor', {
      scope: 'settings',
      defaultValue: 'visual',
      help: 'Visual or Raw editing of the HTML body.'
    }),
    new DictField('xml_attributes', {
      scope: 'settings',
      defaultValue: {},
      help: 'Map of unhandled xml attributes, used only for storage between import and export'
    })
  ]);

  // The body is the element's inner markup; the <html> tag itself must not end up in a page.
  extractContent(xml: XmlElement): ExtractedContent {
    return { fields: { data: stringifyChildren(xml) }, children: [] };
  }

  /** Bodies that are not well-formed markup are still loaded, with a warning. */
  extractRawContent(text: string, path: string, definitionId: DefinitionKey): ExtractedContent {
    try {
      parseXml(`<${this.category}>${text}</${this.category}>`);
    } catch (error) {
      if (!(error instanceof XmlParseError)) {
        throw error;
      }
      console.warn(`[${definitionId}] Couldn't parse html in ${path}: ${error.message}`);
    }
    return { fields: { data: text }, children: [] };
  }

  /**
   * `filename` is relative to the directory of the block's own pointer path, so
   * `url_name="week1:intro"` with `filename="intro"` reads `html/week1/intro.html`.
   */
  resolveFilenameReference(_xml: XmlElement, filename: string, context: LoadContext): DefinitionSource {
    const pointer = `${this.category}/${nameToPathname(context.urlName)}`;
    const filepath = resolveExistingPath(
      context.store,
      `${posix.dirname(pointer)}/${filename}.${HTML_EXTENSION}`
    );

    return {
      kind: 'raw',
      text: readContentFile(context.store, filepath, context.definitionId),
      path: filepath
    };
  }

  definitionToXml(block: Block, store: ResourceStore): XmlElement {
    const pathname = nameToPathname(block.urlName);
    const filepath = `${block.category}/${pathname}.${HTML_EXTENSION}`;

    store.makedirs(posix.dirname(filepath));
    store.writeText(filepath, block.getString('data'));

    return createElement('html', { filename: posix.basename(pathname) });
  }
}
