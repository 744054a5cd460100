import { FieldSchema } from '../../fields/src/field-schema.js';
import { BooleanField, DictField, FieldValue, ListField, StringField } from '../../fields/src/field-types.js';
import {
  DefinitionSource,
  ExtractedContent,
  LoadContext,
  extractAsides,
  loadXmlFile
} from '../../loader/src/definition-loader.js';
import { formatFilepath } from '../../pointer/src/pointer-tag.js';
import { MalformedDefinition } from '../../shared/src/errors.js';
import { isJsonObject } from '../../shared/src/json.js';
import {
  XmlElement,
  createElement,
  deepCopy,
  findChildren,
  getAttribute,
  parseXml,
  removeChild,
  setAttribute,
  stringifyChildren
} from '../../xml/src/xml-tree.js';
import { Block } from './block.js';
import { BaseBlockType } from './block-type.js';

export type PollAnswer = {
  id: string;
  text: string;
};

const ANSWER_TAG = 'answer';

export function pollAnswers(value: FieldValue): PollAnswer[] {
  if (!Array.isArray(value)) {
    return [];
  }
  return value.filter(isJsonObject).flatMap(entry =>
    typeof entry.id === 'string'
      ? [{ id: entry.id, text: typeof entry.text === 'string' ? entry.text : '' }]
      : []
  );
}

/**
 * Poll block: a question (inner markup) followed by `<answer id="...">` children.
 *
 *   <poll_question display_name="Favourite colour">
 *     <p>Which colour?</p>
 *     <answer id="red">Red</answer>
 *     <answer id="blue">Blue</answer>
 *   </poll_question>
 */
export class PollBlockType extends BaseBlockType {
  readonly category = 'poll_question';

  readonly schema = new FieldSchema([
    new StringField('display_name', {
      scope: 'settings',
      defaultValue: 'poll_question',
      help: 'The display name for this component.'
    }),
    new BooleanField('voted', {
      scope: 'user_state',
      defaultValue: false,
      help: 'Whether this student has voted on the poll'
    }),
    new StringField('poll_answer', { scope: 'user_state', defaultValue: '', help: 'Student answer' }),
    new DictField('poll_answers', {
      scope: 'user_state_summary',
      defaultValue: {},
      help: 'Poll answers from all students'
    }),
    new ListField('answers', { scope: 'content', defaultValue: [], help: 'Poll answers from xml' }),
    new StringField('question', { scope: 'content', defaultValue: '', help: 'Poll question' }),
    new DictField('xml_attributes', {
      scope: 'settings',
      defaultValue: {},
      help: 'Map of unhandled xml attributes, used only for storage between import and export'
    })
  ]);

  extractContent(xml: XmlElement): ExtractedContent {
    if (findChildren(xml, ANSWER_TAG).length === 0) {
      throw new MalformedDefinition('Poll_question definition must include at least one \'answer\' tag', {
        category: this.category
      });
    }

    const question = deepCopy(xml);
    const answers: PollAnswer[] = [];
    for (const element of findChildren(question, ANSWER_TAG)) {
      const id = getAttribute(element, 'id');
      if (id) {
        answers.push({ id, text: stringifyChildren(element) });
      }
      removeChild(question, element);
    }

    return {
      fields: { answers, question: stringifyChildren(question) },
      children: []
    };
  }

  /**
   * `filename="x"` names `poll_question/x.xml`; the stub's own attributes are laid over
   * the loaded element.
   */
  resolveFilenameReference(xml: XmlElement, filename: string, context: LoadContext): DefinitionSource {
    const path = formatFilepath(xml.tag, filename, this.filenameExtension);
    const loaded = loadXmlFile(context.store, path, context.definitionId);
    return { kind: 'xml', xml: loaded, path, asideChildren: extractAsides(loaded, context.config) };
  }

  exportsToFile(): boolean {
    return false;
  }

  definitionToXml(block: Block): XmlElement {
    const question = block.getString('question');

    let element: XmlElement;
    try {
      element = parseXml(`<${this.category}>${question}</${this.category}>`);
    } catch {
      // Questions that are not well-formed markup are written as text
      element = createElement(this.category, {}, question || null);
    }
    setAttribute(element, 'display_name', block.getString('display_name'));

    for (const answer of pollAnswers(block.get('answers'))) {
      element.children.push(createElement(ANSWER_TAG, { id: answer.id }, answer.text || null));
    }
    return element;
  }
}
