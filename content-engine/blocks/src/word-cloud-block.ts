import { FieldSchema } from '../../fields/src/field-schema.js';
import { BooleanField, DictField, IntegerField, ListField, StringField } from '../../fields/src/field-types.js';
import { ExtractedContent } from '../../loader/src/definition-loader.js';
import { XmlElement, createElement } from '../../xml/src/xml-tree.js';
import { BaseBlockType } from './block-type.js';

/**
 * Word cloud block. Everything it needs lives in settings attributes; the definition file
 * is an empty `<word_cloud/>` carrying them.
 */
export class WordCloudBlockType extends BaseBlockType {
  readonly category = 'word_cloud';

  readonly schema = new FieldSchema([
    new StringField('display_name', {
      scope: 'settings',
      defaultValue: 'Word cloud',
      help: 'The display name for this component.'
    }),
    new StringField('instructions', {
      scope: 'settings',
      defaultValue: '',
      help: 'Add instructions to help learners understand how to use the word cloud.'
    }),
    new IntegerField('num_inputs', {
      scope: 'settings',
      defaultValue: 5,
      help: 'The number of text boxes available for learners to add words and sentences.'
    }),
    new IntegerField('num_top_words', {
      scope: 'settings',
      defaultValue: 250,
      help: 'The maximum number of words displayed in the generated word cloud.'
    }),
    new BooleanField('display_student_percents', {
      scope: 'settings',
      defaultValue: true,
      help: 'Statistics are shown for entered words near that word.'
    }),
    new BooleanField('submitted', {
      scope: 'user_state',
      defaultValue: false,
      help: 'Whether this learner has posted words to the cloud.'
    }),
    new ListField('student_words', { scope: 'user_state', defaultValue: [], help: 'Student answer.' }),
    new DictField('all_words', { scope: 'user_state_summary', defaultValue: {}, help: 'All possible words from all learners.' }),
    new DictField('top_words', { scope: 'user_state_summary', defaultValue: {}, help: 'Top num_top_words words for word cloud.' }),
    new DictField('xml_attributes', {
      scope: 'settings',
      defaultValue: {},
      help: 'Map of unhandled xml attributes, used only for storage between import and export'
    })
  ]);

  extractContent(): ExtractedContent {
    return { fields: {}, children: [] };
  }

  definitionToXml(): XmlElement {
    return createElement(this.category);
  }
}
