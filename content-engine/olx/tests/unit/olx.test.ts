import { CourseKey } from '../../../fields/src/opaque-keys.js';
import { MemoryResourceStore } from '../../../loader/src/resource-store.js';
import { StaticPolicySource } from '../../../metadata/src/policy-source.js';
import { OlxRuntime } from '../../../runtime/src/block-runtime.js';
import { CourseIdGenerator } from '../../../runtime/src/id-generator.js';
import { MalformedDefinition, UnknownBlockTypeError, UnresolvedContentReference } from '../../../shared/src/errors.js';
import { createElement, parseXml, serializeXml } from '../../../xml/src/xml-tree.js';
import { createScopeIds, exportBlock, importBlock, parseOlx, roundTripBlocks } from '../../src/olx.js';

const idGenerator = new CourseIdGenerator(new CourseKey('Demo', 'OLX101', '2024'));

function runtimeFor(files: Record<string, string>, policy = new StaticPolicySource()): OlxRuntime {
  return new OlxRuntime({ resources: new MemoryResourceStore(files), idGenerator, policy });
}

describe('createScopeIds', () => {
  test('should derive ids from the tag and url_name', () => {
    const keys = createScopeIds(parseXml('<html url_name="intro"/>'), runtimeFor({}));

    expect(keys.blockType).toBe('html');
    expect(keys.userId).toBeNull();
    expect(keys.defId.toString()).toBe('def-v1:intro+type@html');
    expect(keys.usageId.blockId).toBe('intro');
  });
});

describe('importBlock', () => {
  beforeEach(() => {
    jest.spyOn(console, 'warn').mockImplementation(() => undefined);
    jest.spyOn(console, 'error').mockImplementation(() => undefined);
  });

  afterEach(() => {
    jest.restoreAllMocks();
  });

  test('should import an inline poll', () => {
    const block = parseOlx(
      '<poll_question url_name="p1" display_name="Colours" foo="bar"><p>Pick</p><answer id="red">Red</answer></poll_question>',
      runtimeFor({})
    );

    expect(block.urlName).toBe('p1');
    expect(block.get('display_name')).toBe('Colours');
    expect(block.get('question')).toBe('<p>Pick</p>');
    expect(block.get('answers')).toEqual([{ id: 'red', text: 'Red' }]);
    expect(block.get('xml_attributes')).toEqual({ foo: 'bar', filename: ['', null] });
  });

  test('should follow an html pointer to its definition and body files', () => {
    const runtime = runtimeFor({
      'html/intro.xml': '<html filename="intro" display_name="Intro" foo="bar"/>',
      'html/intro.html': '<p>Hi</p>'
    });

    const block = importBlock(parseXml('<html url_name="intro"/>'), runtime);

    expect(block.get('display_name')).toBe('Intro');
    expect(block.get('data')).toBe('<p>Hi</p>');
    expect(block.get('xml_attributes')).toEqual({ foo: 'bar', filename: ['html/intro.xml', 'html/intro.xml'] });
  });

  test('should load an html body when only the .html file exists', () => {
    const block = importBlock(parseXml('<html url_name="x1"/>'), runtimeFor({ 'html/x1.html': '<p>Only html</p>' }));

    expect(block.get('data')).toBe('<p>Only html</p>');
    expect(block.isSet('display_name')).toBe(false);
  });

  test('should raise UnresolvedContentReference for a missing pointer target', () => {
    expect(() => importBlock(parseXml('<word_cloud url_name="gone"/>'), runtimeFor({}))).toThrow(
      UnresolvedContentReference
    );
    expect(() => importBlock(parseXml('<word_cloud url_name="gone"/>'), runtimeFor({}))).toThrow(
      'path word_cloud/gone.xml'
    );
  });

  test('should apply policy over embedded metadata and attributes', () => {
    const runtime = runtimeFor(
      { 'word_cloud/w1.xml': '<word_cloud num_inputs="1" num_top_words="10"><meta>{"num_inputs": 2, "num_top_words": 20}</meta></word_cloud>' },
      new StaticPolicySource({ 'word_cloud/w1': { num_inputs: 3 } })
    );

    const block = importBlock(parseXml('<word_cloud url_name="w1"/>'), runtime);

    expect(block.get('num_inputs')).toBe(3);
    expect(block.get('num_top_words')).toBe(20);
  });

  test('should reject a poll without answers', () => {
    expect(() => parseOlx('<poll_question display_name="x"/>', runtimeFor({}))).toThrow(MalformedDefinition);
  });

  test('should carry character references through an html round trip', () => {
    const runtime = runtimeFor({});

    const block = parseOlx('<html url_name="h"><p>caf&#233;</p></html>', runtime);
    exportBlock(block, runtime);

    expect(block.get('data')).toBe('<p>caf\u00e9</p>');
    expect(runtime.exportResources.readText('html/h.html')).toBe('<p>caf\u00e9</p>');
  });

  test('should carry character references through poll answers', () => {
    const runtime = runtimeFor({});

    const block = parseOlx('<poll_question url_name="p"><answer id="y">Oui &#x2713;</answer></poll_question>', runtime);

    expect(block.get('answers')).toEqual([{ id: 'y', text: 'Oui \u2713' }]);
    expect(serializeXml(exportBlock(block, runtime).node)).toBe(
      '<poll_question url_name="p"><answer id="y">Oui \u2713</answer></poll_question>'
    );
  });

  test('should leave an integer setting unset when its value is too large to hold exactly', () => {
    const block = parseOlx('<word_cloud url_name="w" num_inputs="12345678901234567890"/>', runtimeFor({}));

    expect(block.isSet('num_inputs')).toBe(false);
    expect(block.get('num_inputs')).toBe(5);
    expect(console.warn).toHaveBeenCalledWith(
      '[block-v1:Demo+OLX101+2024+type@word_cloud+block@w] E-OLX-FIELD-TYPE: Value "12345678901234567890" is not valid for Integer field num_inputs'
    );
  });

  test('should reject tags without a block type', () => {
    expect(() => importBlock(parseXml('<video url_name="v1"/>'), runtimeFor({}))).toThrow(UnknownBlockTypeError);
  });
});

describe('roundTripBlocks', () => {
  beforeEach(() => {
    jest.spyOn(console, 'error').mockImplementation(() => undefined);
  });

  afterEach(() => {
    jest.restoreAllMocks();
  });

  test('should report every failed node and keep going', () => {
    const runtime = runtimeFor({ 'word_cloud/w1.xml': '<word_cloud/>' });
    const nodes = [
      createElement('word_cloud', { url_name: 'w1' }),
      createElement('word_cloud', { url_name: 'gone' }),
      parseXml('<poll_question url_name="p9" display_name="No answers"/>')
    ];

    const result = roundTripBlocks(nodes, runtime);

    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.errors.map(error => [error.correlationId, error.code])).toEqual([
        ['word_cloud/gone', 'E-OLX-UNRESOLVED-REFERENCE'],
        ['poll_question/p9', 'E-OLX-MALFORMED-DEFINITION']
      ]);
    }
  });

  test('should return imported blocks and their exports', () => {
    const runtime = runtimeFor({ 'word_cloud/w1.xml': '<word_cloud instructions="Go"/>' });

    const result = roundTripBlocks([createElement('word_cloud', { url_name: 'w1' })], runtime);

    expect(result.ok).toBe(true);
    if (result.ok) {
      expect(result.value).toHaveLength(1);
      expect(result.value[0].exported.filepath).toBe('word_cloud/w1.xml');
      expect(result.value[0].block.get('instructions')).toBe('Go');
    }
  });
});
