import { AsideDescriptor, Block, ScopeIds } from '../../../blocks/src/block.js';
import { BlockType } from '../../../blocks/src/block-type.js';
import { PollBlockType } from '../../../blocks/src/poll-block.js';
import { CourseKey, UsageKey } from '../../../fields/src/opaque-keys.js';
import { Definition } from '../../../loader/src/definition-loader.js';
import { MemoryResourceStore } from '../../../loader/src/resource-store.js';
import { OlxRuntime } from '../../../runtime/src/block-runtime.js';
import { CourseIdGenerator } from '../../../runtime/src/id-generator.js';
import { createElement } from '../../../xml/src/xml-tree.js';
import { attachAsides, materialize } from '../../src/materializer.js';

const course = new CourseKey('Demo', 'OLX101', '2024');
const idGenerator = new CourseIdGenerator(course);
const poll = new PollBlockType();

function scopeIds(name: string): ScopeIds {
  const defId = idGenerator.createDefinition('poll_question', name);
  return { userId: null, blockType: 'poll_question', defId, usageId: idGenerator.createUsage(defId) };
}

function definition(overrides: Partial<Definition> = {}): Definition {
  return {
    fields: { question: '<p>Pick</p>', answers: [{ id: 'a', text: 'A' }] },
    children: [],
    filename: ['', null],
    asideChildren: [],
    definitionMetadata: null,
    ...overrides
  };
}

function namedAside(blockType: string): AsideDescriptor {
  return { blockType, needsSerialization: () => false, addXmlToNode: () => undefined };
}

describe('materialize', () => {
  beforeEach(() => {
    jest.spyOn(console, 'warn').mockImplementation(() => undefined);
  });

  afterEach(() => {
    jest.restoreAllMocks();
  });

  test('should assign declared fields from metadata and definition', () => {
    const runtime = new OlxRuntime({ resources: new MemoryResourceStore(), idGenerator });

    const block = materialize(poll, runtime, scopeIds('p1'), { values: { display_name: 'Colours' }, xmlAttributes: {} }, definition());

    expect(block.get('display_name')).toBe('Colours');
    expect(block.get('question')).toBe('<p>Pick</p>');
    expect(block.get('answers')).toEqual([{ id: 'a', text: 'A' }]);
    expect(block.isSet('voted')).toBe(false);
  });

  test('should store unknown attributes and the filename pair in the attribute bag', () => {
    const runtime = new OlxRuntime({ resources: new MemoryResourceStore(), idGenerator });

    const block = materialize(
      poll,
      runtime,
      scopeIds('p1'),
      { values: {}, xmlAttributes: { foo: 'bar' } },
      definition({ filename: ['poll_question/p1.xml', 'poll_question/p1.xml'] })
    );

    expect(block.get('xml_attributes')).toEqual({
      foo: 'bar',
      filename: ['poll_question/p1.xml', 'poll_question/p1.xml']
    });
  });

  test('should add to an attribute bag the host already filled', () => {
    class PrefilledRuntime extends OlxRuntime {
      constructBlock(blockType: BlockType, keys: ScopeIds): Block {
        const block = super.constructBlock(blockType, keys);
        block.set('xml_attributes', { existing: '1' });
        return block;
      }
    }
    const runtime = new PrefilledRuntime({ resources: new MemoryResourceStore(), idGenerator });

    const block = materialize(poll, runtime, scopeIds('p1'), { values: {}, xmlAttributes: { foo: 'bar' } }, definition());

    expect(block.get('xml_attributes')).toEqual({ existing: '1', foo: 'bar', filename: ['', null] });
  });

  test('should warn about and skip keys the block type does not declare', () => {
    const runtime = new OlxRuntime({ resources: new MemoryResourceStore(), idGenerator });

    materialize(poll, runtime, scopeIds('p1'), { values: { legacy_weight: 3 }, xmlAttributes: {} }, definition());

    expect(console.warn).toHaveBeenCalledWith(
      '[block-v1:Demo+OLX101+2024+type@poll_question+block@p1] W-OLX-UNKNOWN-FIELD: Imported poll_question block does not have field legacy_weight found in XML.'
    );
  });

  test('should skip values the field type rejects', () => {
    const runtime = new OlxRuntime({ resources: new MemoryResourceStore(), idGenerator });

    const block = materialize(poll, runtime, scopeIds('p1'), { values: { voted: 'yes' }, xmlAttributes: {} }, definition());

    expect(block.isSet('voted')).toBe(false);
    expect(console.warn).toHaveBeenCalledWith(
      '[block-v1:Demo+OLX101+2024+type@poll_question+block@p1] E-OLX-FIELD-TYPE: Value "yes" is not valid for Boolean field voted'
    );
  });

  test('should assign the child list', () => {
    const runtime = new OlxRuntime({ resources: new MemoryResourceStore(), idGenerator });
    const child = new UsageKey(course, 'html', 'intro');

    const block = materialize(poll, runtime, scopeIds('p1'), { values: {}, xmlAttributes: {} }, definition({ children: [child] }));

    expect(block.children).toEqual([child]);
  });
});

describe('attachAsides', () => {
  test('should attach only asides whose type matches a loaded fragment', () => {
    const tagging = namedAside('tagging_aside');
    const notes = namedAside('notes_aside');
    const runtime = new OlxRuntime({
      resources: new MemoryResourceStore(),
      idGenerator,
      asideTypes: [
        { blockType: 'tagging_aside', create: () => tagging },
        { blockType: 'notes_aside', create: () => notes }
      ]
    });
    const block = runtime.constructBlock(poll, scopeIds('p1'));

    attachAsides(block, runtime, [createElement('tagging_aside', { 'xblock-family': 'xblock_asides.v1' })]);

    expect(block.asides).toEqual([tagging]);
  });

  test('should attach nothing without fragments', () => {
    const runtime = new OlxRuntime({
      resources: new MemoryResourceStore(),
      idGenerator,
      asideTypes: [{ blockType: 'tagging_aside', create: () => namedAside('tagging_aside') }]
    });
    const block = runtime.constructBlock(poll, scopeIds('p1'));

    attachAsides(block, runtime, []);

    expect(block.asides).toHaveLength(0);
  });
});
