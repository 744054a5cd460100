import { DEFAULT_OLX_CONFIG, OlxConfig } from '../../../config/olx.js';
import { Block, AsideDescriptor, ScopeIds } from '../../blocks/src/block.js';
import { BlockType } from '../../blocks/src/block-type.js';
import { BlockTypeRegistry, createDefaultRegistry } from '../../blocks/src/registry.js';
import { UsageKey } from '../../fields/src/opaque-keys.js';
import { ResourceStore } from '../../loader/src/resource-store.js';
import { PolicyMapping } from '../../metadata/src/metadata-merger.js';
import { PolicySource, StaticPolicySource } from '../../metadata/src/policy-source.js';
import { XmlElement, deepCopy } from '../../xml/src/xml-tree.js';
import { IdGenerator } from './id-generator.js';

/**
 * What the import/export layer needs from its host.
 */
export interface BlockRuntime {
  /** Store that pointer definitions and side files are read from. */
  readonly resources: ResourceStore;
  /** Store that exports write side files to. */
  readonly exportResources: ResourceStore;
  readonly idGenerator: IdGenerator;
  readonly config: OlxConfig;
  readonly registry: BlockTypeRegistry;

  getPolicy(usageId: UsageKey): PolicyMapping;
  constructBlock(blockType: BlockType, keys: ScopeIds): Block;
  /** Record aside fragments found while loading the definition of `usageId`. */
  parseAsides(fragments: readonly XmlElement[], usageId: UsageKey): void;
  /** Every aside the host offers for `block`. */
  getAsides(block: Block): AsideDescriptor[];
}

/**
 * An aside kind the host supports. `fragment` is the element recorded for the block on
 * import, if any.
 */
export interface AsideType {
  readonly blockType: string;
  create(block: Block, fragment: XmlElement | null): AsideDescriptor;
}

export interface OlxRuntimeOptions {
  resources: ResourceStore;
  exportResources?: ResourceStore;
  idGenerator: IdGenerator;
  policy?: PolicySource;
  registry?: BlockTypeRegistry;
  asideTypes?: AsideType[];
  config?: OlxConfig;
}

/**
 * In-process host runtime used by the command line tools and the tests.
 */
export class OlxRuntime implements BlockRuntime {
  readonly resources: ResourceStore;
  readonly exportResources: ResourceStore;
  readonly idGenerator: IdGenerator;
  readonly config: OlxConfig;
  readonly registry: BlockTypeRegistry;

  private readonly policy: PolicySource;
  private readonly asideTypes: AsideType[];
  private readonly asideFragments = new Map<string, Map<string, XmlElement>>();
  private readonly blockAsides = new WeakMap<Block, AsideDescriptor[]>();

  constructor(options: OlxRuntimeOptions) {
    this.resources = options.resources;
    this.exportResources = options.exportResources ?? options.resources;
    this.idGenerator = options.idGenerator;
    this.policy = options.policy ?? new StaticPolicySource();
    this.registry = options.registry ?? createDefaultRegistry();
    this.asideTypes = options.asideTypes ?? [];
    this.config = options.config ?? DEFAULT_OLX_CONFIG;
  }

  getPolicy(usageId: UsageKey): PolicyMapping {
    return this.policy.getPolicy(usageId);
  }

  constructBlock(blockType: BlockType, keys: ScopeIds): Block {
    return new Block(blockType, keys);
  }

  parseAsides(fragments: readonly XmlElement[], usageId: UsageKey): void {
    const key = usageId.toString();
    const recorded = this.asideFragments.get(key) ?? new Map<string, XmlElement>();
    for (const fragment of fragments) {
      recorded.set(fragment.tag, deepCopy(fragment));
    }
    this.asideFragments.set(key, recorded);
  }

  getAsides(block: Block): AsideDescriptor[] {
    let asides = this.blockAsides.get(block);
    if (!asides) {
      const fragments = this.asideFragments.get(block.location.toString());
      asides = this.asideTypes.map(asideType =>
        asideType.create(block, fragments?.get(asideType.blockType) ?? null)
      );
      this.blockAsides.set(block, asides);
    }
    return [...asides];
  }
}
