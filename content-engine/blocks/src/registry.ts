import { UnknownBlockTypeError } from '../../shared/src/errors.js';
import { BlockType } from './block-type.js';
import { HtmlBlockType } from './html-block.js';
import { PollBlockType } from './poll-block.js';
import { WordCloudBlockType } from './word-cloud-block.js';

/**
 * Block types by OLX tag.
 */
export class BlockTypeRegistry {
  private readonly types = new Map<string, BlockType>();

  constructor(types: Iterable<BlockType> = []) {
    for (const blockType of types) {
      this.register(blockType);
    }
  }

  register(blockType: BlockType): this {
    if (this.types.has(blockType.category)) {
      throw new Error(`Block type already registered: ${blockType.category}`);
    }
    this.types.set(blockType.category, blockType);
    return this;
  }

  get(category: string): BlockType {
    const blockType = this.types.get(category);
    if (!blockType) {
      throw new UnknownBlockTypeError(category, this.categories());
    }
    return blockType;
  }

  has(category: string): boolean {
    return this.types.has(category);
  }

  categories(): string[] {
    return Array.from(this.types.keys()).sort();
  }
}

export function createDefaultRegistry(): BlockTypeRegistry {
  return new BlockTypeRegistry([new HtmlBlockType(), new PollBlockType(), new WordCloudBlockType()]);
}
