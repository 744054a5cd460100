import { randomBytes } from 'crypto';
import { CourseKey, DefinitionKey, UsageKey } from '../../fields/src/opaque-keys.js';

export interface IdGenerator {
  /** New definition id. `slug` (usually the node's url_name) becomes the id when given. */
  createDefinition(blockType: string, slug?: string): DefinitionKey;
  createUsage(definitionId: DefinitionKey): UsageKey;
}

/**
 * Ids for blocks imported into one course. A usage shares its definition's id, so the
 * url_name of an imported node is also the block id it exports under.
 */
export class CourseIdGenerator implements IdGenerator {
  constructor(readonly courseKey: CourseKey) {}

  createDefinition(blockType: string, slug?: string): DefinitionKey {
    return new DefinitionKey(blockType, slug || randomBytes(16).toString('hex'));
  }

  createUsage(definitionId: DefinitionKey): UsageKey {
    return new UsageKey(this.courseKey, definitionId.blockType, definitionId.definitionId);
  }
}
