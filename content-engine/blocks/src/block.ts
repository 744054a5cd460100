import { Field, FieldValue, Scope, cloneFieldValue } from '../../fields/src/field-types.js';
import { DefinitionKey, UsageKey } from '../../fields/src/opaque-keys.js';
import { JsonObject, JsonValue, isJsonObject } from '../../shared/src/json.js';
import { XmlElement } from '../../xml/src/xml-tree.js';
import { BlockType } from './block-type.js';

export interface ScopeIds {
  userId: string | null;
  blockType: string;
  defId: DefinitionKey;
  usageId: UsageKey;
}

/**
 * Auxiliary data attached to a block and serialized next to it, as offered by the host.
 */
export interface AsideDescriptor {
  readonly blockType: string;
  needsSerialization(): boolean;
  /** Write the aside's own tag, attributes and content onto `node`. */
  addXmlToNode(node: XmlElement): void;
}

/**
 * A block instance and its field store.
 *
 * Reads return owned copies and writes replace the stored value, so changing a container
 * field means read, modify the copy, assign it back. Only assigned fields count as
 * explicitly set; everything else reads as its declared default.
 */
export class Block {
  private readonly values = new Map<string, FieldValue>();
  private childIds: UsageKey[] = [];
  private readonly attachedAsides: AsideDescriptor[] = [];

  constructor(readonly blockType: BlockType, readonly scopeIds: ScopeIds) {}

  get category(): string {
    return this.scopeIds.blockType;
  }

  get location(): UsageKey {
    return this.scopeIds.usageId;
  }

  get urlName(): string {
    return this.scopeIds.usageId.blockId;
  }

  private declared(name: string): Field {
    const field = this.blockType.schema.get(name);
    if (!field) {
      throw new Error(`${this.category} block has no field ${name}`);
    }
    return field;
  }

  get(name: string): FieldValue {
    const field = this.declared(name);
    const stored = this.values.get(name);
    return stored === undefined ? field.default : cloneFieldValue(stored);
  }

  /** String view of a field, empty when unset or not a string. */
  getString(name: string): string {
    const value = this.get(name);
    return typeof value === 'string' ? value : '';
  }

  set(name: string, value: FieldValue): void {
    this.declared(name);
    this.values.set(name, cloneFieldValue(value));
  }

  isSet(name: string): boolean {
    return this.values.has(name);
  }

  explicitlySetFieldNames(scope: Scope): string[] {
    return this.blockType.schema.byScope(scope)
      .map(field => field.name)
      .filter(name => this.values.has(name));
  }

  /** JSON form of a field's current value; throws when the value has none. */
  toJson(name: string): JsonValue {
    return this.declared(name).toJson(this.get(name));
  }

  explicitlySetFields(scope: Scope): Record<string, JsonValue> {
    const result: Record<string, JsonValue> = {};
    for (const name of this.explicitlySetFieldNames(scope)) {
      result[name] = this.toJson(name);
    }
    return result;
  }

  get xmlAttributes(): JsonObject {
    if (!this.blockType.schema.has('xml_attributes')) {
      return {};
    }
    const value = this.get('xml_attributes');
    return isJsonObject(value) ? value : {};
  }

  get children(): UsageKey[] {
    return [...this.childIds];
  }

  set children(children: UsageKey[]) {
    this.childIds = [...children];
  }

  addAside(aside: AsideDescriptor): void {
    this.attachedAsides.push(aside);
  }

  get asides(): readonly AsideDescriptor[] {
    return this.attachedAsides;
  }
}
