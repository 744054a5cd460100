import { Field, Scope } from './field-types.js';

/**
 * Ordered, immutable field declarations of one block type. Consulted by the merger,
 * materializer and exporter instead of inspecting block instances.
 */
export class FieldSchema implements Iterable<Field> {
  private readonly fields: ReadonlyMap<string, Field>;

  constructor(fields: readonly Field[]) {
    const byName = new Map<string, Field>();
    for (const field of fields) {
      if (byName.has(field.name)) {
        throw new Error(`Duplicate field declaration: ${field.name}`);
      }
      byName.set(field.name, field);
    }
    this.fields = byName;
  }

  get(name: string): Field | undefined {
    return this.fields.get(name);
  }

  has(name: string): boolean {
    return this.fields.has(name);
  }

  names(): string[] {
    return Array.from(this.fields.keys());
  }

  byScope(scope: Scope): Field[] {
    return Array.from(this.fields.values()).filter(field => field.scope === scope);
  }

  [Symbol.iterator](): Iterator<Field> {
    return this.fields.values();
  }
}
