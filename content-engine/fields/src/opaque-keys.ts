/**
 * Identifier objects for courses, definitions and usages. They serialize through their
 * string form wherever a field value contains one.
 */
export abstract class OpaqueKey {
  abstract toString(): string;

  equals(other: OpaqueKey): boolean {
    return this.toString() === other.toString();
  }
}

export class CourseKey extends OpaqueKey {
  constructor(readonly org: string, readonly course: string, readonly run: string) {
    super();
  }

  toString(): string {
    return `course-v1:${this.org}+${this.course}+${this.run}`;
  }

  static parse(serialized: string): CourseKey {
    const match = /^course-v1:([^+]+)\+([^+]+)\+([^+]+)$/.exec(serialized);
    if (!match) {
      throw new Error(`Invalid course key: ${serialized}`);
    }
    return new CourseKey(match[1], match[2], match[3]);
  }
}

export class DefinitionKey extends OpaqueKey {
  constructor(readonly blockType: string, readonly definitionId: string) {
    super();
  }

  toString(): string {
    return `def-v1:${this.definitionId}+type@${this.blockType}`;
  }
}

export class UsageKey extends OpaqueKey {
  constructor(readonly courseKey: CourseKey, readonly blockType: string, readonly blockId: string) {
    super();
  }

  toString(): string {
    const { org, course, run } = this.courseKey;
    return `block-v1:${org}+${course}+${run}+type@${this.blockType}+block@${this.blockId}`;
  }
}
