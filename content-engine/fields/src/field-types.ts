import Ajv, { ValidateFunction } from 'ajv';
import addFormats from 'ajv-formats';
import { FieldTypeError } from '../../shared/src/errors.js';
import { JsonValue } from '../../shared/src/json.js';

export type Scope = 'content' | 'settings' | 'children' | 'user_state' | 'user_state_summary';

/** In-memory field value: the JSON form, except timestamps which live as Date. */
export type FieldValue = JsonValue | Date;

/** Owned copy of a field value. */
export function cloneFieldValue(value: FieldValue): FieldValue {
  return value instanceof Date ? new Date(value.getTime()) : structuredClone(value);
}

export interface FieldOptions {
  scope: Scope;
  defaultValue?: FieldValue;
  help?: string;
}

const ajv = new Ajv({
  strict: true,
  allErrors: false,
  coerceTypes: false,
  useDefaults: false
});
addFormats(ajv);

const validators = new Map<string, ValidateFunction>();

function validatorFor(typeName: string, schema: object): ValidateFunction {
  let validate = validators.get(typeName);
  if (!validate) {
    validate = ajv.compile(schema);
    validators.set(typeName, validate);
  }
  return validate;
}

/**
 * A typed field declaration. The JSON Schema decides which decoded JSON values the field
 * accepts; `fromJson`/`toJson` convert between the JSON form and the in-memory value.
 * `null` is accepted by every field type and means "no value".
 */
export abstract class Field {
  abstract readonly typeName: string;
  protected abstract readonly schema: object;

  readonly scope: Scope;
  readonly help?: string;
  private readonly defaultValue: FieldValue;

  constructor(readonly name: string, options: FieldOptions) {
    this.scope = options.scope;
    this.help = options.help;
    this.defaultValue = options.defaultValue ?? null;
  }

  get default(): FieldValue {
    return cloneFieldValue(this.defaultValue);
  }

  accepts(value: JsonValue): boolean {
    if (value === null) return true;
    return validatorFor(this.typeName, this.schema)(value);
  }

  fromJson(value: JsonValue): FieldValue {
    if (!this.accepts(value)) {
      throw new FieldTypeError(this.name, this.typeName, value);
    }
    return value;
  }

  toJson(value: FieldValue): JsonValue {
    if (value instanceof Date) {
      throw new FieldTypeError(this.name, this.typeName, value.toISOString());
    }
    return value;
  }
}

export class StringField extends Field {
  readonly typeName = 'String';
  protected readonly schema = { type: 'string' };
}

export class IntegerField extends Field {
  readonly typeName = 'Integer';
  protected readonly schema = { type: 'integer' };
}

export class FloatField extends Field {
  readonly typeName = 'Float';
  protected readonly schema = { type: 'number' };
}

export class BooleanField extends Field {
  readonly typeName = 'Boolean';
  protected readonly schema = { type: 'boolean' };
}

export class ListField extends Field {
  readonly typeName = 'List';
  protected readonly schema = { type: 'array' };
}

export class DictField extends Field {
  readonly typeName = 'Dict';
  protected readonly schema = { type: 'object' };
}

/**
 * ISO-8601 timestamp with a timezone. Held as a Date in memory, written as its ISO string.
 */
export class DateTimeField extends Field {
  readonly typeName = 'DateTime';
  protected readonly schema = { type: 'string', format: 'date-time' };

  fromJson(value: JsonValue): FieldValue {
    const checked = super.fromJson(value);
    return typeof checked === 'string' ? new Date(checked) : checked;
  }

  toJson(value: FieldValue): JsonValue {
    return value instanceof Date ? value.toISOString() : value;
  }
}
