// Fields module exports

export {
  Field,
  StringField,
  IntegerField,
  FloatField,
  BooleanField,
  ListField,
  DictField,
  DateTimeField,
  Scope,
  FieldValue,
  FieldOptions
} from './field-types.js';
export { FieldSchema } from './field-schema.js';
export { serializeField, deserializeField, formatTimestamp } from './field-codec.js';
export { OpaqueKey, CourseKey, DefinitionKey, UsageKey } from './opaque-keys.js';
