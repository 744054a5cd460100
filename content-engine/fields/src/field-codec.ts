import { SerializationFailure } from '../../shared/src/errors.js';
import { JsonValue } from '../../shared/src/json.js';
import { Field } from './field-types.js';
import { OpaqueKey } from './opaque-keys.js';

/**
 * Timestamps are written in ISO-8601 with a literal `Z` for UTC. Whole seconds drop the
 * millisecond part.
 */
export function formatTimestamp(value: Date): string {
  return value.toISOString().replace(/\.000Z$/, 'Z');
}

const INTEGER_LITERAL = /^\s*-?\d+\s*$/;

function encodeSpecialValues(_key: string, value: unknown): unknown {
  if (value instanceof OpaqueKey) {
    return value.toString();
  }
  return value;
}

/**
 * String form of a field's JSON value, as stored in an XML attribute.
 *
 * Strings pass through untouched and timestamps are written as ISO-8601; everything else
 * is JSON-encoded, with opaque keys encoded as their string form.
 */
export function serializeField(value: unknown): string {
  if (typeof value === 'string') {
    return value;
  }
  if (value instanceof Date) {
    return formatTimestamp(value);
  }

  let encoded: string | undefined;
  try {
    encoded = JSON.stringify(value, encodeSpecialValues);
  } catch (error) {
    throw new SerializationFailure(typeof value, error);
  }
  if (encoded === undefined) {
    throw new SerializationFailure(typeof value, new Error('value has no JSON representation'));
  }
  return encoded;
}

/**
 * Value stored for an attribute string.
 *
 * The string is JSON-decoded. Strings that are not JSON are older unquoted values and come
 * back unchanged, as do decoded values the field type rejects (a String field whose
 * attribute reads `3.4` keeps the text, not the number) and integers too large to hold
 * exactly. A decoded `null` is returned as is.
 */
export function deserializeField(field: Field, raw: string): JsonValue {
  let decoded: JsonValue;
  try {
    decoded = JSON.parse(raw);
  } catch {
    return raw;
  }

  if (decoded === null) {
    return null;
  }
  // Integers past 2^53 cannot be held exactly as numbers
  if (typeof decoded === 'number' && INTEGER_LITERAL.test(raw) && !Number.isSafeInteger(decoded)) {
    return raw;
  }
  return field.accepts(decoded) ? decoded : raw;
}
