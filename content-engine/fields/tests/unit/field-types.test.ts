import { FieldTypeError } from '../../../shared/src/errors.js';
import { FieldSchema } from '../../src/field-schema.js';
import { DateTimeField, DictField, IntegerField, ListField, StringField } from '../../src/field-types.js';
import { CourseKey, DefinitionKey, UsageKey } from '../../src/opaque-keys.js';

describe('Field', () => {
  test('should accept null for every type', () => {
    expect(new IntegerField('count', { scope: 'settings' }).accepts(null)).toBe(true);
    expect(new DictField('extra', { scope: 'settings' }).accepts(null)).toBe(true);
  });

  test('should tell lists and dicts apart', () => {
    const list = new ListField('tags', { scope: 'settings' });
    const dict = new DictField('extra', { scope: 'settings' });

    expect(list.accepts([])).toBe(true);
    expect(list.accepts({})).toBe(false);
    expect(dict.accepts({})).toBe(true);
    expect(dict.accepts([])).toBe(false);
  });

  test('should throw FieldTypeError from fromJson on a rejected value', () => {
    const field = new IntegerField('num_inputs', { scope: 'settings' });

    expect(() => field.fromJson('five')).toThrow(FieldTypeError);
    expect(() => field.fromJson('five')).toThrow('Value "five" is not valid for Integer field num_inputs');
    expect(field.fromJson(7)).toBe(7);
  });

  test('should hand out copies of the default', () => {
    const field = new ListField('answers', { scope: 'content', defaultValue: [] });
    const first = field.default;
    if (!Array.isArray(first)) throw new Error('expected a list default');
    first.push('mutated');

    expect(field.default).toEqual([]);
  });

  test('should default to null when no default is declared', () => {
    expect(new StringField('source_code', { scope: 'settings' }).default).toBeNull();
  });

  test('should convert date-time values to Date and back', () => {
    const field = new DateTimeField('start', { scope: 'settings' });
    const value = field.fromJson('2024-03-01T12:00:00Z');

    expect(value).toBeInstanceOf(Date);
    expect(field.toJson(value)).toBe('2024-03-01T12:00:00.000Z');
    expect(() => field.fromJson('next tuesday')).toThrow(FieldTypeError);
  });
});

describe('FieldSchema', () => {
  const schema = new FieldSchema([
    new StringField('display_name', { scope: 'settings' }),
    new StringField('data', { scope: 'content' }),
    new IntegerField('weight', { scope: 'settings' })
  ]);

  test('should keep declaration order', () => {
    expect(schema.names()).toEqual(['display_name', 'data', 'weight']);
    expect(schema.byScope('settings').map(field => field.name)).toEqual(['display_name', 'weight']);
  });

  test('should reject duplicate declarations', () => {
    expect(() => new FieldSchema([
      new StringField('data', { scope: 'content' }),
      new StringField('data', { scope: 'settings' })
    ])).toThrow('Duplicate field declaration: data');
  });
});

describe('opaque keys', () => {
  test('should format and parse course keys', () => {
    const course = CourseKey.parse('course-v1:Demo+OLX101+2024');

    expect(course.org).toBe('Demo');
    expect(course.run).toBe('2024');
    expect(course.toString()).toBe('course-v1:Demo+OLX101+2024');
    expect(() => CourseKey.parse('Demo/OLX101/2024')).toThrow('Invalid course key');
  });

  test('should format definition and usage keys', () => {
    const course = new CourseKey('Demo', 'OLX101', '2024');

    expect(new DefinitionKey('html', 'intro').toString()).toBe('def-v1:intro+type@html');
    expect(new UsageKey(course, 'html', 'intro').equals(new UsageKey(course, 'html', 'intro'))).toBe(true);
  });
});
