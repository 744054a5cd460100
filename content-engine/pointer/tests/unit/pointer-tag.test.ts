import { createElement, parseXml } from '../../../xml/src/xml-tree.js';
import { formatFilepath, isPointerTag, nameToPathname, pointerPath } from '../../src/pointer-tag.js';

describe('isPointerTag', () => {
  test('should accept a bare url_name stub', () => {
    expect(isPointerTag(parseXml('<html url_name="intro"/>'))).toBe(true);
  });

  test('should ignore whitespace-only text', () => {
    expect(isPointerTag(createElement('poll_question', { url_name: 'p1' }, '\n  '))).toBe(true);
  });

  test('should reject an extra attribute', () => {
    expect(isPointerTag(parseXml('<html url_name="intro" display_name="Intro"/>'))).toBe(false);
  });

  test('should reject a missing url_name', () => {
    expect(isPointerTag(parseXml('<html display_name="Intro"/>'))).toBe(false);
  });

  test('should reject children and text', () => {
    expect(isPointerTag(parseXml('<html url_name="intro"><p/></html>'))).toBe(false);
    expect(isPointerTag(parseXml('<html url_name="intro">Hello</html>'))).toBe(false);
  });

  test('should require org and course on course roots', () => {
    expect(isPointerTag(parseXml('<course url_name="2024" org="Demo" course="OLX101"/>'))).toBe(true);
    expect(isPointerTag(parseXml('<course url_name="2024"/>'))).toBe(false);
  });

  test('should not apply the course attribute set to other tags', () => {
    expect(isPointerTag(parseXml('<html url_name="intro" org="Demo" course="OLX101"/>'))).toBe(false);
  });
});

describe('pointer paths', () => {
  test('should map colons to directories', () => {
    expect(nameToPathname('week1:intro:part2')).toBe('week1/intro/part2');
    expect(formatFilepath('html', 'intro', 'xml')).toBe('html/intro.xml');
  });

  test('should compute the definition path of a pointer', () => {
    expect(pointerPath(parseXml('<html url_name="week1:intro"/>'), 'html', 'xml')).toBe('html/week1/intro.xml');
  });

  test('should fail without a url_name', () => {
    expect(() => pointerPath(createElement('html'), 'html', 'xml')).toThrow('Pointer <html> has no url_name');
  });
});
