import { XmlElement, attributeNames, getAttribute, hasNonWhitespaceText } from '../../xml/src/xml-tree.js';

const POINTER_ATTRIBUTES = ['url_name'];
const COURSE_POINTER_ATTRIBUTES = ['url_name', 'course', 'org'];

/**
 * A pointer tag is a stub such as `<problem url_name="p1"/>` whose definition lives in its
 * own file. It has no children, no text other than whitespace, and exactly the attribute
 * set `{url_name}`; course roots use `{url_name, course, org}`. Any other attribute makes
 * the node an inline definition.
 */
export function isPointerTag(node: XmlElement): boolean {
  const expected = node.tag === 'course' ? COURSE_POINTER_ATTRIBUTES : POINTER_ATTRIBUTES;
  const actual = attributeNames(node);

  const sameAttributes = actual.size === expected.length && expected.every(name => actual.has(name));
  return node.children.length === 0 && sameAttributes && !hasNonWhitespaceText(node);
}

/** `a:b:c` becomes `a/b/c` so that OLX authors can organize files in directories. */
export function nameToPathname(name: string): string {
  return name.replace(/:/g, '/');
}

export function formatFilepath(category: string, name: string, extension: string): string {
  return `${category}/${name}.${extension}`;
}

/**
 * Path of the definition file a pointer node refers to.
 */
export function pointerPath(node: XmlElement, category: string, extension: string): string {
  const urlName = getAttribute(node, 'url_name');
  if (urlName === undefined) {
    throw new Error(`Pointer <${node.tag}> has no url_name`);
  }
  return formatFilepath(category, nameToPathname(urlName), extension);
}
