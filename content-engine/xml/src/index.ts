// XML module exports

export {
  XmlElement,
  createElement,
  getAttribute,
  setAttribute,
  deleteAttribute,
  attributeNames,
  deepCopy,
  findChild,
  findChildren,
  removeChild,
  hasNonWhitespaceText,
  parseXml,
  serializeXml,
  stringifyChildren
} from './xml-tree.js';
