// Pointer module exports

export { isPointerTag, nameToPathname, formatFilepath, pointerPath } from './pointer-tag.js';
