// Runtime module exports

export { CourseIdGenerator, IdGenerator } from './id-generator.js';
export { AsideType, BlockRuntime, OlxRuntime, OlxRuntimeOptions } from './block-runtime.js';
