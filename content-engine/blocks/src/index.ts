export * from './block.js';
export * from './block-type.js';
export * from './html-block.js';
export * from './poll-block.js';
export * from './word-cloud-block.js';
export * from './registry.js';
