export * from './sections.js';
export * from './facts.js';
export * from './fenced_block.js';
export * from './injector.js';
