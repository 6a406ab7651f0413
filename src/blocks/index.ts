export * from './extract.js';
export * from './lint.js';
