export * from './narrative.js';
export * from './document_files.js';
