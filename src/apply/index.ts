export * from './two_phase.js';
export * from './batch.js';
