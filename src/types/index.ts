export * from './research.js';
export * from './progress.js';
export * from './errors.js';
