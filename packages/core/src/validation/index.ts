export * from './validators.js';
export * from './parse.js';
