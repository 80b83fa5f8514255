export * from './field.js';
export * from './password.js';
