export * from './config-def.js';
export * from './resolver.js';
export * from './resolved-config.js';
export * from './docs.js';
