/**
 * @docsink/core
 *
 * Typed configuration registry, resolver and validators for connectors
 */

// Types
export * from './types/index.js';

// Errors
export * from './errors/index.js';

// Validators and value parsing
export * from './validation/index.js';

// Registry, resolution and docs
export * from './config-def/index.js';

// Reusable sub-registries
export * from './ssl/index.js';
