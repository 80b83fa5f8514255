/**
 * @docsink/cli
 *
 * Command line tooling around the sink configuration
 */

export { runCli } from './commands.js';
export type { CliIo } from './commands.js';
export * from './config-file.js';
export * from './logger.js';
export { logConfigValues } from './log-values.js';
