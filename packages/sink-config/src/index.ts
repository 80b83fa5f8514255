/**
 * @docsink/sink-config
 *
 * Configuration surface of the document sink connector
 */

export * from './config-keys.js';
export * from './enums.js';
export * from './definition.js';
export { validateProxyConfigs } from './proxy.js';
export { SinkConnectorConfig, SSL_ENDPOINT_IDENTIFICATION_KEY } from './sink-config.js';
export type { BasicCredentials } from './sink-config.js';
