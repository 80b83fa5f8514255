import {
  CONNECTION_SSL_CONFIG_PREFIX,
  SECURITY_PROTOCOL_CONFIG,
  TOPIC_INDEX_MAP_CONFIG,
  type SinkConnectorConfig,
} from '@docsink/sink-config';
import type { Logger } from './logger.js';

/**
 * Log the resolved values once at task start, secrets hidden, and warn about
 * input that has no effect. The raw input goes to debug, so build the logger with
 * `secretKeys: secretKeysOf(registry)` to keep password fields hidden there.
 */
export function logConfigValues(logger: Logger, config: SinkConnectorConfig): void {
  logger.info(config.toString());
  logger.debug('Raw connector properties', { properties: config.values.originals() });

  for (const key of config.values.unusedKeys()) {
    logger.warn(`The configuration '${key}' was supplied but isn't a known config.`);
  }

  if (config.topicIndexMap.length > 0) {
    logger.warn(
      `${TOPIC_INDEX_MAP_CONFIG} is deprecated; map topics to indices with a record transform instead.`
    );
  }

  const sslKeys = Object.keys(config.values.originalsWithPrefix(CONNECTION_SSL_CONFIG_PREFIX, false));
  if (!config.isSecured() && sslKeys.length > 0) {
    logger.warn(
      `${SECURITY_PROTOCOL_CONFIG} is ${config.securityProtocol}; ignoring ${sslKeys.join(', ')}.`
    );
  }
}
