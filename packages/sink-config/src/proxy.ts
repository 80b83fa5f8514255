/**
 * Cross-field checks for the proxy settings
 */

import { ConfigurationConflictError, type ResolvedConfig } from '@docsink/core';
import {
  PROXY_HOST_CONFIG,
  PROXY_PASSWORD_CONFIG,
  PROXY_USERNAME_CONFIG,
} from './config-keys.js';

/**
 * Without a host, neither credential may be set. With a host, the username
 * and password are either both set (authenticated proxy) or both absent
 * (anonymous proxy).
 */
export function validateProxyConfigs(config: ResolvedConfig): void {
  const host = config.getString(PROXY_HOST_CONFIG) ?? '';
  const username = config.getString(PROXY_USERNAME_CONFIG) ?? '';
  const password = config.getPassword(PROXY_PASSWORD_CONFIG);

  if (host === '') {
    if (username !== '' || password !== null) {
      throw new ConfigurationConflictError({
        message: `${PROXY_USERNAME_CONFIG} and ${PROXY_PASSWORD_CONFIG} cannot be set without ${PROXY_HOST_CONFIG}.`,
        keys: [PROXY_HOST_CONFIG, PROXY_USERNAME_CONFIG, PROXY_PASSWORD_CONFIG],
        suggestion: `Set ${PROXY_HOST_CONFIG}, or remove the proxy credentials.`,
      });
    }
    return;
  }

  if ((username === '') !== (password === null)) {
    throw new ConfigurationConflictError({
      message: `Both ${PROXY_USERNAME_CONFIG} and ${PROXY_PASSWORD_CONFIG} must be set, or both left empty.`,
      keys: [PROXY_USERNAME_CONFIG, PROXY_PASSWORD_CONFIG],
      suggestion: `Set ${username === '' ? PROXY_USERNAME_CONFIG : PROXY_PASSWORD_CONFIG}, or remove the other one for an anonymous proxy.`,
    });
  }
}
