/**
 * Client-side TLS vocabulary, defined once and embedded by connectors under
 * their own prefix.
 */

import type { ResolvedConfig } from '../config-def/index.js';
import { ConfigDef, ConfigDefBuilder } from '../config-def/index.js';
import type { Password } from '../types/index.js';

export const SSL_PROTOCOL_CONFIG = 'ssl.protocol';
export const SSL_PROVIDER_CONFIG = 'ssl.provider';
export const SSL_CIPHER_SUITES_CONFIG = 'ssl.cipher.suites';
export const SSL_ENABLED_PROTOCOLS_CONFIG = 'ssl.enabled.protocols';
export const SSL_KEYSTORE_TYPE_CONFIG = 'ssl.keystore.type';
export const SSL_KEYSTORE_LOCATION_CONFIG = 'ssl.keystore.location';
export const SSL_KEYSTORE_PASSWORD_CONFIG = 'ssl.keystore.password';
export const SSL_KEY_PASSWORD_CONFIG = 'ssl.key.password';
export const SSL_TRUSTSTORE_TYPE_CONFIG = 'ssl.truststore.type';
export const SSL_TRUSTSTORE_LOCATION_CONFIG = 'ssl.truststore.location';
export const SSL_TRUSTSTORE_PASSWORD_CONFIG = 'ssl.truststore.password';
export const SSL_KEYMANAGER_ALGORITHM_CONFIG = 'ssl.keymanager.algorithm';
export const SSL_TRUSTMANAGER_ALGORITHM_CONFIG = 'ssl.trustmanager.algorithm';
export const SSL_ENDPOINT_IDENTIFICATION_ALGORITHM_CONFIG = 'ssl.endpoint.identification.algorithm';

export const DEFAULT_STORE_TYPE = 'PKCS12';

/** Append the TLS fields to `builder` */
export function addClientSslSupport(builder: ConfigDefBuilder): ConfigDefBuilder {
  return builder
    .define({
      name: SSL_PROTOCOL_CONFIG,
      type: 'string',
      defaultValue: 'TLSv1.2',
      importance: 'medium',
      documentation:
        'The TLS protocol used to generate the secure context. Should be one of the protocols ' +
        `listed in ${SSL_ENABLED_PROTOCOLS_CONFIG}.`,
    })
    .define({
      name: SSL_PROVIDER_CONFIG,
      type: 'string',
      defaultValue: null,
      importance: 'medium',
      documentation:
        'The name of the security provider used for TLS connections. The default is the ' +
        'runtime default provider.',
    })
    .define({
      name: SSL_CIPHER_SUITES_CONFIG,
      type: 'list',
      defaultValue: null,
      importance: 'low',
      documentation:
        'A list of cipher suites. By default all the cipher suites the runtime supports are ' +
        'allowed.',
    })
    .define({
      name: SSL_ENABLED_PROTOCOLS_CONFIG,
      type: 'list',
      defaultValue: 'TLSv1.2,TLSv1.3',
      importance: 'medium',
      documentation: 'The list of protocols enabled for TLS connections.',
    })
    .define({
      name: SSL_KEYSTORE_TYPE_CONFIG,
      type: 'string',
      defaultValue: DEFAULT_STORE_TYPE,
      importance: 'medium',
      documentation: 'The file format of the key store file, passed through to the connection layer as given.',
    })
    .define({
      name: SSL_KEYSTORE_LOCATION_CONFIG,
      type: 'string',
      defaultValue: null,
      importance: 'high',
      documentation:
        'The location of the key store file. Only needed when the server requires client ' +
        'authentication.',
    })
    .define({
      name: SSL_KEYSTORE_PASSWORD_CONFIG,
      type: 'password',
      defaultValue: null,
      importance: 'high',
      documentation:
        `The store password for the key store file. Only needed if ${SSL_KEYSTORE_LOCATION_CONFIG} ` +
        'is configured.',
    })
    .define({
      name: SSL_KEY_PASSWORD_CONFIG,
      type: 'password',
      defaultValue: null,
      importance: 'high',
      documentation: 'The password of the private key in the key store file.',
    })
    .define({
      name: SSL_TRUSTSTORE_TYPE_CONFIG,
      type: 'string',
      defaultValue: DEFAULT_STORE_TYPE,
      importance: 'medium',
      documentation: 'The file format of the trust store file.',
    })
    .define({
      name: SSL_TRUSTSTORE_LOCATION_CONFIG,
      type: 'string',
      defaultValue: null,
      importance: 'high',
      documentation: 'The location of the trust store file.',
    })
    .define({
      name: SSL_TRUSTSTORE_PASSWORD_CONFIG,
      type: 'password',
      defaultValue: null,
      importance: 'high',
      documentation:
        'The password for the trust store file. If not set, the trust store is still used but ' +
        'integrity checking is disabled.',
    })
    .define({
      name: SSL_KEYMANAGER_ALGORITHM_CONFIG,
      type: 'string',
      defaultValue: 'SunX509',
      importance: 'low',
      documentation: 'The algorithm used by the key manager factory for TLS connections.',
    })
    .define({
      name: SSL_TRUSTMANAGER_ALGORITHM_CONFIG,
      type: 'string',
      defaultValue: 'PKIX',
      importance: 'low',
      documentation: 'The algorithm used by the trust manager factory for TLS connections.',
    })
    .define({
      name: SSL_ENDPOINT_IDENTIFICATION_ALGORITHM_CONFIG,
      type: 'string',
      defaultValue: 'https',
      importance: 'low',
      documentation:
        'The endpoint identification algorithm used to validate the server hostname against ' +
        'its certificate. Set to an empty string to disable hostname verification.',
    });
}

/** A standalone registry holding only the TLS fields */
export function clientSslConfigDef(): ConfigDef {
  return addClientSslSupport(new ConfigDefBuilder()).freeze();
}

/** Typed TLS settings for a connection layer */
export interface SslSettings {
  protocol: string | null;
  provider: string | null;
  cipherSuites: readonly string[] | null;
  enabledProtocols: readonly string[] | null;
  keystoreType: string | null;
  keystoreLocation: string | null;
  keystorePassword: Password | null;
  keyPassword: Password | null;
  truststoreType: string | null;
  truststoreLocation: string | null;
  truststorePassword: Password | null;
  keymanagerAlgorithm: string | null;
  trustmanagerAlgorithm: string | null;
  /** Empty string means hostname verification is off */
  endpointIdentificationAlgorithm: string | null;
}

/** Read the TLS fields out of a snapshot resolved against clientSslConfigDef() */
export function readSslSettings(config: ResolvedConfig): SslSettings {
  return {
    protocol: config.getString(SSL_PROTOCOL_CONFIG),
    provider: config.getString(SSL_PROVIDER_CONFIG),
    cipherSuites: config.getList(SSL_CIPHER_SUITES_CONFIG),
    enabledProtocols: config.getList(SSL_ENABLED_PROTOCOLS_CONFIG),
    keystoreType: config.getString(SSL_KEYSTORE_TYPE_CONFIG),
    keystoreLocation: config.getString(SSL_KEYSTORE_LOCATION_CONFIG),
    keystorePassword: config.getPassword(SSL_KEYSTORE_PASSWORD_CONFIG),
    keyPassword: config.getPassword(SSL_KEY_PASSWORD_CONFIG),
    truststoreType: config.getString(SSL_TRUSTSTORE_TYPE_CONFIG),
    truststoreLocation: config.getString(SSL_TRUSTSTORE_LOCATION_CONFIG),
    truststorePassword: config.getPassword(SSL_TRUSTSTORE_PASSWORD_CONFIG),
    keymanagerAlgorithm: config.getString(SSL_KEYMANAGER_ALGORITHM_CONFIG),
    trustmanagerAlgorithm: config.getString(SSL_TRUSTMANAGER_ALGORITHM_CONFIG),
    endpointIdentificationAlgorithm: config.getString(SSL_ENDPOINT_IDENTIFICATION_ALGORITHM_CONFIG),
  };
}
