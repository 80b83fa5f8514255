/**
 * Validated configuration for one sink task
 *
 * Resolves raw input against the registry, runs the cross-field checks and
 * exposes typed values plus views derived from them. Instances are immutable;
 * a restarted task builds a fresh one.
 */

import {
  ConfigDef,
  MissingRequiredFieldError,
  ValidationError,
  clientSslConfigDef,
  readSslSettings,
  SSL_ENDPOINT_IDENTIFICATION_ALGORITHM_CONFIG,
  type Password,
  type ResolvedConfig,
  type SslSettings,
} from '@docsink/core';
import {
  AUTO_CREATE_INDICES_AT_START_CONFIG,
  BATCH_SIZE_CONFIG,
  BEHAVIOR_ON_MALFORMED_DOCS_CONFIG,
  BEHAVIOR_ON_NULL_VALUES_CONFIG,
  COMPACT_MAP_ENTRIES_CONFIG,
  CONNECTION_COMPRESSION_CONFIG,
  CONNECTION_PASSWORD_CONFIG,
  CONNECTION_SSL_CONFIG_PREFIX,
  CONNECTION_TIMEOUT_MS_CONFIG,
  CONNECTION_URL_CONFIG,
  CONNECTION_USERNAME_CONFIG,
  DOCUMENT_VERSION_TYPE_CONFIG,
  DROP_INVALID_MESSAGE_CONFIG,
  FLUSH_TIMEOUT_MS_CONFIG,
  KEY_IGNORE_CONFIG,
  LINGER_MS_CONFIG,
  MAX_BUFFERED_RECORDS_CONFIG,
  MAX_CONNECTION_IDLE_TIME_MS_CONFIG,
  MAX_IN_FLIGHT_REQUESTS_CONFIG,
  MAX_RETRIES_CONFIG,
  PROXY_HOST_CONFIG,
  PROXY_PASSWORD_CONFIG,
  PROXY_PORT_CONFIG,
  PROXY_USERNAME_CONFIG,
  READ_TIMEOUT_MS_CONFIG,
  RETRY_BACKOFF_MS_CONFIG,
  RETRY_ON_CONFLICT_CONFIG,
  SCHEMA_IGNORE_CONFIG,
  SECURITY_PROTOCOL_CONFIG,
  TOPIC_INDEX_MAP_CONFIG,
  TOPIC_KEY_IGNORE_CONFIG,
  TOPIC_SCHEMA_IGNORE_CONFIG,
  TYPE_NAME_CONFIG,
  WRITE_METHOD_CONFIG,
} from './config-keys.js';
import { SINK_CONFIG_DEF } from './definition.js';
import {
  BEHAVIOR_ON_MALFORMED_DOCS,
  BEHAVIOR_ON_NULL_VALUES,
  DOCUMENT_VERSION_TYPE,
  SECURITY_PROTOCOL,
  WRITE_METHOD,
  type BehaviorOnMalformedDocs,
  type BehaviorOnNullValues,
  type DocumentVersionType,
  type SecurityProtocol,
  type WriteMethod,
} from './enums.js';
import { validateProxyConfigs } from './proxy.js';

const CLIENT_SSL_CONFIG_DEF = clientSslConfigDef();

export const SSL_ENDPOINT_IDENTIFICATION_KEY =
  CONNECTION_SSL_CONFIG_PREFIX + SSL_ENDPOINT_IDENTIFICATION_ALGORITHM_CONFIG;

export interface BasicCredentials {
  username: string;
  password: Password;
}

function present<T>(key: string, value: T | null): T {
  if (value === null) {
    throw new MissingRequiredFieldError(key);
  }
  return value;
}

export class SinkConnectorConfig {
  readonly values: ResolvedConfig;

  readonly connectionUrls: readonly string[];
  readonly connectionUsername: string | null;
  readonly connectionPassword: Password | null;
  readonly batchSize: number;
  readonly maxInFlightRequests: number;
  readonly maxBufferedRecords: number;
  readonly lingerMs: number;
  readonly flushTimeoutMs: number;
  readonly maxRetries: number;
  readonly retryBackoffMs: number;
  readonly connectionCompression: boolean;
  readonly maxConnectionIdleTimeMs: number;
  readonly connectionTimeoutMs: number;
  readonly readTimeoutMs: number;
  readonly autoCreateIndicesAtStart: boolean;
  readonly retryOnConflict: number;

  readonly typeName: string;
  readonly keyIgnore: boolean;
  readonly schemaIgnore: boolean;
  readonly compactMapEntries: boolean;
  /** Deprecated topic:index pairs, see topicToIndexMap() */
  readonly topicIndexMap: readonly string[];
  readonly topicKeyIgnore: readonly string[];
  readonly topicSchemaIgnore: readonly string[];
  readonly dropInvalidMessage: boolean;
  readonly behaviorOnNullValues: BehaviorOnNullValues;
  readonly behaviorOnMalformedDocuments: BehaviorOnMalformedDocs;
  readonly writeMethod: WriteMethod;
  readonly documentVersionType: DocumentVersionType;

  readonly proxyHost: string;
  readonly proxyPort: number;
  readonly proxyUsername: string;
  readonly proxyPassword: Password | null;

  readonly securityProtocol: SecurityProtocol;

  /**
   * @param props - raw key/value input from the hosting framework
   * @param definition - registry to resolve against
   * @throws ConfigError when a field is missing, malformed or inconsistent
   */
  constructor(props: Readonly<Record<string, string>>, definition: ConfigDef = SINK_CONFIG_DEF) {
    const values = definition.parse(props);
    validateProxyConfigs(values);
    this.values = values;

    this.connectionUrls = present(CONNECTION_URL_CONFIG, values.getList(CONNECTION_URL_CONFIG));
    this.connectionUsername = values.getString(CONNECTION_USERNAME_CONFIG);
    this.connectionPassword = values.getPassword(CONNECTION_PASSWORD_CONFIG);
    this.batchSize = present(BATCH_SIZE_CONFIG, values.getInt(BATCH_SIZE_CONFIG));
    this.maxInFlightRequests = present(
      MAX_IN_FLIGHT_REQUESTS_CONFIG,
      values.getInt(MAX_IN_FLIGHT_REQUESTS_CONFIG)
    );
    this.maxBufferedRecords = present(
      MAX_BUFFERED_RECORDS_CONFIG,
      values.getInt(MAX_BUFFERED_RECORDS_CONFIG)
    );
    this.lingerMs = present(LINGER_MS_CONFIG, values.getLong(LINGER_MS_CONFIG));
    this.flushTimeoutMs = present(FLUSH_TIMEOUT_MS_CONFIG, values.getLong(FLUSH_TIMEOUT_MS_CONFIG));
    this.maxRetries = present(MAX_RETRIES_CONFIG, values.getInt(MAX_RETRIES_CONFIG));
    this.retryBackoffMs = present(RETRY_BACKOFF_MS_CONFIG, values.getLong(RETRY_BACKOFF_MS_CONFIG));
    this.connectionCompression = present(
      CONNECTION_COMPRESSION_CONFIG,
      values.getBoolean(CONNECTION_COMPRESSION_CONFIG)
    );
    this.maxConnectionIdleTimeMs = present(
      MAX_CONNECTION_IDLE_TIME_MS_CONFIG,
      values.getInt(MAX_CONNECTION_IDLE_TIME_MS_CONFIG)
    );
    this.connectionTimeoutMs = present(
      CONNECTION_TIMEOUT_MS_CONFIG,
      values.getInt(CONNECTION_TIMEOUT_MS_CONFIG)
    );
    this.readTimeoutMs = present(READ_TIMEOUT_MS_CONFIG, values.getInt(READ_TIMEOUT_MS_CONFIG));
    this.autoCreateIndicesAtStart = present(
      AUTO_CREATE_INDICES_AT_START_CONFIG,
      values.getBoolean(AUTO_CREATE_INDICES_AT_START_CONFIG)
    );
    this.retryOnConflict = present(RETRY_ON_CONFLICT_CONFIG, values.getInt(RETRY_ON_CONFLICT_CONFIG));

    this.typeName = present(TYPE_NAME_CONFIG, values.getString(TYPE_NAME_CONFIG));
    this.keyIgnore = present(KEY_IGNORE_CONFIG, values.getBoolean(KEY_IGNORE_CONFIG));
    this.schemaIgnore = present(SCHEMA_IGNORE_CONFIG, values.getBoolean(SCHEMA_IGNORE_CONFIG));
    this.compactMapEntries = present(
      COMPACT_MAP_ENTRIES_CONFIG,
      values.getBoolean(COMPACT_MAP_ENTRIES_CONFIG)
    );
    this.topicIndexMap = values.getList(TOPIC_INDEX_MAP_CONFIG) ?? [];
    this.topicKeyIgnore = values.getList(TOPIC_KEY_IGNORE_CONFIG) ?? [];
    this.topicSchemaIgnore = values.getList(TOPIC_SCHEMA_IGNORE_CONFIG) ?? [];
    this.dropInvalidMessage = present(
      DROP_INVALID_MESSAGE_CONFIG,
      values.getBoolean(DROP_INVALID_MESSAGE_CONFIG)
    );
    this.behaviorOnNullValues = BEHAVIOR_ON_NULL_VALUES.validate(
      values.getString(BEHAVIOR_ON_NULL_VALUES_CONFIG),
      BEHAVIOR_ON_NULL_VALUES_CONFIG
    );
    this.behaviorOnMalformedDocuments = BEHAVIOR_ON_MALFORMED_DOCS.validate(
      values.getString(BEHAVIOR_ON_MALFORMED_DOCS_CONFIG),
      BEHAVIOR_ON_MALFORMED_DOCS_CONFIG
    );
    this.writeMethod = WRITE_METHOD.validate(
      values.getString(WRITE_METHOD_CONFIG),
      WRITE_METHOD_CONFIG
    );
    this.documentVersionType = DOCUMENT_VERSION_TYPE.validate(
      values.getString(DOCUMENT_VERSION_TYPE_CONFIG),
      DOCUMENT_VERSION_TYPE_CONFIG
    );

    this.proxyHost = values.getString(PROXY_HOST_CONFIG) ?? '';
    this.proxyPort = present(PROXY_PORT_CONFIG, values.getInt(PROXY_PORT_CONFIG));
    this.proxyUsername = values.getString(PROXY_USERNAME_CONFIG) ?? '';
    this.proxyPassword = values.getPassword(PROXY_PASSWORD_CONFIG);

    this.securityProtocol = SECURITY_PROTOCOL.validate(
      values.getString(SECURITY_PROTOCOL_CONFIG),
      SECURITY_PROTOCOL_CONFIG
    );

    Object.freeze(this);
  }

  /** True iff the security protocol is SSL */
  isSecured(): boolean {
    return this.securityProtocol === 'SSL';
  }

  isBasicProxyConfigured(): boolean {
    return this.proxyHost !== '';
  }

  isProxyAuthenticated(): boolean {
    return this.isBasicProxyConfigured() && this.proxyUsername !== '' && this.proxyPassword !== null;
  }

  /**
   * TLS settings for the connection layer. The `elastic.https.`-prefixed raw
   * input is resolved again against the TLS registry on its own.
   */
  securitySubNamespace(): SslSettings {
    return readSslSettings(
      CLIENT_SSL_CONFIG_DEF.parse(this.values.originalsWithPrefix(CONNECTION_SSL_CONFIG_PREFIX))
    );
  }

  /**
   * True only when the endpoint identification algorithm was explicitly set to
   * an empty string; leaving it out keeps the default verification.
   */
  hostnameVerificationDisabled(): boolean {
    const algorithm = this.values.getString(SSL_ENDPOINT_IDENTIFICATION_KEY);
    return algorithm === '';
  }

  /** HTTPS is used for every connection once any URL asks for it */
  isHttps(): boolean {
    return this.connectionUrls.some((url) => url.startsWith('https:'));
  }

  /** Both connection credentials, or null when either is missing */
  connectionCredentials(): BasicCredentials | null {
    if (this.connectionUsername === null || this.connectionPassword === null) {
      return null;
    }
    return { username: this.connectionUsername, password: this.connectionPassword };
  }

  ignoreKeyTopics(): ReadonlySet<string> {
    return new Set(this.topicKeyIgnore);
  }

  ignoreSchemaTopics(): ReadonlySet<string> {
    return new Set(this.topicSchemaIgnore);
  }

  /**
   * Parses the deprecated `topic:index` pairs.
   * @throws ValidationError on an entry that is not a `topic:index` pair
   */
  topicToIndexMap(): ReadonlyMap<string, string> {
    const map = new Map<string, string>();
    for (const entry of this.topicIndexMap) {
      const parts = entry.split(':');
      const [topic, index] = parts;
      if (parts.length !== 2 || !topic || !index) {
        throw new ValidationError({
          message: `Invalid value ${entry} for configuration ${TOPIC_INDEX_MAP_CONFIG}: Expected a topic:index pair`,
          keys: [TOPIC_INDEX_MAP_CONFIG],
          suggestion: 'Write each entry as topic:index, separated by commas.',
        });
      }
      map.set(topic, index);
    }
    return map;
  }

  toJSON(): Record<string, unknown> {
    return this.values.toJSON();
  }

  toString(): string {
    return `SinkConnectorConfig values:\n${this.values.toString()}`;
  }
}
