/**
 * Configuration keys read by the sink and its collaborators
 */

// Connector
export const CONNECTION_URL_CONFIG = 'connection.url';
export const CONNECTION_USERNAME_CONFIG = 'connection.username';
export const CONNECTION_PASSWORD_CONFIG = 'connection.password';
export const BATCH_SIZE_CONFIG = 'batch.size';
export const MAX_IN_FLIGHT_REQUESTS_CONFIG = 'max.in.flight.requests';
export const MAX_BUFFERED_RECORDS_CONFIG = 'max.buffered.records';
export const LINGER_MS_CONFIG = 'linger.ms';
export const FLUSH_TIMEOUT_MS_CONFIG = 'flush.timeout.ms';
export const MAX_RETRIES_CONFIG = 'max.retries';
export const RETRY_BACKOFF_MS_CONFIG = 'retry.backoff.ms';
export const CONNECTION_COMPRESSION_CONFIG = 'connection.compression';
export const MAX_CONNECTION_IDLE_TIME_MS_CONFIG = 'max.connection.idle.time.ms';
export const CONNECTION_TIMEOUT_MS_CONFIG = 'connection.timeout.ms';
export const READ_TIMEOUT_MS_CONFIG = 'read.timeout.ms';
export const AUTO_CREATE_INDICES_AT_START_CONFIG = 'auto.create.indices.at.start';
export const RETRY_ON_CONFLICT_CONFIG = 'retry.on.conflict';

// Data conversion
export const TYPE_NAME_CONFIG = 'type.name';
export const KEY_IGNORE_CONFIG = 'key.ignore';
export const SCHEMA_IGNORE_CONFIG = 'schema.ignore';
export const COMPACT_MAP_ENTRIES_CONFIG = 'compact.map.entries';
/** @deprecated route topics to indices with a record transform instead */
export const TOPIC_INDEX_MAP_CONFIG = 'topic.index.map';
export const TOPIC_KEY_IGNORE_CONFIG = 'topic.key.ignore';
export const TOPIC_SCHEMA_IGNORE_CONFIG = 'topic.schema.ignore';
export const DROP_INVALID_MESSAGE_CONFIG = 'drop.invalid.message';
export const BEHAVIOR_ON_NULL_VALUES_CONFIG = 'behavior.on.null.values';
export const BEHAVIOR_ON_MALFORMED_DOCS_CONFIG = 'behavior.on.malformed.documents';
export const WRITE_METHOD_CONFIG = 'write.method';
export const DOCUMENT_VERSION_TYPE_CONFIG = 'elastic.document.version.type';

// Proxy
export const PROXY_HOST_CONFIG = 'proxy.host';
export const PROXY_PORT_CONFIG = 'proxy.port';
export const PROXY_USERNAME_CONFIG = 'proxy.username';
export const PROXY_PASSWORD_CONFIG = 'proxy.password';

// Security
export const SECURITY_PROTOCOL_CONFIG = 'elastic.security.protocol';
export const CONNECTION_SSL_CONFIG_PREFIX = 'elastic.https.';

export const CONNECTOR_GROUP = 'Connector';
export const CONVERSION_GROUP = 'Data Conversion';
export const PROXY_GROUP = 'Proxy';
export const SECURITY_GROUP = 'Security';
