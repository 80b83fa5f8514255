/**
 * Field registry for the document sink
 *
 * Built once at module load from four independent groups and frozen into
 * SINK_CONFIG_DEF. Resolvers receive it as a parameter.
 */

import {
  ConfigDef,
  ConfigDefBuilder,
  between,
  clientSslConfigDef,
  nonEmptyList,
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
  CONNECTOR_GROUP,
  CONVERSION_GROUP,
  DOCUMENT_VERSION_TYPE_CONFIG,
  DROP_INVALID_MESSAGE_CONFIG,
  FLUSH_TIMEOUT_MS_CONFIG,
  KEY_IGNORE_CONFIG,
  LINGER_MS_CONFIG,
  MAX_BUFFERED_RECORDS_CONFIG,
  MAX_CONNECTION_IDLE_TIME_MS_CONFIG,
  MAX_IN_FLIGHT_REQUESTS_CONFIG,
  MAX_RETRIES_CONFIG,
  PROXY_GROUP,
  PROXY_HOST_CONFIG,
  PROXY_PASSWORD_CONFIG,
  PROXY_PORT_CONFIG,
  PROXY_USERNAME_CONFIG,
  READ_TIMEOUT_MS_CONFIG,
  RETRY_BACKOFF_MS_CONFIG,
  RETRY_ON_CONFLICT_CONFIG,
  SCHEMA_IGNORE_CONFIG,
  SECURITY_GROUP,
  SECURITY_PROTOCOL_CONFIG,
  TOPIC_INDEX_MAP_CONFIG,
  TOPIC_KEY_IGNORE_CONFIG,
  TOPIC_SCHEMA_IGNORE_CONFIG,
  TYPE_NAME_CONFIG,
  WRITE_METHOD_CONFIG,
} from './config-keys.js';
import {
  BEHAVIOR_ON_MALFORMED_DOCS,
  BEHAVIOR_ON_NULL_VALUES,
  DOCUMENT_VERSION_TYPE,
  SECURITY_PROTOCOL,
  WRITE_METHOD,
} from './enums.js';

export const PROXY_PORT_DEFAULT = 8080;

export function addConnectorConfigs(builder: ConfigDefBuilder): void {
  const group = CONNECTOR_GROUP;
  let order = 0;
  builder
    .define({
      name: CONNECTION_URL_CONFIG,
      type: 'list',
      validator: nonEmptyList(),
      importance: 'high',
      documentation:
        'The comma-separated list of one or more Elasticsearch URLs, such as ' +
        '``http://eshost1:9200,http://eshost2:9200`` or ``https://eshost3:9200``. HTTPS is used ' +
        'for all connections if any of the URLs starts with ``https:``. A URL without a protocol ' +
        'is treated as ``http``.',
      group,
      orderInGroup: ++order,
      width: 'long',
      displayName: 'Connection URLs',
    })
    .define({
      name: CONNECTION_USERNAME_CONFIG,
      type: 'string',
      defaultValue: null,
      importance: 'medium',
      documentation:
        'The username used to authenticate with Elasticsearch. The default is null, and ' +
        'authentication is only performed if both the username and password are non-null.',
      group,
      orderInGroup: ++order,
      width: 'short',
      displayName: 'Connection Username',
    })
    .define({
      name: CONNECTION_PASSWORD_CONFIG,
      type: 'password',
      defaultValue: null,
      importance: 'medium',
      documentation:
        'The password used to authenticate with Elasticsearch. The default is null, and ' +
        'authentication is only performed if both the username and password are non-null.',
      group,
      orderInGroup: ++order,
      width: 'short',
      displayName: 'Connection Password',
    })
    .define({
      name: BATCH_SIZE_CONFIG,
      type: 'int',
      defaultValue: 2000,
      importance: 'medium',
      documentation: 'The number of records to process as a batch when writing to Elasticsearch.',
      group,
      orderInGroup: ++order,
      width: 'short',
      displayName: 'Batch Size',
    })
    .define({
      name: MAX_IN_FLIGHT_REQUESTS_CONFIG,
      type: 'int',
      defaultValue: 5,
      importance: 'medium',
      documentation:
        'The maximum number of indexing requests that can be in-flight to Elasticsearch before ' +
        'blocking further requests.',
      group,
      orderInGroup: 5,
      width: 'short',
      displayName: 'Max In-flight Requests',
    })
    .define({
      name: MAX_BUFFERED_RECORDS_CONFIG,
      type: 'int',
      defaultValue: 20000,
      importance: 'low',
      documentation:
        'The maximum number of records each task will buffer before blocking acceptance of ' +
        'more records. This config can be used to limit the memory usage for each task.',
      group,
      orderInGroup: ++order,
      width: 'short',
      displayName: 'Max Buffered Records',
    })
    .define({
      name: LINGER_MS_CONFIG,
      type: 'long',
      defaultValue: 1,
      importance: 'low',
      documentation:
        'Linger time in milliseconds for batching.\n' +
        `Records that arrive in between request transmissions are batched into a single bulk ` +
        `indexing request, based on the \`\`${BATCH_SIZE_CONFIG}\`\` configuration. Normally this ` +
        'only occurs under load when records arrive faster than they can be sent out. When a ' +
        'pending batch is not full, the task waits up to the given delay for other records to ' +
        'be added, so that light load also benefits from bulk indexing.',
      group,
      orderInGroup: ++order,
      width: 'short',
      displayName: 'Linger (ms)',
    })
    .define({
      name: FLUSH_TIMEOUT_MS_CONFIG,
      type: 'long',
      defaultValue: 10000,
      importance: 'low',
      documentation:
        'The timeout in milliseconds to use for periodic flushing, and when waiting for buffer ' +
        'space to be made available by completed requests as records are added. If this ' +
        'timeout is exceeded the task will fail. Values above 9007199254740991 (such as ' +
        '9223372036854775807) are clamped to it.',
      group,
      orderInGroup: ++order,
      width: 'short',
      displayName: 'Flush Timeout (ms)',
    })
    .define({
      name: MAX_RETRIES_CONFIG,
      type: 'int',
      defaultValue: 5,
      importance: 'low',
      documentation:
        'The maximum number of retries that are allowed for failed indexing requests. If the ' +
        'retry attempts are exhausted the task will fail.',
      group,
      orderInGroup: ++order,
      width: 'short',
      displayName: 'Max Retries',
    })
    .define({
      name: RETRY_BACKOFF_MS_CONFIG,
      type: 'long',
      defaultValue: 100,
      importance: 'low',
      documentation:
        'How long to wait in milliseconds before attempting the first retry of a failed ' +
        'indexing request. Each further attempt may wait up to twice as long as the previous ' +
        'one, up to the maximum number of retries.',
      group,
      orderInGroup: ++order,
      width: 'short',
      displayName: 'Retry Backoff (ms)',
    })
    .define({
      name: CONNECTION_COMPRESSION_CONFIG,
      type: 'boolean',
      defaultValue: false,
      importance: 'low',
      documentation:
        'Whether to use GZip compression on the HTTP connection to Elasticsearch. The ' +
        '``http.compression`` setting also needs to be enabled on the Elasticsearch nodes or ' +
        'the load balancer for this to take effect.',
      group,
      orderInGroup: ++order,
      width: 'short',
      displayName: 'Compression',
    })
    .define({
      name: MAX_CONNECTION_IDLE_TIME_MS_CONFIG,
      type: 'int',
      defaultValue: '60000',
      importance: 'low',
      documentation:
        'How long to wait in milliseconds before dropping an idle connection to prevent a ' +
        'read timeout.',
      group,
      orderInGroup: ++order,
      width: 'short',
      displayName: 'Max Connection Idle Time',
    })
    .define({
      name: CONNECTION_TIMEOUT_MS_CONFIG,
      type: 'int',
      defaultValue: 1000,
      importance: 'low',
      documentation:
        'How long to wait in milliseconds when establishing a connection to the Elasticsearch ' +
        'server. The task fails if the client fails to connect in this interval, and will need ' +
        'to be restarted.',
      group,
      orderInGroup: ++order,
      width: 'short',
      displayName: 'Connection Timeout',
    })
    .define({
      name: READ_TIMEOUT_MS_CONFIG,
      type: 'int',
      defaultValue: 3000,
      importance: 'low',
      documentation:
        'How long to wait in milliseconds for the Elasticsearch server to send a response. The ' +
        'task fails if any read operation times out, and will need to be restarted to resume ' +
        'further operations.',
      group,
      orderInGroup: ++order,
      width: 'short',
      displayName: 'Read Timeout',
    })
    .define({
      name: AUTO_CREATE_INDICES_AT_START_CONFIG,
      type: 'boolean',
      defaultValue: true,
      importance: 'low',
      documentation:
        'Auto create the Elasticsearch indices at startup. This is useful when the indices are ' +
        'a direct mapping of the topics.',
      group,
      orderInGroup: ++order,
      width: 'short',
      displayName: 'Create indices at startup',
    })
    .define({
      name: RETRY_ON_CONFLICT_CONFIG,
      type: 'int',
      defaultValue: 0,
      importance: 'low',
      documentation:
        'How many times Elasticsearch should retry the operation when a version conflict ' +
        "occurs while using the ``upsert`` write method.",
      group,
      orderInGroup: ++order,
      width: 'short',
      displayName: 'Retry on conflict',
    });
}

export function addConversionConfigs(builder: ConfigDefBuilder): void {
  const group = CONVERSION_GROUP;
  let order = 0;
  builder
    .define({
      name: TYPE_NAME_CONFIG,
      type: 'string',
      importance: 'high',
      documentation: 'The Elasticsearch type name to use when indexing.',
      group,
      orderInGroup: ++order,
      width: 'short',
      displayName: 'Type Name',
    })
    .define({
      name: KEY_IGNORE_CONFIG,
      type: 'boolean',
      defaultValue: false,
      importance: 'high',
      documentation:
        'Whether to ignore the record key for the purpose of forming the Elasticsearch ' +
        'document ID. When this is set to ``true``, document IDs are generated as the ' +
        "record's ``topic+partition+offset``.\nThis is a global setting; use " +
        `\`\`${TOPIC_KEY_IGNORE_CONFIG}\`\` to override it as \`\`true\`\` for specific topics.`,
      group,
      orderInGroup: ++order,
      width: 'short',
      displayName: 'Ignore Key mode',
    })
    .define({
      name: SCHEMA_IGNORE_CONFIG,
      type: 'boolean',
      defaultValue: false,
      importance: 'low',
      documentation:
        'Whether to ignore schemas during indexing. When this is set to ``true``, the record ' +
        'schema is not used to register an Elasticsearch mapping and Elasticsearch infers the ' +
        'mapping from the data (dynamic mapping needs to be enabled).\nThis is a global ' +
        `setting; use \`\`${TOPIC_SCHEMA_IGNORE_CONFIG}\`\` to override it as \`\`true\`\` for ` +
        'specific topics.',
      group,
      orderInGroup: ++order,
      width: 'short',
      displayName: 'Ignore Schema mode',
    })
    .define({
      name: COMPACT_MAP_ENTRIES_CONFIG,
      type: 'boolean',
      defaultValue: true,
      importance: 'low',
      documentation:
        'Defines how map entries with string keys within record values are written to JSON. ' +
        'When ``true``, these entries are written compactly as ``"entryKey": "entryValue"``. ' +
        'Otherwise they are written as a nested document ' +
        '``{"key": "entryKey", "value": "entryValue"}``. Map entries with non-string keys are ' +
        'always written as nested documents.',
      group,
      orderInGroup: ++order,
      width: 'short',
      displayName: 'Compact Map Entries',
    })
    .define({
      name: TOPIC_INDEX_MAP_CONFIG,
      type: 'list',
      defaultValue: '',
      importance: 'low',
      documentation:
        'This option is deprecated and may be removed in a future version. Use a record ' +
        'transform to map topic names to index names instead.\nA map from topic name to the ' +
        'destination Elasticsearch index, represented as a list of ``topic:index`` pairs.',
      group,
      orderInGroup: ++order,
      width: 'long',
      displayName: 'Topic to Index Map',
    })
    .define({
      name: TOPIC_KEY_IGNORE_CONFIG,
      type: 'list',
      defaultValue: '',
      importance: 'low',
      documentation: `List of topics for which \`\`${KEY_IGNORE_CONFIG}\`\` should be \`\`true\`\`.`,
      group,
      orderInGroup: ++order,
      width: 'long',
      displayName: "Topics for 'Ignore Key' mode",
    })
    .define({
      name: TOPIC_SCHEMA_IGNORE_CONFIG,
      type: 'list',
      defaultValue: '',
      importance: 'low',
      documentation: `List of topics for which \`\`${SCHEMA_IGNORE_CONFIG}\`\` should be \`\`true\`\`.`,
      group,
      orderInGroup: ++order,
      width: 'long',
      displayName: "Topics for 'Ignore Schema' mode",
    })
    .define({
      name: DROP_INVALID_MESSAGE_CONFIG,
      type: 'boolean',
      defaultValue: false,
      importance: 'low',
      documentation: 'Whether to drop a message when it cannot be converted to an output document.',
      group,
      orderInGroup: ++order,
      width: 'long',
      displayName: 'Drop invalid messages',
    })
    .define({
      name: BEHAVIOR_ON_NULL_VALUES_CONFIG,
      type: 'string',
      defaultValue: BEHAVIOR_ON_NULL_VALUES.defaultValue(),
      validator: BEHAVIOR_ON_NULL_VALUES,
      importance: 'low',
      documentation:
        'How to handle records with a non-null key and a null value (tombstone records). ' +
        `Valid options are ${BEHAVIOR_ON_NULL_VALUES.values().map((v) => `'${v}'`).join(', ')}.`,
      group,
      orderInGroup: ++order,
      width: 'short',
      displayName: 'Behavior for null-valued records',
    })
    .define({
      name: BEHAVIOR_ON_MALFORMED_DOCS_CONFIG,
      type: 'string',
      defaultValue: BEHAVIOR_ON_MALFORMED_DOCS.defaultValue(),
      validator: BEHAVIOR_ON_MALFORMED_DOCS,
      importance: 'low',
      documentation:
        'How to handle records that Elasticsearch rejects due to some malformation of the ' +
        'document itself, such as an index mapping conflict, a field name containing illegal ' +
        'characters, or a record with a missing id. Valid options are ' +
        `${BEHAVIOR_ON_MALFORMED_DOCS.values().map((v) => `'${v}'`).join(', ')}.`,
      group,
      orderInGroup: ++order,
      width: 'short',
      displayName: 'Behavior on malformed documents',
    })
    .define({
      name: WRITE_METHOD_CONFIG,
      type: 'string',
      defaultValue: WRITE_METHOD.defaultValue(),
      validator: WRITE_METHOD,
      importance: 'low',
      documentation:
        'Method used for writing data to Elasticsearch, either ``insert`` or ``upsert``. With ' +
        '``insert`` the connector builds a document from the record value and replaces any ' +
        'existing document with the same ID. With ``upsert`` a new document is created if none ' +
        'with that ID exists, otherwise only the fields present in the record value are added ' +
        'or replaced. ``upsert`` may need more time and resources from Elasticsearch, so ' +
        `consider increasing ${FLUSH_TIMEOUT_MS_CONFIG} and ${READ_TIMEOUT_MS_CONFIG}, and ` +
        `decreasing ${BATCH_SIZE_CONFIG}.`,
      group,
      orderInGroup: ++order,
      width: 'short',
      displayName: 'Write method',
    })
    .define({
      name: DOCUMENT_VERSION_TYPE_CONFIG,
      type: 'string',
      defaultValue: DOCUMENT_VERSION_TYPE.defaultValue(),
      validator: DOCUMENT_VERSION_TYPE,
      importance: 'low',
      documentation:
        'The version type used by the connector. Values can be ' +
        `${DOCUMENT_VERSION_TYPE.values().join(', ')}.`,
      group,
      orderInGroup: ++order,
      width: 'short',
      displayName: 'Document version',
    });
}

export function addProxyConfigs(builder: ConfigDefBuilder): void {
  const group = PROXY_GROUP;
  let orderInGroup = 0;
  builder
    .define({
      name: PROXY_HOST_CONFIG,
      type: 'string',
      defaultValue: '',
      importance: 'low',
      documentation:
        'The address of the proxy host to connect through. Supports the basic authentication ' +
        'scheme only.',
      group,
      orderInGroup: orderInGroup++,
      width: 'long',
      displayName: 'Proxy Host',
    })
    .define({
      name: PROXY_PORT_CONFIG,
      type: 'int',
      defaultValue: PROXY_PORT_DEFAULT,
      validator: between(1, 65535),
      importance: 'low',
      documentation: 'The port of the proxy host to connect through.',
      group,
      orderInGroup: orderInGroup++,
      width: 'long',
      displayName: 'Proxy Port',
    })
    .define({
      name: PROXY_USERNAME_CONFIG,
      type: 'string',
      defaultValue: '',
      importance: 'low',
      documentation: 'The username for the proxy host.',
      group,
      orderInGroup: orderInGroup++,
      width: 'long',
      displayName: 'Proxy Username',
    })
    .define({
      name: PROXY_PASSWORD_CONFIG,
      type: 'password',
      defaultValue: null,
      importance: 'low',
      documentation: 'The password for the proxy host.',
      group,
      orderInGroup: orderInGroup++,
      width: 'long',
      displayName: 'Proxy Password',
    });
}

export function addSecurityConfigs(builder: ConfigDefBuilder): void {
  let order = 0;
  builder.define({
    name: SECURITY_PROTOCOL_CONFIG,
    type: 'string',
    defaultValue: SECURITY_PROTOCOL.defaultValue(),
    validator: SECURITY_PROTOCOL,
    importance: 'medium',
    documentation:
      'The security protocol to use when connecting to Elasticsearch. Values can be ' +
      '`PLAINTEXT` or `SSL`. If `PLAINTEXT` is passed, all configs prefixed by ' +
      `${CONNECTION_SSL_CONFIG_PREFIX} are ignored.`,
    group: SECURITY_GROUP,
    orderInGroup: ++order,
    width: 'short',
    displayName: 'Security protocol',
  });
  builder.embed(CONNECTION_SSL_CONFIG_PREFIX, SECURITY_GROUP, builder.size + 2, clientSslConfigDef());
}

export function baseConfigDef(): ConfigDef {
  const builder = new ConfigDefBuilder();
  addConnectorConfigs(builder);
  addConversionConfigs(builder);
  addProxyConfigs(builder);
  addSecurityConfigs(builder);
  return builder.freeze();
}

/** The sink's registry, shared read-only by every configuration instance */
export const SINK_CONFIG_DEF = baseConfigDef();
