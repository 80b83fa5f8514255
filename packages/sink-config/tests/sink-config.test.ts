import { describe, expect, it } from 'vitest';
import {
  ConfigurationConflictError,
  MissingRequiredFieldError,
  TypeCoercionError,
  ValidationError,
} from '@docsink/core';
import {
  BEHAVIOR_ON_MALFORMED_DOCS,
  BEHAVIOR_ON_MALFORMED_DOCS_CONFIG,
  BEHAVIOR_ON_NULL_VALUES,
  BEHAVIOR_ON_NULL_VALUES_CONFIG,
  DOCUMENT_VERSION_TYPE,
  DOCUMENT_VERSION_TYPE_CONFIG,
  SECURITY_PROTOCOL,
  SECURITY_PROTOCOL_CONFIG,
  SINK_CONFIG_DEF,
  SSL_ENDPOINT_IDENTIFICATION_KEY,
  SinkConnectorConfig,
  WRITE_METHOD,
  WRITE_METHOD_CONFIG,
} from '../src/index.js';

const base = {
  'connection.url': 'http://a:9200',
  'type.name': '_doc',
};

function thrown(fn: () => unknown): unknown {
  try {
    fn();
  } catch (error) {
    return error;
  }
  throw new Error('expected the call to throw');
}

describe('SinkConnectorConfig defaults', () => {
  const config = new SinkConnectorConfig(base);

  it('resolves every documented default', () => {
    expect(config.connectionUsername).toBeNull();
    expect(config.connectionPassword).toBeNull();
    expect(config.batchSize).toBe(2000);
    expect(config.maxInFlightRequests).toBe(5);
    expect(config.maxBufferedRecords).toBe(20000);
    expect(config.lingerMs).toBe(1);
    expect(config.flushTimeoutMs).toBe(10000);
    expect(config.maxRetries).toBe(5);
    expect(config.retryBackoffMs).toBe(100);
    expect(config.connectionCompression).toBe(false);
    expect(config.maxConnectionIdleTimeMs).toBe(60000);
    expect(config.connectionTimeoutMs).toBe(1000);
    expect(config.readTimeoutMs).toBe(3000);
    expect(config.autoCreateIndicesAtStart).toBe(true);
    expect(config.retryOnConflict).toBe(0);
    expect(config.keyIgnore).toBe(false);
    expect(config.schemaIgnore).toBe(false);
    expect(config.compactMapEntries).toBe(true);
    expect(config.topicIndexMap).toEqual([]);
    expect(config.topicKeyIgnore).toEqual([]);
    expect(config.topicSchemaIgnore).toEqual([]);
    expect(config.dropInvalidMessage).toBe(false);
    expect(config.behaviorOnNullValues).toBe('ignore');
    expect(config.behaviorOnMalformedDocuments).toBe('fail');
    expect(config.writeMethod).toBe('insert');
    expect(config.documentVersionType).toBe('legacy');
    expect(config.proxyHost).toBe('');
    expect(config.proxyPort).toBe(8080);
    expect(config.proxyUsername).toBe('');
    expect(config.proxyPassword).toBeNull();
    expect(config.securityProtocol).toBe('PLAINTEXT');
  });

  it('defaults the embedded TLS fields too', () => {
    expect(config.values.getString('elastic.https.ssl.protocol')).toBe('TLSv1.2');
    expect(config.values.getString(SSL_ENDPOINT_IDENTIFICATION_KEY)).toBe('https');
  });

  it('is immutable', () => {
    expect(Object.isFrozen(config)).toBe(true);
    expect(Object.isFrozen(config.connectionUrls)).toBe(true);
  });
});

describe('required fields', () => {
  it.each(['connection.url', 'type.name'])('fails naming %s when it is omitted', (key) => {
    const props: Record<string, string> = { ...base };
    delete props[key];

    const error = thrown(() => new SinkConnectorConfig(props));
    expect(error).toBeInstanceOf(MissingRequiredFieldError);
    expect(error).toMatchObject({ keys: [key] });
  });

  it('rejects an empty connection.url', () => {
    expect(() => new SinkConnectorConfig({ ...base, 'connection.url': '' })).toThrow(ValidationError);
  });
});

describe('list parsing', () => {
  it('keeps connection URLs in order', () => {
    const config = new SinkConnectorConfig({
      ...base,
      'connection.url': 'http://a:9200,http://b:9200',
    });

    expect(config.connectionUrls).toEqual(['http://a:9200', 'http://b:9200']);
  });

  it('parses an empty topic.index.map as an empty list', () => {
    const config = new SinkConnectorConfig({ ...base, 'topic.index.map': '' });

    expect(config.topicIndexMap).toEqual([]);
    expect(config.topicToIndexMap().size).toBe(0);
  });
});

describe('enumerations', () => {
  const cases = [
    { key: BEHAVIOR_ON_NULL_VALUES_CONFIG, values: BEHAVIOR_ON_NULL_VALUES.values() },
    { key: BEHAVIOR_ON_MALFORMED_DOCS_CONFIG, values: BEHAVIOR_ON_MALFORMED_DOCS.values() },
    { key: WRITE_METHOD_CONFIG, values: WRITE_METHOD.values() },
    { key: DOCUMENT_VERSION_TYPE_CONFIG, values: DOCUMENT_VERSION_TYPE.values() },
    { key: SECURITY_PROTOCOL_CONFIG, values: SECURITY_PROTOCOL.values() },
  ];

  it.each(cases)('round-trips every legal value of $key', ({ key, values }) => {
    for (const value of values) {
      const config = new SinkConnectorConfig({ ...base, [key]: value });
      expect(config.values.getString(key)).toBe(value);
    }
  });

  it.each(cases)('rejects values outside the set for $key', ({ key }) => {
    const error = thrown(() => new SinkConnectorConfig({ ...base, [key]: 'bogus' }));

    expect(error).toBeInstanceOf(ValidationError);
    expect(error).toMatchObject({ keys: [key] });
  });

  it('does not fold case', () => {
    expect(() => new SinkConnectorConfig({ ...base, 'write.method': 'UPSERT' })).toThrow(ValidationError);
    expect(() => new SinkConnectorConfig({ ...base, 'elastic.security.protocol': 'ssl' })).toThrow(
      ValidationError
    );
  });

  it('exposes the typed enum values', () => {
    const config = new SinkConnectorConfig({
      ...base,
      'behavior.on.null.values': 'delete',
      'behavior.on.malformed.documents': 'warn',
      'write.method': 'upsert',
      'elastic.document.version.type': 'message-offset',
    });

    expect(config.behaviorOnNullValues).toBe('delete');
    expect(config.behaviorOnMalformedDocuments).toBe('warn');
    expect(config.writeMethod).toBe('upsert');
    expect(config.documentVersionType).toBe('message-offset');
  });
});

describe('long fields', () => {
  it('clamps a 64-bit flush timeout', () => {
    const config = new SinkConnectorConfig({ ...base, 'flush.timeout.ms': '9223372036854775807' });

    expect(config.flushTimeoutMs).toBe(Number.MAX_SAFE_INTEGER);
    expect(SINK_CONFIG_DEF.get('flush.timeout.ms')?.documentation).toContain(
      'Values above 9007199254740991'
    );
  });
});

describe('proxy.port', () => {
  it.each(['1', '65535'])('accepts %s', (port) => {
    expect(new SinkConnectorConfig({ ...base, 'proxy.port': port }).proxyPort).toBe(Number(port));
  });

  it.each(['0', '65536', '-1'])('rejects %s', (port) => {
    expect(() => new SinkConnectorConfig({ ...base, 'proxy.port': port })).toThrow(TypeCoercionError);
  });
});

describe('proxy coherence', () => {
  it('rejects a username without a host', () => {
    const error = thrown(
      () => new SinkConnectorConfig({ ...base, 'proxy.host': '', 'proxy.username': 'x' })
    );

    expect(error).toBeInstanceOf(ConfigurationConflictError);
    expect(error).toMatchObject({
      code: 'CONFIGURATION_CONFLICT',
      message: 'proxy.username and proxy.password cannot be set without proxy.host.',
    });
  });

  it('rejects a password without a host', () => {
    expect(
      () => new SinkConnectorConfig({ ...base, 'proxy.password': 'test-secret' })
    ).toThrow(ConfigurationConflictError);
  });

  it('accepts no host and no credentials', () => {
    const config = new SinkConnectorConfig({ ...base, 'proxy.host': '', 'proxy.username': '' });

    expect(config.isBasicProxyConfigured()).toBe(false);
    expect(config.isProxyAuthenticated()).toBe(false);
  });

  it('rejects a host with a username but no password', () => {
    const error = thrown(
      () => new SinkConnectorConfig({ ...base, 'proxy.host': 'h', 'proxy.username': 'x' })
    );

    expect(error).toBeInstanceOf(ConfigurationConflictError);
    expect(error).toMatchObject({
      message: 'Both proxy.username and proxy.password must be set, or both left empty.',
      keys: ['proxy.username', 'proxy.password'],
      suggestion: 'Set proxy.password, or remove the other one for an anonymous proxy.',
    });
  });

  it('rejects a host with a password but no username', () => {
    expect(
      () => new SinkConnectorConfig({ ...base, 'proxy.host': 'h', 'proxy.password': 'test-secret' })
    ).toThrow(ConfigurationConflictError);
  });

  it('accepts an anonymous proxy', () => {
    const config = new SinkConnectorConfig({ ...base, 'proxy.host': 'h' });

    expect(config.isBasicProxyConfigured()).toBe(true);
    expect(config.isProxyAuthenticated()).toBe(false);
  });

  it('accepts an authenticated proxy', () => {
    const config = new SinkConnectorConfig({
      ...base,
      'proxy.host': 'h',
      'proxy.username': 'x',
      'proxy.password': 'test-secret',
    });

    expect(config.isProxyAuthenticated()).toBe(true);
    expect(config.proxyPassword?.value()).toBe('test-secret');
  });
});

describe('security views', () => {
  it('is secured only for SSL', () => {
    expect(new SinkConnectorConfig(base).isSecured()).toBe(false);
    expect(new SinkConnectorConfig({ ...base, 'elastic.security.protocol': 'PLAINTEXT' }).isSecured()).toBe(
      false
    );
    expect(new SinkConnectorConfig({ ...base, 'elastic.security.protocol': 'SSL' }).isSecured()).toBe(true);
  });

  it('disables hostname verification only for an explicit empty algorithm', () => {
    expect(new SinkConnectorConfig(base).hostnameVerificationDisabled()).toBe(false);
    expect(
      new SinkConnectorConfig({ ...base, [SSL_ENDPOINT_IDENTIFICATION_KEY]: '' }).hostnameVerificationDisabled()
    ).toBe(true);
    expect(
      new SinkConnectorConfig({ ...base, [SSL_ENDPOINT_IDENTIFICATION_KEY]: 'https' }).hostnameVerificationDisabled()
    ).toBe(false);
  });

  it('resolves the prefixed TLS settings on their own', () => {
    const config = new SinkConnectorConfig({
      ...base,
      'elastic.security.protocol': 'SSL',
      'elastic.https.ssl.truststore.location': '/etc/ssl/trust.pem',
      'elastic.https.ssl.truststore.type': 'PEM',
      'elastic.https.ssl.truststore.password': 'test-secret',
      'ssl.truststore.location': '/ignored.pem',
    });

    const ssl = config.securitySubNamespace();
    expect(ssl.truststoreLocation).toBe('/etc/ssl/trust.pem');
    expect(ssl.truststoreType).toBe('PEM');
    expect(ssl.truststorePassword?.value()).toBe('test-secret');
    expect(ssl.keystoreType).toBe('PKCS12');
    expect(ssl.endpointIdentificationAlgorithm).toBe('https');
  });

  it('accepts any store type under the TLS prefix', () => {
    const config = new SinkConnectorConfig({
      ...base,
      'elastic.security.protocol': 'SSL',
      'elastic.https.ssl.truststore.type': 'JKS',
      'elastic.https.ssl.keymanager.algorithm': 'PKIX',
    });

    expect(config.values.getString('elastic.https.ssl.truststore.type')).toBe('JKS');
    expect(config.securitySubNamespace().truststoreType).toBe('JKS');
    expect(config.securitySubNamespace().keymanagerAlgorithm).toBe('PKIX');
  });
});

describe('connection views', () => {
  it('uses HTTPS when any URL asks for it', () => {
    const config = new SinkConnectorConfig({
      ...base,
      'connection.url': 'http://a:9200,https://b:9200',
    });

    expect(config.isHttps()).toBe(true);
    expect(new SinkConnectorConfig(base).isHttps()).toBe(false);
  });

  it('returns credentials only when both are set', () => {
    const full = new SinkConnectorConfig({
      ...base,
      'connection.username': 'writer',
      'connection.password': 'test-secret',
    });
    const partial = new SinkConnectorConfig({ ...base, 'connection.username': 'writer' });

    expect(full.connectionCredentials()?.username).toBe('writer');
    expect(full.connectionCredentials()?.password.value()).toBe('test-secret');
    expect(partial.connectionCredentials()).toBeNull();
  });

  it('collects per-topic overrides as sets', () => {
    const config = new SinkConnectorConfig({
      ...base,
      'topic.key.ignore': 'orders, users',
      'topic.schema.ignore': 'logs',
    });

    expect([...config.ignoreKeyTopics()]).toEqual(['orders', 'users']);
    expect(config.ignoreSchemaTopics().has('logs')).toBe(true);
  });

  it('parses topic:index pairs', () => {
    const config = new SinkConnectorConfig({
      ...base,
      'topic.index.map': 'orders:orders-v2, users:people',
    });

    expect(Object.fromEntries(config.topicToIndexMap())).toEqual({
      orders: 'orders-v2',
      users: 'people',
    });
  });

  it('rejects a malformed topic:index pair when read', () => {
    const config = new SinkConnectorConfig({ ...base, 'topic.index.map': 'orders' });

    expect(() => config.topicToIndexMap()).toThrow(ValidationError);
  });
});

describe('idempotence', () => {
  it('resolves the same input to equal snapshots', () => {
    const props = {
      ...base,
      'batch.size': '500',
      'connection.password': 'test-secret',
      'proxy.host': 'h',
    };
    const first = new SinkConnectorConfig(props);
    const second = new SinkConnectorConfig(props);

    expect(first.values.equals(second.values)).toBe(true);
    expect(first.toJSON()).toEqual(second.toJSON());
  });

  it('hides secrets when printed', () => {
    const config = new SinkConnectorConfig({ ...base, 'connection.password': 'test-secret' });

    expect(config.toString()).toContain('\tconnection.password = [hidden]');
    expect(JSON.stringify(config)).not.toContain('test-secret');
  });
});
