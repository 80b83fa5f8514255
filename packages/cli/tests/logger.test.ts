import { describe, expect, it } from 'vitest';
import { Password } from '@docsink/core';
import { SINK_CONFIG_DEF, SinkConnectorConfig } from '@docsink/sink-config';
import { Logger, logConfigValues, redactSecrets, secretKeysOf } from '../src/index.js';

function capture() {
  const lines: string[] = [];
  return {
    lines,
    writer: {
      write(chunk: string) {
        lines.push(chunk);
        return true;
      },
    },
  };
}

function messages(lines: readonly string[], level: string): unknown[] {
  return lines
    .map((line): unknown => JSON.parse(line))
    .filter((record) => typeof record === 'object' && record !== null && 'level' in record && record.level === level)
    .map((record) => (typeof record === 'object' && record !== null && 'msg' in record ? record.msg : undefined));
}

describe('secretKeysOf', () => {
  it('collects the password fields of the registry, embedded ones included', () => {
    expect([...secretKeysOf(SINK_CONFIG_DEF)].sort()).toEqual([
      'connection.password',
      'elastic.https.ssl.key.password',
      'elastic.https.ssl.keystore.password',
      'elastic.https.ssl.truststore.password',
      'proxy.password',
    ]);
  });
});

describe('redactSecrets', () => {
  const secretKeys = new Set(['proxy.password']);

  it('hides the values of secret keys only', () => {
    expect(
      redactSecrets({ 'proxy.password': 'test-secret', token: 'not-a-field', 'proxy.host': 'h' }, secretKeys)
    ).toEqual({ 'proxy.password': '[hidden]', token: 'not-a-field', 'proxy.host': 'h' });
  });

  it('leaves unset secrets visible as null', () => {
    expect(redactSecrets({ 'proxy.password': null }, secretKeys)).toEqual({ 'proxy.password': null });
  });

  it('strips credentials from URLs', () => {
    expect(redactSecrets(['http://writer:test-secret@es:9200'])).toEqual(['http://writer:[hidden]@es:9200']);
  });

  it('renders password wrappers hidden', () => {
    expect(redactSecrets({ value: new Password('test-secret') })).toEqual({ value: '[hidden]' });
  });
});

describe('Logger', () => {
  it('drops records below the configured level', () => {
    const out = capture();
    const logger = new Logger({ level: 'warn', format: 'json', writer: out.writer });

    logger.info('skipped');
    logger.warn('kept');

    expect(messages(out.lines, 'warn')).toEqual(['kept']);
    expect(out.lines).toHaveLength(1);
  });

  it('writes text lines with the trace id of a child logger', () => {
    const out = capture();
    const logger = new Logger({ writer: out.writer }).child({ traceId: 'trace-1' });

    logger.error('boom');

    expect(out.lines).toHaveLength(1);
    expect(out.lines[0]).toMatch(/^\[[^\]]+\] ERROR trace=trace-1 boom\n$/);
  });
});

describe('logConfigValues', () => {
  it('logs the values with secrets hidden', () => {
    const out = capture();
    const config = new SinkConnectorConfig({
      'connection.url': 'http://a:9200',
      'type.name': '_doc',
      'connection.password': 'test-secret',
    });

    logConfigValues(new Logger({ format: 'json', writer: out.writer }), config);

    const [info] = messages(out.lines, 'info');
    expect(info).toEqual(expect.stringContaining('\tconnection.password = [hidden]'));
    expect(out.lines.join('')).not.toContain('test-secret');
    expect(messages(out.lines, 'warn')).toEqual([]);
  });

  it('logs the raw input at debug with password fields hidden', () => {
    const out = capture();
    const config = new SinkConnectorConfig({
      'connection.url': 'http://writer:test-secret@a:9200',
      'type.name': '_doc',
      'elastic.https.ssl.truststore.password': 'test-secret',
    });
    const logger = new Logger({
      level: 'debug',
      format: 'json',
      writer: out.writer,
      secretKeys: secretKeysOf(SINK_CONFIG_DEF),
    });

    logConfigValues(logger, config);

    const debug = out.lines
      .map((line): unknown => JSON.parse(line))
      .find((record) => typeof record === 'object' && record !== null && 'level' in record && record.level === 'debug');
    expect(debug).toMatchObject({
      msg: 'Raw connector properties',
      properties: {
        'connection.url': 'http://writer:[hidden]@a:9200',
        'type.name': '_doc',
        'elastic.https.ssl.truststore.password': '[hidden]',
      },
    });
    expect(out.lines.join('')).not.toContain('test-secret');
  });

  it('warns about input that has no effect', () => {
    const out = capture();
    const config = new SinkConnectorConfig({
      'connection.url': 'http://a:9200',
      'type.name': '_doc',
      'foo.bar': 'x',
      'topic.index.map': 'orders:orders-v2',
      'elastic.https.ssl.protocol': 'TLSv1.3',
    });

    logConfigValues(new Logger({ level: 'warn', format: 'json', writer: out.writer }), config);

    expect(messages(out.lines, 'warn')).toEqual([
      "The configuration 'foo.bar' was supplied but isn't a known config.",
      'topic.index.map is deprecated; map topics to indices with a record transform instead.',
      'elastic.security.protocol is PLAINTEXT; ignoring elastic.https.ssl.protocol.',
    ]);
  });
});
