import { inspect } from 'node:util';
import { describe, expect, it } from 'vitest';
import {
  ConfigDefBuilder,
  ConfigError,
  MissingRequiredFieldError,
  Password,
  TypeCoercionError,
  ValidationError,
  nonEmptyList,
  parseRawConfig,
  parseValue,
  resolve,
} from '../src/index.js';

function thrown(fn: () => unknown): unknown {
  try {
    fn();
  } catch (error) {
    return error;
  }
  throw new Error('expected the call to throw');
}

const def = new ConfigDefBuilder()
  .define({ name: 'hosts', type: 'list', validator: nonEmptyList(), importance: 'high', documentation: '' })
  .define({ name: 'batch', type: 'int', defaultValue: 100, importance: 'low', documentation: '' })
  .define({ name: 'linger', type: 'long', defaultValue: 1, importance: 'low', documentation: '' })
  .define({ name: 'compress', type: 'boolean', defaultValue: false, importance: 'low', documentation: '' })
  .define({ name: 'secret', type: 'password', defaultValue: null, importance: 'low', documentation: '' })
  .define({ name: 'topics', type: 'list', defaultValue: '', importance: 'low', documentation: '' })
  .define({ name: 'label', type: 'string', defaultValue: null, importance: 'low', documentation: '' })
  .freeze();

describe('resolve', () => {
  it('fills in defaults for absent fields', () => {
    const config = resolve(def, { hosts: 'http://a:9200' });

    expect(config.getInt('batch')).toBe(100);
    expect(config.getLong('linger')).toBe(1);
    expect(config.getBoolean('compress')).toBe(false);
    expect(config.getPassword('secret')).toBeNull();
    expect(config.getList('topics')).toEqual([]);
    expect(config.getString('label')).toBeNull();
  });

  it('splits lists on commas and trims each entry', () => {
    const config = def.parse({ hosts: 'http://a:9200, http://b:9200' });

    expect(config.getList('hosts')).toEqual(['http://a:9200', 'http://b:9200']);
    expect(Object.isFrozen(config.getList('hosts'))).toBe(true);
  });

  it('names the key of a missing required field', () => {
    const error = thrown(() => resolve(def, {}));

    expect(error).toBeInstanceOf(MissingRequiredFieldError);
    expect(error).toMatchObject({
      code: 'MISSING_REQUIRED_FIELD',
      message: 'Missing required configuration "hosts" which has no default value.',
      keys: ['hosts'],
    });
  });

  it('runs validators after coercion', () => {
    const error = thrown(() => resolve(def, { hosts: '' }));

    expect(error).toBeInstanceOf(ValidationError);
    expect(error).toMatchObject({ keys: ['hosts'] });
  });

  it('reports values that do not parse as the declared type', () => {
    const error = thrown(() => resolve(def, { hosts: 'h', batch: 'ten' }));

    expect(error).toBeInstanceOf(TypeCoercionError);
    expect(error).toMatchObject({
      message: 'Invalid value ten for configuration batch: Not a number of type INT',
      keys: ['batch'],
    });
  });

  it('rejects integers outside the range of their type', () => {
    expect(() => resolve(def, { hosts: 'h', batch: '2147483648' })).toThrow(
      'Invalid value 2147483648 for configuration batch: Value out of range for type INT'
    );
    expect(() => resolve(def, { hosts: 'h', linger: '9007199254740993' })).toThrow(TypeCoercionError);
  });

  it('trims numbers and accepts booleans in any case', () => {
    const config = resolve(def, { hosts: 'h', batch: ' 42 ', compress: 'TRUE' });

    expect(config.getInt('batch')).toBe(42);
    expect(config.getBoolean('compress')).toBe(true);
  });

  it('rejects booleans other than true or false', () => {
    expect(() => resolve(def, { hosts: 'h', compress: 'yes' })).toThrow(
      'Invalid value yes for configuration compress: Expected value to be either true or false'
    );
  });

  it('keeps unknown keys as originals and reports them', () => {
    const config = resolve(def, { hosts: 'h', extra: '1' });

    expect(config.unusedKeys()).toEqual(['extra']);
    expect(config.originals()).toEqual({ hosts: 'h', extra: '1' });
    expect(config.has('extra')).toBe(false);
  });

  it('yields equal snapshots for the same input', () => {
    const input = { hosts: 'a,b', secret: 'test-secret', batch: '7' };

    expect(resolve(def, input).equals(resolve(def, input))).toBe(true);
    expect(resolve(def, input).equals(resolve(def, { ...input, batch: '8' }))).toBe(false);
    expect(resolve(def, input).equals(resolve(def, { ...input, secret: 'other-secret' }))).toBe(false);
  });
});

describe('ResolvedConfig', () => {
  const config = resolve(def, { hosts: 'h1,h2', secret: 'test-secret' });

  it('refuses typed reads of the wrong type', () => {
    expect(thrown(() => config.getString('batch'))).toMatchObject({ code: 'WRONG_TYPE', keys: ['batch'] });
    expect(thrown(() => config.get('missing'))).toMatchObject({ code: 'UNKNOWN_FIELD' });
  });

  it('never prints secrets', () => {
    const secret = config.getPassword('secret');

    expect(secret?.value()).toBe('test-secret');
    expect(String(secret)).toBe('[hidden]');
    expect(inspect(secret)).toBe('[hidden]');
    expect(config.toJSON().secret).toBe('[hidden]');
    expect(JSON.stringify(config.values())).not.toContain('test-secret');
  });

  it('renders one sorted line per field', () => {
    expect(config.toString()).toBe(
      [
        '\tbatch = 100',
        '\tcompress = false',
        '\thosts = [h1, h2]',
        '\tlabel = null',
        '\tlinger = 1',
        '\tsecret = [hidden]',
        '\ttopics = []',
      ].join('\n')
    );
  });

  it('selects originals by prefix', () => {
    const prefixed = resolve(def, { hosts: 'h', 'tls.a': '1', 'tls.': '2', other: '3' });

    expect(prefixed.originalsWithPrefix('tls.')).toEqual({ a: '1' });
    expect(prefixed.originalsWithPrefix('tls.', false)).toEqual({ 'tls.a': '1' });
  });
});

describe('parseValue', () => {
  it('keeps empty list entries between commas', () => {
    expect(parseValue('x', 'list', 'a,,b')).toEqual(['a', '', 'b']);
  });

  it('trims strings and wraps passwords', () => {
    expect(parseValue('x', 'string', '  v ')).toBe('v');
    expect(parseValue('x', 'password', 'test-secret')).toBeInstanceOf(Password);
  });

  it('passes null through', () => {
    expect(parseValue('x', 'int', null)).toBeNull();
  });

  it('clamps 64-bit longs to the largest exact number', () => {
    expect(parseValue('flush.timeout.ms', 'long', '9223372036854775807')).toBe(Number.MAX_SAFE_INTEGER);
    expect(parseValue('flush.timeout.ms', 'long', '-9223372036854775808')).toBe(Number.MIN_SAFE_INTEGER);
    expect(parseValue('flush.timeout.ms', 'long', '+42')).toBe(42);
  });

  it('rejects longs beyond 64 bits', () => {
    expect(() => parseValue('flush.timeout.ms', 'long', '9223372036854775808')).toThrow(
      'Invalid value 9223372036854775808 for configuration flush.timeout.ms: Value out of range for type LONG'
    );
  });

  it('keeps ints to 32 bits', () => {
    expect(() => parseValue('batch.size', 'int', '2147483648')).toThrow(TypeCoercionError);
  });
});

describe('parseRawConfig', () => {
  it('rejects non-string values', () => {
    const error = thrown(() => parseRawConfig({ port: 8080 }));

    expect(error).toBeInstanceOf(ConfigError);
    expect(error).toMatchObject({ code: 'INVALID_INPUT', keys: ['port'] });
  });
});
