/**
 * Immutable, typed view of one resolved configuration
 */

import type { ConfigValue, FieldDefinition, FieldType } from '../types/index.js';
import { HIDDEN, Password, isListValue } from '../types/index.js';
import { ConfigError } from '../errors/index.js';
import type { ConfigDef } from './config-def.js';

function freezeValue(value: ConfigValue): ConfigValue {
  return isListValue(value) ? Object.freeze([...value]) : value;
}

function sameValue(a: ConfigValue, b: ConfigValue): boolean {
  if (a instanceof Password) return a.equals(b);
  if (isListValue(a) && isListValue(b)) {
    return a.length === b.length && a.every((item, i) => item === b[i]);
  }
  return a === b;
}

function printable(value: ConfigValue): string | number | boolean | string[] | null {
  if (value instanceof Password) return HIDDEN;
  if (isListValue(value)) return [...value];
  return value;
}

export class ResolvedConfig {
  private readonly resolved: ReadonlyMap<string, ConfigValue>;
  private readonly input: Readonly<Record<string, string>>;

  constructor(
    readonly definition: ConfigDef,
    values: ReadonlyMap<string, ConfigValue>,
    originals: Readonly<Record<string, string>>
  ) {
    const resolved = new Map<string, ConfigValue>();
    for (const [key, value] of values) {
      resolved.set(key, freezeValue(value));
    }
    this.resolved = resolved;
    this.input = Object.freeze({ ...originals });
    Object.freeze(this);
  }

  has(name: string): boolean {
    return this.resolved.has(name);
  }

  keys(): string[] {
    return Array.from(this.resolved.keys());
  }

  get(name: string): ConfigValue {
    const value = this.resolved.get(name);
    if (value === undefined) {
      throw new ConfigError({
        code: 'UNKNOWN_FIELD',
        message: `Unknown configuration '${name}'`,
        keys: [name],
      });
    }
    return value;
  }

  getString(name: string): string | null {
    const value = this.typed(name, 'string');
    if (value === null || typeof value === 'string') return value;
    throw this.wrongType(name, 'string');
  }

  getInt(name: string): number | null {
    const value = this.typed(name, 'int');
    if (value === null || typeof value === 'number') return value;
    throw this.wrongType(name, 'int');
  }

  getLong(name: string): number | null {
    const value = this.typed(name, 'long');
    if (value === null || typeof value === 'number') return value;
    throw this.wrongType(name, 'long');
  }

  getBoolean(name: string): boolean | null {
    const value = this.typed(name, 'boolean');
    if (value === null || typeof value === 'boolean') return value;
    throw this.wrongType(name, 'boolean');
  }

  getList(name: string): readonly string[] | null {
    const value = this.typed(name, 'list');
    if (value === null || isListValue(value)) return value;
    throw this.wrongType(name, 'list');
  }

  getPassword(name: string): Password | null {
    const value = this.typed(name, 'password');
    if (value === null || value instanceof Password) return value;
    throw this.wrongType(name, 'password');
  }

  /** Raw input exactly as supplied, including keys the registry does not define */
  originals(): Record<string, string> {
    return { ...this.input };
  }

  /** Raw input whose keys start with `prefix`, with the prefix removed unless `strip` is false */
  originalsWithPrefix(prefix: string, strip = true): Record<string, string> {
    const out: Record<string, string> = {};
    for (const [key, value] of Object.entries(this.input)) {
      if (key.startsWith(prefix) && key.length > prefix.length) {
        out[strip ? key.slice(prefix.length) : key] = value;
      }
    }
    return out;
  }

  /** Supplied keys that no field definition claims */
  unusedKeys(): string[] {
    return Object.keys(this.input).filter((key) => !this.definition.has(key));
  }

  values(): Record<string, ConfigValue> {
    return Object.fromEntries(this.resolved);
  }

  equals(other: ResolvedConfig): boolean {
    if (other.resolved.size !== this.resolved.size) return false;
    for (const [key, value] of this.resolved) {
      if (!other.resolved.has(key)) return false;
      if (!sameValue(value, other.get(key))) return false;
    }
    return true;
  }

  /** Values keyed by name, secrets hidden */
  toJSON(): Record<string, string | number | boolean | string[] | null> {
    const out: Record<string, string | number | boolean | string[] | null> = {};
    for (const [key, value] of this.resolved) {
      out[key] = printable(value);
    }
    return out;
  }

  /** One `key = value` line per field, sorted by key, secrets hidden */
  toString(): string {
    return this.keys()
      .sort()
      .map((key) => {
        const value = printable(this.get(key));
        return `\t${key} = ${Array.isArray(value) ? `[${value.join(', ')}]` : String(value)}`;
      })
      .join('\n');
  }

  private typed(name: string, expected: FieldType): ConfigValue {
    const field: FieldDefinition | undefined = this.definition.get(name);
    if (field && field.type !== expected) {
      throw this.wrongType(name, expected);
    }
    return this.get(name);
  }

  private wrongType(name: string, expected: FieldType): ConfigError {
    const actual = this.definition.get(name)?.type ?? 'unknown';
    return new ConfigError({
      code: 'WRONG_TYPE',
      message: `Configuration '${name}' is of type ${actual}, not ${expected}`,
      keys: [name],
    });
  }
}
