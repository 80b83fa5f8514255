/**
 * Coercion of raw configuration values into typed values
 */

import type { ConfigValue, FieldType } from '../types/index.js';
import { Password } from '../types/index.js';
import { TypeCoercionError } from '../errors/index.js';

const INT_MIN = -(2 ** 31);
const INT_MAX = 2 ** 31 - 1;
const LONG_MIN = -(2n ** 63n);
const LONG_MAX = 2n ** 63n - 1n;
const INTEGER_PATTERN = /^[+-]?\d+$/;
const COMMA_WITH_WHITESPACE = /\s*,\s*/;

const TYPE_LABELS: Record<FieldType, string> = {
  string: 'STRING',
  int: 'INT',
  long: 'LONG',
  boolean: 'BOOLEAN',
  password: 'PASSWORD',
  list: 'LIST',
};

function fail(name: string, raw: unknown, reason: string, type: FieldType): never {
  throw new TypeCoercionError({
    message: `Invalid value ${String(raw)} for configuration ${name}: ${reason}`,
    keys: [name],
    suggestion: `Provide a value of type ${TYPE_LABELS[type]} for "${name}".`,
    context: { type },
  });
}

function isStringArray(value: unknown): value is string[] {
  return Array.isArray(value) && value.every((item) => typeof item === 'string');
}

function parseInteger(name: string, raw: unknown, type: 'int' | 'long'): number {
  const reason = `Not a number of type ${TYPE_LABELS[type]}`;
  let parsed: number;

  if (typeof raw === 'number') {
    parsed = raw;
  } else if (typeof raw === 'string' && INTEGER_PATTERN.test(raw.trim())) {
    parsed = Number(raw.trim());
  } else {
    return fail(name, raw, reason, type);
  }

  if (!Number.isInteger(parsed)) {
    return fail(name, raw, reason, type);
  }

  const outOfRange = `Value out of range for type ${TYPE_LABELS[type]}`;
  if (type === 'int') {
    return parsed >= INT_MIN && parsed <= INT_MAX ? parsed : fail(name, raw, outOfRange, type);
  }

  const exact = typeof raw === 'string' ? BigInt(raw.trim().replace(/^\+/, '')) : BigInt(parsed);
  if (exact < LONG_MIN || exact > LONG_MAX) {
    return fail(name, raw, outOfRange, type);
  }
  return clampToSafeInteger(exact);
}

/**
 * 64-bit values beyond what a number holds exactly are clamped, so a
 * "no limit" value such as 9223372036854775807 stays usable.
 */
function clampToSafeInteger(value: bigint): number {
  if (value > BigInt(Number.MAX_SAFE_INTEGER)) return Number.MAX_SAFE_INTEGER;
  if (value < BigInt(Number.MIN_SAFE_INTEGER)) return Number.MIN_SAFE_INTEGER;
  return Number(value);
}

/**
 * Parse a raw value for a field of the given type.
 * Strings are trimmed; already-typed values (defaults) pass through.
 * Null stays null so required/default handling stays with the caller.
 */
export function parseValue(name: string, type: FieldType, raw: unknown): ConfigValue {
  if (raw === null || raw === undefined) {
    return null;
  }

  switch (type) {
    case 'boolean': {
      if (typeof raw === 'boolean') return raw;
      if (typeof raw === 'string') {
        const lowered = raw.trim().toLowerCase();
        if (lowered === 'true') return true;
        if (lowered === 'false') return false;
      }
      return fail(name, raw, 'Expected value to be either true or false', type);
    }

    case 'password': {
      if (raw instanceof Password) return raw;
      if (typeof raw === 'string') return new Password(raw.trim());
      return fail(name, typeof raw, 'Expected value to be a string', type);
    }

    case 'string': {
      if (typeof raw === 'string') return raw.trim();
      return fail(name, raw, 'Expected value to be a string', type);
    }

    case 'int':
    case 'long':
      return parseInteger(name, raw, type);

    case 'list': {
      if (isStringArray(raw)) return [...raw];
      if (typeof raw === 'string') {
        const trimmed = raw.trim();
        return trimmed === '' ? [] : trimmed.split(COMMA_WITH_WHITESPACE);
      }
      return fail(name, raw, 'Expected a comma separated list', type);
    }

    default: {
      const exhaustive: never = type;
      throw new Error(`Unknown field type: ${String(exhaustive)}`);
    }
  }
}

