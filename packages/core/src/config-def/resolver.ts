/**
 * Resolution of raw string input into a typed snapshot
 */

import { z } from 'zod';
import type { ConfigValue } from '../types/index.js';
import { ConfigError, MissingRequiredFieldError } from '../errors/index.js';
import { parseValue } from '../validation/index.js';
import type { ConfigDef } from './config-def.js';
import { ResolvedConfig } from './resolved-config.js';

/** Raw configuration as handed over by the hosting framework */
export const rawConfigSchema = z.record(z.string());

export type RawConfig = z.infer<typeof rawConfigSchema>;

export function formatIssues(label: string, err: z.ZodError): string {
  const issues = err.issues
    .map((issue) => {
      const path = issue.path.length ? issue.path.join('.') : '(root)';
      return `- ${path}: ${issue.message}`;
    })
    .join('\n');
  return `${label}:\n${issues}`;
}

/** Check that the input is a flat string-to-string mapping */
export function parseRawConfig(raw: unknown): RawConfig {
  const result = rawConfigSchema.safeParse(raw);
  if (!result.success) {
    throw new ConfigError({
      code: 'INVALID_INPUT',
      message: formatIssues('Invalid raw configuration', result.error),
      keys: result.error.issues
        .map((issue) => issue.path.join('.'))
        .filter((key) => key.length > 0),
      suggestion: 'Supply every configuration value as a string.',
    });
  }
  return result.data;
}

/**
 * Resolve every field of `def`: supplied values are coerced and validated,
 * absent ones take their default, and an absent required field fails.
 * The first failure in declaration order is thrown.
 */
export function resolve(def: ConfigDef, raw: Readonly<Record<string, string>>): ResolvedConfig {
  const input = parseRawConfig(raw);
  const values = new Map<string, ConfigValue>();

  for (const field of def.definitions()) {
    let value: ConfigValue;

    if (Object.prototype.hasOwnProperty.call(input, field.name)) {
      value = parseValue(field.name, field.type, input[field.name]);
    } else if (field.hasDefault) {
      value = field.defaultValue;
    } else {
      throw new MissingRequiredFieldError(field.name);
    }

    field.validator?.ensureValid(field.name, value);
    values.set(field.name, value);
  }

  return new ResolvedConfig(def, values, input);
}
