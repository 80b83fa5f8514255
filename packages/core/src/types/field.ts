/**
 * Field definition types for the configuration registry
 */

import type { Password } from './password.js';
import type { Validator } from '../validation/validators.js';

/** Declared type of a configuration field */
export type FieldType = 'string' | 'int' | 'long' | 'boolean' | 'password' | 'list';

/** Documentation/UI tier; no effect on resolution */
export type Importance = 'high' | 'medium' | 'low';

/** Display width hint for configuration UIs */
export type Width = 'none' | 'short' | 'medium' | 'long';

/** A parsed configuration value */
export type ConfigValue = string | number | boolean | readonly string[] | Password | null;

export interface FieldDefinition {
  /** Dotted key, unique within a registry */
  readonly name: string;
  readonly type: FieldType;
  /** False means the field is required */
  readonly hasDefault: boolean;
  /** Parsed default; null when hasDefault is false */
  readonly defaultValue: ConfigValue;
  readonly importance: Importance;
  readonly documentation: string;
  /** Runs after type coercion */
  readonly validator?: Validator;
  /** Display group; null for ungrouped fields */
  readonly group: string | null;
  readonly orderInGroup: number;
  readonly width: Width;
  readonly displayName: string;
}

/**
 * Input to ConfigDefBuilder.define().
 * Leave out defaultValue to make the field required; raw string defaults
 * are parsed the same way as raw input.
 */
export interface FieldSpec {
  name: string;
  type: FieldType;
  defaultValue?: ConfigValue;
  importance: Importance;
  documentation: string;
  validator?: Validator;
  group?: string | null;
  orderInGroup?: number;
  width?: Width;
  displayName?: string;
}

/** Narrows a parsed value to a list */
export function isListValue(value: ConfigValue): value is readonly string[] {
  return Array.isArray(value);
}
