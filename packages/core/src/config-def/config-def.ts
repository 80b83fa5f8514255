/**
 * Configuration registry
 *
 * A ConfigDefBuilder collects field definitions (and embedded sub-registries)
 * and is frozen once into an immutable ConfigDef that resolvers read.
 */

import type { ConfigValue, FieldDefinition, FieldSpec } from '../types/index.js';
import { ConfigError } from '../errors/index.js';
import { parseValue } from '../validation/index.js';
import { resolve } from './resolver.js';
import type { ResolvedConfig } from './resolved-config.js';

/** Where embedded fields land in the parent's display layout */
export interface Placement {
  group: string;
  startOrder: number;
}

export class ConfigDef {
  private readonly fields: ReadonlyMap<string, FieldDefinition>;
  private readonly groupOrder: readonly string[];

  constructor(definitions: Iterable<FieldDefinition>) {
    const fields = new Map<string, FieldDefinition>();
    const groups: string[] = [];

    for (const definition of definitions) {
      if (fields.has(definition.name)) {
        throw duplicateField(definition.name);
      }
      fields.set(definition.name, Object.freeze({ ...definition }));
      if (definition.group !== null && !groups.includes(definition.group)) {
        groups.push(definition.group);
      }
    }

    this.fields = fields;
    this.groupOrder = Object.freeze(groups);
    Object.freeze(this);
  }

  get size(): number {
    return this.fields.size;
  }

  has(name: string): boolean {
    return this.fields.has(name);
  }

  get(name: string): FieldDefinition | undefined {
    return this.fields.get(name);
  }

  /** Field names in declaration order */
  names(): string[] {
    return Array.from(this.fields.keys());
  }

  /** Field definitions in declaration order */
  definitions(): FieldDefinition[] {
    return Array.from(this.fields.values());
  }

  /** Display groups in the order they were first used */
  groups(): string[] {
    return [...this.groupOrder];
  }

  /**
   * Field names in display order: ungrouped fields first, then each group in
   * insertion order, sorted by orderInGroup (declaration order on ties).
   */
  allKeys(): string[] {
    return this.sortedDefinitions().map((field) => field.name);
  }

  sortedDefinitions(): FieldDefinition[] {
    const rank = (field: FieldDefinition): number =>
      field.group === null ? -1 : this.groupOrder.indexOf(field.group);

    // Array.prototype.sort is stable, so declaration order breaks ties
    return this.definitions().sort(
      (a, b) => rank(a) - rank(b) || a.orderInGroup - b.orderInGroup
    );
  }

  /** Resolve raw string input against this registry */
  parse(raw: Readonly<Record<string, string>>): ResolvedConfig {
    return resolve(this, raw);
  }
}

function duplicateField(name: string): ConfigError {
  return new ConfigError({
    code: 'DUPLICATE_FIELD',
    message: `Configuration ${name} is defined twice.`,
    keys: [name],
    suggestion: 'Each key may only be defined once per registry, including embedded prefixes.',
  });
}

export class ConfigDefBuilder {
  private readonly fields = new Map<string, FieldDefinition>();

  get size(): number {
    return this.fields.size;
  }

  /**
   * Add a field. A missing defaultValue makes the field required; a supplied
   * one is parsed and validated now, so a bad default fails at startup.
   */
  define(spec: FieldSpec): this {
    if (this.fields.has(spec.name)) {
      throw duplicateField(spec.name);
    }

    const hasDefault = spec.defaultValue !== undefined;
    let defaultValue: ConfigValue = null;

    if (spec.defaultValue !== undefined) {
      try {
        defaultValue = parseValue(spec.name, spec.type, spec.defaultValue);
        spec.validator?.ensureValid(spec.name, defaultValue);
      } catch (error) {
        throw new ConfigError({
          code: 'INVALID_DEFINITION',
          message: `Invalid default for ${spec.name}: ${error instanceof Error ? error.message : String(error)}`,
          keys: [spec.name],
          cause: error instanceof Error ? error : undefined,
        });
      }
    }

    return this.add({
      name: spec.name,
      type: spec.type,
      hasDefault,
      defaultValue,
      importance: spec.importance,
      documentation: spec.documentation,
      validator: spec.validator,
      group: spec.group ?? null,
      orderInGroup: spec.orderInGroup ?? -1,
      width: spec.width ?? 'none',
      displayName: spec.displayName ?? spec.name,
    });
  }

  /**
   * Merge every field of `child` under `prefix`. Types, defaults and
   * validators are kept as they are; group and order are reassigned.
   */
  embed(prefix: string, group: string, startOrder: number, child: ConfigDef): this {
    return this.embedWith(prefix, child, { group, startOrder });
  }

  /** Like embed(), but keeps the child's own group and order when no placement is given */
  embedWith(prefix: string, child: ConfigDef, placement?: Placement): this {
    child.definitions().forEach((field, index) => {
      const name = `${prefix}${field.name}`;
      if (this.fields.has(name)) {
        throw duplicateField(name);
      }
      this.add({
        ...field,
        name,
        group: placement ? placement.group : field.group,
        orderInGroup: placement ? placement.startOrder + index : field.orderInGroup,
      });
    });
    return this;
  }

  freeze(): ConfigDef {
    return new ConfigDef(this.fields.values());
  }

  private add(definition: FieldDefinition): this {
    this.fields.set(definition.name, definition);
    return this;
  }
}

export interface PrefixedConfigDef {
  prefix: string;
  def: ConfigDef;
  placement?: Placement;
}

/** Compose several registries, each under its own key prefix, into one */
export function mergeConfigDefs(entries: readonly PrefixedConfigDef[]): ConfigDef {
  const builder = new ConfigDefBuilder();
  for (const entry of entries) {
    builder.embedWith(entry.prefix, entry.def, entry.placement);
  }
  return builder.freeze();
}
