/**
 * Documentation rendering for a registry
 */

import type { ConfigValue, FieldDefinition } from '../types/index.js';
import { HIDDEN, Password, isListValue } from '../types/index.js';
import type { ConfigDef } from './config-def.js';

function formatDefault(field: FieldDefinition): string {
  if (!field.hasDefault) return '';
  const value: ConfigValue = field.defaultValue;
  if (value === null) return 'null';
  if (value instanceof Password) return HIDDEN;
  if (isListValue(value)) return value.join(',');
  if (value === '') return '""';
  return String(value);
}

function describeValidator(field: FieldDefinition): string {
  return field.validator ? field.validator.describe() : '';
}

function rstField(field: FieldDefinition): string {
  const lines = [
    `\`\`${field.name}\`\``,
    ...field.documentation.split('\n').map((line) => `  ${line.trim()}`),
    '',
    `  * Type: ${field.type}`,
  ];
  if (field.hasDefault) {
    lines.push(`  * Default: ${formatDefault(field)}`);
  }
  const validValues = describeValidator(field);
  if (validValues) {
    lines.push(`  * Valid Values: ${validValues}`);
  }
  lines.push(`  * Importance: ${field.importance}`, '');
  return lines.join('\n');
}

function groupHeading(title: string): string {
  return `${title}\n${'^'.repeat(title.length)}\n`;
}

/** reStructuredText reference, grouped and ordered the way allKeys() orders the registry */
export function toRst(def: ConfigDef): string {
  const out: string[] = [];
  let currentGroup: string | null = null;

  for (const field of def.sortedDefinitions()) {
    if (field.group !== null && field.group !== currentGroup) {
      currentGroup = field.group;
      out.push(groupHeading(currentGroup));
    }
    out.push(rstField(field));
  }

  return out.join('\n');
}

function escapeCell(text: string): string {
  return text.replace(/\|/g, '\\|').replace(/\n+/g, ' ');
}

/** Markdown tables, one per group */
export function toMarkdown(def: ConfigDef): string {
  const sections = new Map<string, FieldDefinition[]>();
  for (const field of def.sortedDefinitions()) {
    const title = field.group ?? 'General';
    const rows = sections.get(title) ?? [];
    rows.push(field);
    sections.set(title, rows);
  }

  const out: string[] = [];
  for (const [title, fields] of sections) {
    out.push(`## ${title}`, '');
    out.push('| Key | Type | Default | Valid Values | Importance | Description |');
    out.push('|---|---|---|---|---|---|');
    for (const field of fields) {
      const defaultCell = field.hasDefault ? `\`${formatDefault(field)}\`` : '_required_';
      out.push(
        `| \`${field.name}\` | ${field.type} | ${defaultCell} | ${escapeCell(describeValidator(field))} | ${field.importance} | ${escapeCell(field.documentation)} |`
      );
    }
    out.push('');
  }

  return out.join('\n');
}
