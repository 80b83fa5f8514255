/**
 * Loading raw connector properties from disk
 *
 * Accepts a JSON object or a `.properties` file. `${VAR}` and
 * `${VAR:-default}` references are expanded from the environment before the
 * values reach the resolver.
 */

import { readFile } from 'node:fs/promises';
import { extname, resolve } from 'node:path';
import { z } from 'zod';
import { ConfigError, formatIssues } from '@docsink/core';

export type EnvExpansionOptions = {
  /**
   * If true, missing env vars leave placeholders unchanged instead of erroring.
   * Default: false (fail-fast).
   */
  allowMissing?: boolean;
  /** Variables to expand from; defaults to process.env */
  env?: Readonly<Record<string, string | undefined>>;
};

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return (
    typeof value === 'object' &&
    value !== null &&
    !Array.isArray(value) &&
    Object.getPrototypeOf(value) === Object.prototype
  );
}

function expandEnvInString(input: string, options?: EnvExpansionOptions): string {
  const env = options?.env ?? process.env;
  return input.replace(/\$\{([^}]+)\}/g, (match, inner: string) => {
    const [rawName, rawDefault] = inner.split(':-', 2);
    const name = (rawName ?? '').trim();
    if (!name) return match;

    const envValue = env[name];
    if (envValue !== undefined && envValue !== '') return envValue;

    if (rawDefault !== undefined) return rawDefault;

    if (options?.allowMissing) return match;

    throw new ConfigError({
      code: 'INVALID_INPUT',
      message: `Missing required environment variable: ${name}`,
      suggestion: `Export ${name}, or write the reference as \${${name}:-default}.`,
    });
  });
}

export function expandEnvVars(value: unknown, options?: EnvExpansionOptions): unknown {
  if (typeof value === 'string') {
    return expandEnvInString(value, options);
  }
  if (Array.isArray(value)) {
    return value.map((v) => expandEnvVars(v, options));
  }
  if (isPlainObject(value)) {
    const out: Record<string, unknown> = {};
    for (const [k, v] of Object.entries(value)) {
      out[k] = expandEnvVars(v, options);
    }
    return out;
  }
  return value;
}

/** Scalars are accepted and handed to the resolver as strings */
export const connectorPropsSchema = z
  .record(z.union([z.string(), z.number(), z.boolean()]))
  .transform((props) => {
    const out: Record<string, string> = {};
    for (const [key, value] of Object.entries(props)) {
      out[key] = String(value);
    }
    return out;
  });

const LEADING_WHITESPACE = /^[ \t\f]+/;
const ESCAPE = /\\(u(?:[0-9a-fA-F]{4})?|[\s\S]?)/g;
const ESCAPED_CHARS: Record<string, string> = { t: '\t', n: '\n', r: '\r', f: '\f' };

interface LogicalLine {
  /** 1-based number of the physical line the entry starts on */
  line: number;
  text: string;
}

function isWhitespace(ch: string): boolean {
  return ch === ' ' || ch === '\t' || ch === '\f';
}

function endsWithContinuation(text: string): boolean {
  let backslashes = 0;
  for (let i = text.length - 1; i >= 0 && text.charAt(i) === '\\'; i--) {
    backslashes++;
  }
  return backslashes % 2 === 1;
}

/** Join `\`-continued lines and drop blanks and comments */
function logicalLines(text: string): LogicalLine[] {
  const out: LogicalLine[] = [];
  let pending: LogicalLine | null = null;

  const physical = text.split(/\r\n|\r|\n/);
  for (let index = 0; index < physical.length; index++) {
    const stripped = (physical[index] ?? '').replace(LEADING_WHITESPACE, '');
    if (pending === null) {
      if (stripped === '' || stripped.startsWith('#') || stripped.startsWith('!')) continue;
      pending = { line: index + 1, text: '' };
    }

    if (endsWithContinuation(stripped)) {
      pending.text += stripped.slice(0, -1);
      continue;
    }
    pending.text += stripped;
    out.push(pending);
    pending = null;
  }

  if (pending !== null) out.push(pending);
  return out;
}

function unescape(text: string, line: number): string {
  return text.replace(ESCAPE, (_match, escaped: string) => {
    if (escaped.startsWith('u')) {
      if (escaped.length !== 5) {
        throw new ConfigError({
          code: 'INVALID_INPUT',
          message: `Line ${line} has a malformed \\uXXXX escape`,
          suggestion: 'Write unicode escapes with exactly four hex digits.',
        });
      }
      return String.fromCharCode(parseInt(escaped.slice(1), 16));
    }
    return ESCAPED_CHARS[escaped] ?? escaped;
  });
}

/**
 * Parse `.properties` text. The key ends at the first unescaped `=`, `:` or
 * whitespace; lines ending in an odd number of backslashes continue on the
 * next line. Blank lines and `#` / `!` comments are skipped, a bare key reads
 * as an empty value, and a later duplicate key wins.
 */
export function parseProperties(text: string): Record<string, string> {
  const out: Record<string, string> = {};

  for (const { line, text: entry } of logicalLines(text)) {
    let keyEnd = entry.length;
    for (let i = 0; i < entry.length; i++) {
      const ch = entry.charAt(i);
      if (ch === '\\') {
        i++;
        continue;
      }
      if (ch === '=' || ch === ':' || isWhitespace(ch)) {
        keyEnd = i;
        break;
      }
    }

    let valueStart = keyEnd;
    while (valueStart < entry.length && isWhitespace(entry.charAt(valueStart))) valueStart++;
    if (entry.charAt(valueStart) === '=' || entry.charAt(valueStart) === ':') valueStart++;
    while (valueStart < entry.length && isWhitespace(entry.charAt(valueStart))) valueStart++;

    out[unescape(entry.slice(0, keyEnd), line)] = unescape(entry.slice(valueStart), line);
  }

  return out;
}

export function parseConnectorProps(raw: unknown, options?: EnvExpansionOptions): Record<string, string> {
  const result = connectorPropsSchema.safeParse(expandEnvVars(raw, options));
  if (!result.success) {
    throw new ConfigError({
      code: 'INVALID_INPUT',
      message: formatIssues('Invalid connector properties', result.error),
      suggestion: 'Use a flat object of string, number or boolean values.',
    });
  }
  return result.data;
}

export async function loadConnectorProps(
  configPath: string,
  options?: EnvExpansionOptions
): Promise<Record<string, string>> {
  const absolutePath = resolve(process.cwd(), configPath);
  const content = await readFile(absolutePath, 'utf-8');
  // Handle UTF-8 BOM (common on Windows) to avoid parse failures.
  const sanitized = content.replace(/^\uFEFF/, '');

  if (extname(absolutePath) === '.properties') {
    return parseConnectorProps(parseProperties(sanitized), options);
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(sanitized);
  } catch (error) {
    throw new ConfigError({
      code: 'INVALID_INPUT',
      message: `${configPath} is not valid JSON`,
      cause: error instanceof Error ? error : undefined,
      suggestion: 'Use a JSON object, or a file ending in .properties.',
    });
  }
  return parseConnectorProps(parsed, options);
}
