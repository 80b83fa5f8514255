/**
 * docsink-config commands
 *
 * Usage:
 *   docsink-config docs [--format rst|markdown]
 *   docsink-config validate --config <file.json|file.properties> [--log-level <level>] [--log-format text|json]
 */

import { z } from 'zod';
import { ConfigError, formatIssues, toMarkdown, toRst } from '@docsink/core';
import { SINK_CONFIG_DEF, SinkConnectorConfig } from '@docsink/sink-config';
import { loadConnectorProps } from './config-file.js';
import { logConfigValues } from './log-values.js';
import { Logger, createTraceId, secretKeysOf, type LogWriter } from './logger.js';

export interface CliIo {
  stdout: LogWriter;
  stderr: LogWriter;
  env?: Readonly<Record<string, string | undefined>>;
}

const cliOptionsSchema = z
  .object({
    config: z.string().min(1).optional(),
    format: z.enum(['rst', 'markdown']).optional(),
    logLevel: z.enum(['debug', 'info', 'warn', 'error']).optional(),
    logFormat: z.enum(['text', 'json']).optional(),
  })
  .strict();

type CliOptions = z.infer<typeof cliOptionsSchema>;

const FLAG_NAMES: Record<string, keyof CliOptions> = {
  '--config': 'config',
  '--format': 'format',
  '--log-level': 'logLevel',
  '--log-format': 'logFormat',
};

const USAGE = [
  'Usage:',
  '  docsink-config docs [--format rst|markdown]',
  '  docsink-config validate --config <file.json|file.properties> [--log-level <level>] [--log-format text|json]',
].join('\n');

class UsageError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'UsageError';
  }
}

function parseFlags(args: readonly string[]): CliOptions {
  const raw: Record<string, string> = {};
  for (let i = 0; i < args.length; i += 2) {
    const flag = args[i] ?? '';
    const name = FLAG_NAMES[flag];
    const value = args[i + 1];
    if (!name) throw new UsageError(`Unknown option: ${flag}`);
    if (value === undefined) throw new UsageError(`Missing value for ${flag}`);
    raw[name] = value;
  }

  const result = cliOptionsSchema.safeParse(raw);
  if (!result.success) {
    throw new UsageError(formatIssues('Invalid options', result.error));
  }
  return result.data;
}

function renderDocs(options: CliOptions, io: CliIo): number {
  const rendered = options.format === 'markdown' ? toMarkdown(SINK_CONFIG_DEF) : toRst(SINK_CONFIG_DEF);
  io.stdout.write(`${rendered}\n`);
  return 0;
}

async function validate(options: CliOptions, io: CliIo): Promise<number> {
  if (!options.config) throw new UsageError('validate requires --config <file>');

  const logger = new Logger({
    level: options.logLevel,
    format: options.logFormat,
    writer: io.stderr,
    secretKeys: secretKeysOf(SINK_CONFIG_DEF),
  }).child({ traceId: createTraceId() });

  try {
    const props = await loadConnectorProps(options.config, { env: io.env });
    const config = new SinkConnectorConfig(props);
    logConfigValues(logger, config);

    const summary = {
      valid: true,
      secured: config.isSecured(),
      https: config.isHttps(),
      proxyConfigured: config.isBasicProxyConfigured(),
      proxyAuthenticated: config.isProxyAuthenticated(),
      hostnameVerificationDisabled: config.hostnameVerificationDisabled(),
    };
    io.stdout.write(`${JSON.stringify(summary)}\n`);
    return 0;
  } catch (error) {
    if (error instanceof ConfigError) {
      logger.error(error.toActionableMessage(), { error: error.toJSON() });
      return 1;
    }
    throw error;
  }
}

/** Run one command; resolves to the process exit code */
export async function runCli(args: readonly string[], io: CliIo): Promise<number> {
  const [command, ...rest] = args;

  try {
    const options = parseFlags(rest);
    switch (command) {
      case 'docs':
        return renderDocs(options, io);
      case 'validate':
        return await validate(options, io);
      default:
        throw new UsageError(command ? `Unknown command: ${command}` : 'Missing command');
    }
  } catch (error) {
    if (error instanceof UsageError) {
      io.stderr.write(`${error.message}\n\n${USAGE}\n`);
      return 1;
    }
    throw error;
  }
}
