#!/usr/bin/env node
/**
 * CLI entry point
 *
 * Usage:
 *   docsink-config validate --config ./connector.properties
 */

import { wrapError } from '@docsink/core';
import { runCli } from './commands.js';

runCli(process.argv.slice(2), { stdout: process.stdout, stderr: process.stderr }).then(
  (code) => {
    process.exitCode = code;
  },
  (error: unknown) => {
    process.stderr.write(`${wrapError(error).toActionableMessage()}\n`);
    process.exitCode = 1;
  }
);
