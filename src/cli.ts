#!/usr/bin/env node
/**
 * aws-assume-role CLI - Composition Root
 *
 * Runs the program against the real process: real argv and environment,
 * real signal handlers, real exit. Business logic lives in src/cli/commands/*.ts
 */

import 'reflect-metadata';

import { runCli } from './cli/program.js';
import { formatOutput } from './cli/output-formatter.js';

runCli(process.argv.slice(2), { runtimeMode: { kind: 'cli' }, env: process.env }).catch((error: unknown) => {
  console.error(formatOutput({ message: error instanceof Error ? error.message : String(error) }));
  process.exit(1);
});
