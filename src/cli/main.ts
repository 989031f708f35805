#!/usr/bin/env node

/**
 * unisphere-backup CLI entry point.
 * Thin wrapper, all logic delegated to core.
 */

import 'dotenv/config';
import { Command, CommanderError } from 'commander';

import { EXIT_CODES } from '../config/defaults.js';
import { errorMessage } from '../utils/errors.js';
import { configureBackupCommand } from './run.js';

const program = new Command();

program
  .name('unisphere-backup')
  .description(
    'Take a configuration backup and an encryption keystore backup from a Unisphere console, then archive both files.',
  )
  .version('0.1.0')
  .exitOverride();

configureBackupCommand(program);

try {
  await program.parseAsync();
} catch (err) {
  if (err instanceof CommanderError) {
    // Help and --version exit 0; usage errors are invocation errors.
    process.exitCode = err.exitCode === 0 ? EXIT_CODES.SUCCESS : EXIT_CODES.INVOCATION_ERROR;
  } else {
    process.stderr.write(`Error: ${errorMessage(err)}\n`);
    process.exitCode = EXIT_CODES.WORKFLOW_FAILURE;
  }
}
