import { mkdir, writeFile } from 'node:fs/promises';
import path from 'node:path';

import { Option } from 'commander';
import type { Command } from 'commander';

import type { BrowserLauncher } from '../browser/driver.js';
import { createPlaywrightLauncher } from '../browser/playwright.js';
import { EXIT_CODES, PASSWORD_ENV, PATHS } from '../config/defaults.js';
import type { ExitCode } from '../config/defaults.js';
import { loadConfigFile, loadProfile } from '../config/loader.js';
import { SessionController, selectActions } from '../core/session.js';
import { formatSummary, generateJSON, generateMarkdown, serializeJSON } from '../report/reporter.js';
import { browserKindSchema, isRunSuccessful } from '../schema/index.js';
import type { ConsoleProfile, RunSettings, RunSummary } from '../schema/index.js';
import { ConnectionError, InvocationError, errorMessage } from '../utils/errors.js';
import { createLogger } from '../utils/logger.js';
import type { Logger } from '../utils/logger.js';
import { buildRunSettings, resolvePassword } from './options.js';
import type { BackupCliOptions } from './options.js';

// ── Runtime seams ────────────────────────────────────────────

export interface BackupIO {
  stdout: (text: string) => void;
  stderr: (text: string) => void;
  env: NodeJS.ProcessEnv;
  logger?: Logger;
  launcher?: (logger: Logger) => BrowserLauncher;
}

const processIO: BackupIO = {
  stdout: (text) => process.stdout.write(text),
  stderr: (text) => process.stderr.write(text),
  env: process.env,
};

// ── Exit code ────────────────────────────────────────────────

export function exitCodeFor(summary: RunSummary): ExitCode {
  return isRunSuccessful(summary) ? EXIT_CODES.SUCCESS : EXIT_CODES.WORKFLOW_FAILURE;
}

// ── Backup run ───────────────────────────────────────────────

export interface BackupArgs {
  targetUrl: string;
  username: string;
  password?: string | undefined;
  options: BackupCliOptions;
}

/**
 * Everything behind the command line: load config and profile, resolve
 * the password, run the session, report. Returns the process exit code.
 */
export async function runBackup(args: BackupArgs, io: BackupIO = processIO): Promise<ExitCode> {
  const { options } = args;
  const logger = io.logger ?? createLogger({ verbose: options.verbose === true });

  let settings: RunSettings;
  let profile: ConsoleProfile;
  try {
    const fileConfig = await loadConfigFile(
      options.config ?? PATHS.CONFIG_FILE,
      options.config !== undefined,
    );
    profile = await loadProfile(options.profile ?? fileConfig.profile);
    const password = await resolvePassword({
      inline: args.password,
      file: options.passwordFile,
      env: io.env[PASSWORD_ENV],
    });
    settings = buildRunSettings({
      targetUrl: args.targetUrl,
      username: args.username,
      password,
      cli: options,
      file: fileConfig,
    });
    selectActions(profile, settings.archiveDirs, settings.actions);
  } catch (err) {
    if (!(err instanceof InvocationError)) throw err;
    io.stderr(`Error: ${err.message}\n`);
    return EXIT_CODES.INVOCATION_ERROR;
  }

  logger.info(`Target: ${settings.targetUrl} (profile ${profile.name})`);
  const launcher = (io.launcher ?? createPlaywrightLauncher)(logger);
  const controller = new SessionController(settings, profile, { launch: launcher, logger });

  let summary: RunSummary;
  try {
    summary = await controller.run();
  } catch (err) {
    if (err instanceof ConnectionError) {
      io.stderr(`Error: ${err.message}\n`);
      return EXIT_CODES.CONNECTION_ERROR;
    }
    if (err instanceof InvocationError) {
      io.stderr(`Error: ${err.message}\n`);
      return EXIT_CODES.INVOCATION_ERROR;
    }
    throw err;
  }

  const exitCode = exitCodeFor(summary);

  if (options.report !== undefined) {
    const reportPath = path.resolve(options.report);
    try {
      await mkdir(path.dirname(reportPath), { recursive: true });
      await writeFile(reportPath, generateMarkdown(summary), 'utf-8');
      logger.info(`Report written to ${reportPath}`);
    } catch (err) {
      logger.error(`Could not write report ${reportPath}: ${errorMessage(err)}`);
    }
  }

  if (options.json === true) {
    io.stdout(serializeJSON(generateJSON(summary, exitCode)) + '\n');
  }

  io.stderr(formatSummary(summary));
  return exitCode;
}

// ── Command registration ─────────────────────────────────────

export function configureBackupCommand(program: Command): void {
  program
    .argument('<target_url>', 'Console URL (e.g. https://10.0.0.1)')
    .argument('<username>', 'Console user name')
    .argument('[password]', 'Console password (or use --password-file)')
    .option('--password-file <path>', 'Read the password from the first line of a file')
    .addOption(
      new Option('--browser <name>', 'Browser to drive (default: edge)').choices(
        browserKindSchema.options,
      ),
    )
    .option('--headless', 'Run the browser headless')
    .option('--config <path>', `Config file (default: ${PATHS.CONFIG_FILE} if present)`)
    .option('--profile <path>', 'Console profile YAML (default: bundled Unisphere profile)')
    .option('--download-dir <dir>', 'Directory the browser downloads into')
    .option('--debug-dir <dir>', 'Where diagnostic HTML and screenshots go')
    .option('--config-archive-dir <dir>', 'Archive directory for configuration backups')
    .option('--keystore-archive-dir <dir>', 'Archive directory for keystore backups')
    .option('--timeout <seconds>', 'Wait per locator when resolving elements')
    .option('--download-timeout <seconds>', 'How long to wait for each download')
    .option('--action <name...>', 'Run only these profile actions')
    .option('--report <file>', 'Write a markdown report')
    .option('--json', 'Print the run summary as JSON on stdout')
    .option('--verbose', 'Log every locator attempt')
    .option('--no-login-capture', 'Skip the post-login HTML/screenshot capture')
    .action(
      async (
        targetUrl: string,
        username: string,
        password: string | undefined,
        opts: BackupCliOptions,
      ) => {
        process.exitCode = await runBackup({ targetUrl, username, password, options: opts });
      },
    );
}
