#!/usr/bin/env node
import { Command, Option } from 'commander';
import inquirer from 'inquirer';
import { config } from 'dotenv';
import { describeError } from './errors.js';
import { detectIdentityPrefixes, identityLabel, selectIdentities, type Env } from './services/config.js';
import { ConsoleLogger, type Logger } from './services/logger.js';
import { runIdentities } from './services/pipeline.js';
import type { CliOverrides } from './types/config.js';

config();

interface ExportOptions extends CliOverrides {
  user?: string;
  all?: boolean;
  debug?: boolean;
}

const program = new Command();

program
  .name('harvest-sheet')
  .description('Export Harvest time entries to CSV and, optionally, a Google Sheets tab')
  .version('1.0.0');

async function chooseIdentities(env: Env, options: ExportOptions, logger: Logger): Promise<string[]> {
  const identities = selectIdentities(env, options.user);
  if (options.user || options.all || env.USER_PREFIX || identities.length < 2 || !process.stdin.isTTY) {
    return identities;
  }

  const { selected } = await inquirer.prompt<{ selected: string[] }>([
    {
      type: 'checkbox',
      name: 'selected',
      message: 'Select the identities to export:',
      choices: identities.map((prefix) => ({ name: identityLabel(prefix), value: prefix, checked: true })),
      validate: (input: string[]) => input.length > 0 || 'Select at least one identity',
    },
  ]);
  logger.debug(`Selected identities: ${selected.map(identityLabel).join(', ')}`);
  return selected;
}

program
  .command('export', { isDefault: true })
  .description('Fetch time entries for a date range and write them to CSV')
  .option('--from-date <date>', 'Start date (YYYY-MM-DD)')
  .option('--to-date <date>', 'End date (YYYY-MM-DD)')
  .option('--output <file>', 'Output CSV file name (overrides CSV_OUTPUT_FILE)')
  .option('--json <file>', 'Save the raw JSON payload to this file')
  .option('--user <prefix>', 'Identity prefix for environment variables (e.g. JANE_DOE_)')
  .option('--all', 'Export every configured identity without asking')
  .option('--summary', 'Append total rows after the entries')
  .option('--resume', 'Append a day-by-day recap after the entries')
  .option('--advanced', 'Include rate, amount, lock and timestamp columns')
  .addOption(new Option('--on-page-error <policy>', 'What to do when a page fails').choices(['abort', 'skip']))
  .option('--no-upload', 'Do not upload to Google Sheets even when enabled')
  .option('--debug', 'Enable debug logging')
  .action(async (options: ExportOptions) => {
    const logger = new ConsoleLogger(options.debug === true);
    try {
      const env: Env = process.env;
      const prefixes = await chooseIdentities(env, options, logger);
      const outcomes = await runIdentities(prefixes, env, options, { logger });

      const failed = outcomes.filter((outcome) => !outcome.ok);
      for (const outcome of outcomes) {
        if (outcome.ok) {
          const { result } = outcome;
          const upload = result.uploaded ? 'uploaded' : result.uploadError ? 'upload failed' : 'not uploaded';
          logger.info(`${outcome.identity}: ${result.entryRows} entries written to ${result.csvPath} (${upload})`);
        } else {
          logger.error(`${outcome.identity}: ${outcome.error.message}`);
        }
      }
      if (failed.length > 0) {
        process.exitCode = 1;
      }
    } catch (error) {
      logger.error(`Error: ${describeError(error)}`);
      process.exitCode = 1;
    }
  });

program
  .command('identities')
  .description('List the identity prefixes found in the environment')
  .action(() => {
    const prefixes = detectIdentityPrefixes(process.env);
    if (process.env.HARVEST_ACCOUNT_ID) {
      console.log('default (no prefix)');
    }
    prefixes.forEach((prefix) => console.log(prefix));
    if (prefixes.length === 0 && !process.env.HARVEST_ACCOUNT_ID) {
      console.log('No identities configured. Set HARVEST_ACCOUNT_ID or <PREFIX>_HARVEST_ACCOUNT_ID.');
    }
  });

await program.parseAsync();
